import type { RunOutcome, SchedulerPhase, SchedulerSnapshot } from "./types.ts";

/**
 * Mutable scheduler state owned by one WorkflowScheduler. Only the loop
 * writes to it; everything else reads frozen snapshots.
 */
export class SchedulerState {
  private phase: SchedulerPhase = "idle";
  private startedAt: Date | null = null;
  private lastRunAt: Date | null = null;
  private nextDueAt: Date | null = null;
  private running = false;
  private lastOutcome: RunOutcome | null = null;
  private lastError: string | null = null;
  private consecutiveFailures = 0;
  private totalRuns = 0;

  get isRunning(): boolean {
    return this.running;
  }

  get currentPhase(): SchedulerPhase {
    return this.phase;
  }

  get lastRun(): Date | null {
    return this.lastRunAt;
  }

  markStarted(at: Date): void {
    this.startedAt = at;
    this.phase = "waiting";
  }

  setNextDue(at: Date | null): void {
    this.nextDueAt = at;
  }

  beginRun(at: Date): void {
    this.running = true;
    this.lastRunAt = at;
    if (this.phase !== "stopped") this.phase = "firing";
  }

  finishRun(outcome: RunOutcome, error?: string): void {
    this.running = false;
    this.totalRuns++;
    this.lastOutcome = outcome;
    if (outcome === "success") {
      this.consecutiveFailures = 0;
      this.lastError = null;
    } else {
      this.consecutiveFailures++;
      this.lastError = error ?? null;
    }
    if (this.phase === "firing") this.phase = this.startedAt ? "waiting" : "idle";
  }

  markStopped(): void {
    this.phase = "stopped";
    this.nextDueAt = null;
  }

  snapshot(): SchedulerSnapshot {
    return Object.freeze({
      phase: this.phase,
      startedAt: this.startedAt,
      lastRunAt: this.lastRunAt,
      nextDueAt: this.nextDueAt,
      isRunning: this.running,
      lastOutcome: this.lastOutcome,
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
      totalRuns: this.totalRuns,
    });
  }
}
