import { ExhaustedRetriesError, errorMessage } from "./errors.ts";
import { executeWithRetry, type Sleep } from "./retry.ts";
import { SchedulerState } from "./state.ts";
import { formatSchedule } from "./parser.ts";
import { assertTimezone, formatWallClock, nextFireAfter } from "./trigger.ts";
import type {
  RetryPolicy,
  RunReport,
  RunSource,
  SchedulerSnapshot,
  TriggerDefinition,
  WorkflowTask,
} from "./types.ts";
import { consoleLogger, type Logger } from "../daemon/logger.ts";

export const DEFAULT_POLL_INTERVAL_MS = 30_000;

export type LoopSleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface WorkflowSchedulerOptions<T> {
  trigger: TriggerDefinition;
  timezone: string;
  policy: RetryPolicy;
  task: WorkflowTask<T>;
  /** Upper bound on the wait between due checks */
  pollIntervalMs?: number;
  /** Fire once as soon as the loop starts */
  runOnStart?: boolean;
  label?: string;
  logger?: Logger;
  now?: () => Date;
  sleep?: LoopSleep;
  retrySleep?: Sleep;
  onRun?: (report: RunReport<T>) => void;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const abortableSleep: LoopSleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });

/**
 * Single cooperative loop: wait until the trigger is due, run the task under
 * the retry policy, repeat. Runs never overlap. stop() takes effect at the
 * next poll boundary; a run in progress is allowed to finish.
 */
export class WorkflowScheduler<T = unknown> {
  private readonly state = new SchedulerState();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep: LoopSleep;
  private readonly pollIntervalMs: number;
  private readonly descriptor: string;

  private readonly wake = new AbortController();
  private stopping = false;
  private prepared = false;
  /** Next due time is computed strictly after this instant */
  private anchor: Date | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: WorkflowSchedulerOptions<T>) {
    this.logger = options.logger ?? consoleLogger("scheduler");
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? abortableSleep;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.descriptor = formatSchedule(options.trigger);
  }

  get trigger(): TriggerDefinition {
    return this.options.trigger;
  }

  get timezone(): string {
    return this.options.timezone;
  }

  snapshot(): SchedulerSnapshot {
    return this.state.snapshot();
  }

  /**
   * Validate the trigger against the timezone and compute the first due
   * time. Throws ConfigError for an unknown zone or a malformed cron
   * expression, before any tick runs.
   */
  prepare(): Date {
    assertTimezone(this.options.timezone);
    const startedAt = this.now();
    this.anchor = startedAt;
    const nextDue = this.computeNextDue();
    this.state.markStarted(startedAt);
    this.state.setNextDue(nextDue);
    this.prepared = true;

    this.logger.info(
      `Schedule ${this.descriptor} (${this.options.timezone}); next run ${formatWallClock(nextDue, this.options.timezone)}`,
    );
    return nextDue;
  }

  /** Start the loop in the background. */
  start(): void {
    if (this.loop) return;
    if (!this.prepared) this.prepare();
    this.loop = this.runLoop().catch((err: unknown) => {
      this.state.markStopped();
      this.logger.error(`Scheduler loop failed: ${errorMessage(err)}`);
    });
  }

  /** Start the loop and resolve when it has stopped. */
  run(): Promise<void> {
    this.start();
    return this.loop ?? Promise.resolve();
  }

  /** Request shutdown; resolves once the loop has exited. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = true;
      this.wake.abort();
      this.logger.info("Stop requested");
    }
    if (!this.loop) {
      this.state.markStopped();
      return Promise.resolve();
    }
    return this.loop;
  }

  /**
   * One poll: recompute the next due time and fire if it has passed.
   * Returns the run report when a run happened.
   */
  async tick(): Promise<RunReport<T> | null> {
    if (this.stopping) return null;
    if (!this.prepared) this.prepare();

    const now = this.now();
    const nextDue = this.computeNextDue();
    this.state.setNextDue(nextDue);

    if (now.getTime() < nextDue.getTime()) return null;
    if (this.state.isRunning) {
      this.logger.warn("Run still in progress; skipping due check");
      return null;
    }
    if (this.stopping) return null;

    return this.fire("schedule");
  }

  /**
   * Run immediately, outside the schedule. Returns null when a run is
   * already in progress.
   */
  async runOnce(source: RunSource = "manual"): Promise<RunReport<T> | null> {
    if (this.state.isRunning) {
      this.logger.warn(`Run requested (${source}) while another run is in progress; skipped`);
      return null;
    }
    return this.fire(source);
  }

  private computeNextDue(): Date {
    const anchor = this.anchor ?? this.now();
    return nextFireAfter(this.options.trigger, anchor, this.options.timezone, this.state.lastRun);
  }

  private async fire(source: RunSource): Promise<RunReport<T>> {
    const startedAt = this.now();
    this.state.beginRun(startedAt);
    this.logger.info(`Run started (${source}, ${this.descriptor})`);

    let report: RunReport<T>;
    try {
      const result = await executeWithRetry(this.options.task, this.options.policy, {
        logger: this.logger,
        label: this.options.label,
        sleep: this.options.retrySleep,
        now: this.now,
      });
      report = {
        source,
        outcome: "success",
        startedAt,
        finishedAt: this.now(),
        attempts: result.attempts,
        output: result.value,
      };
    } catch (err) {
      report = {
        source,
        outcome: "exhausted",
        startedAt,
        finishedAt: this.now(),
        attempts: err instanceof ExhaustedRetriesError ? err.attempts : [],
        error: err instanceof ExhaustedRetriesError ? err.lastError.message : errorMessage(err),
      };
    }

    this.state.finishRun(report.outcome, report.error);
    if (this.prepared) {
      this.anchor = report.finishedAt;
      this.state.setNextDue(this.computeNextDue());
    }

    const elapsed = report.finishedAt.getTime() - startedAt.getTime();
    const next = this.state.snapshot().nextDueAt;
    const nextText = next ? `; next run ${formatWallClock(next, this.options.timezone)}` : "";
    if (report.outcome === "success") {
      this.logger.info(`Run succeeded in ${elapsed}ms${nextText}`);
    } else {
      this.logger.error(
        `Run failed after ${report.attempts.length} attempt(s): ${report.error ?? "unknown error"}${nextText}`,
      );
    }

    this.options.onRun?.(report);
    return report;
  }

  private async runLoop(): Promise<void> {
    this.logger.info("Scheduler loop started");

    if (this.options.runOnStart && !this.stopping) {
      await this.runOnce("startup");
    }

    while (!this.stopping) {
      let delay = this.pollIntervalMs;
      try {
        await this.tick();
        const nextDue = this.state.snapshot().nextDueAt;
        if (nextDue) {
          const untilDue = nextDue.getTime() - this.now().getTime();
          delay = Math.min(this.pollIntervalMs, Math.max(0, untilDue));
        }
      } catch (err) {
        this.logger.error(`Scheduler tick failed: ${errorMessage(err)}`);
      }

      if (this.stopping) break;
      await this.sleep(delay, this.wake.signal);
    }

    this.state.markStopped();
    this.logger.info("Scheduler loop stopped");
  }
}
