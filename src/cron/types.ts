export type TriggerKind = "daily" | "cron" | "interval" | "hourly" | "weekly" | "monthly";

export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

export interface DailyTrigger {
  kind: "daily";
  hour: number;
  minute: number;
}

export interface CronTrigger {
  kind: "cron";
  /** 5-field expression, stored as written and validated on first evaluation */
  expression: string;
}

export interface IntervalTrigger {
  kind: "interval";
  seconds: number;
}

export interface HourlyTrigger {
  kind: "hourly";
  minute: number;
}

export interface WeeklyTrigger {
  kind: "weekly";
  weekday: Weekday;
  hour: number;
  minute: number;
}

export interface MonthlyTrigger {
  kind: "monthly";
  dayOfMonth: number;
  hour: number;
  minute: number;
}

export type TriggerDefinition =
  | DailyTrigger
  | CronTrigger
  | IntervalTrigger
  | HourlyTrigger
  | WeeklyTrigger
  | MonthlyTrigger;

export interface RetryPolicy {
  /** Retries after the first attempt (0 = single attempt) */
  maxRetries: number;
  /** Fixed wait between attempts */
  retryDelaySeconds: number;
  /** Per-attempt bound; undefined means unbounded */
  timeoutSeconds?: number;
}

export type AttemptOutcome = "success" | "failure" | "timeout";

export interface RunAttempt {
  attempt: number;
  startedAt: Date;
  finishedAt: Date;
  outcome: AttemptOutcome;
  error?: string;
}

export type SchedulerPhase = "idle" | "waiting" | "firing" | "stopped";

export type RunOutcome = "success" | "exhausted";

export type RunSource = "schedule" | "manual" | "startup";

export interface SchedulerSnapshot {
  phase: SchedulerPhase;
  startedAt: Date | null;
  lastRunAt: Date | null;
  nextDueAt: Date | null;
  isRunning: boolean;
  lastOutcome: RunOutcome | null;
  lastError: string | null;
  consecutiveFailures: number;
  totalRuns: number;
}

export interface RunReport<T> {
  source: RunSource;
  outcome: RunOutcome;
  startedAt: Date;
  finishedAt: Date;
  attempts: RunAttempt[];
  output?: T;
  error?: string;
}

/** Unit of work run under the retry policy. */
export type WorkflowTask<T> = (signal: AbortSignal, attempt: number) => Promise<T>;
