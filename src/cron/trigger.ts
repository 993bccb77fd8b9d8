import { CronExpressionParser } from "cron-parser";
import { ConfigError, errorMessage } from "./errors.ts";
import type { TriggerDefinition, Weekday } from "./types.ts";

const CRON_WEEKDAY: Record<Weekday, number> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

export interface DueContext {
  timezone: string;
  /** Reference point used until the trigger has fired once (usually loop start) */
  since: Date;
}

/** Reject anything Intl does not know as an IANA zone. */
export function assertTimezone(timezone: string): void {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
  } catch {
    throw new ConfigError(`Unknown timezone "${timezone}"`);
  }
}

/**
 * Calendar triggers compile to 5-field cron so one timezone-aware evaluator
 * handles them all. A monthly day that a month lacks never matches in that
 * month, so the month is skipped.
 */
export function toCronExpression(trigger: TriggerDefinition): string | null {
  switch (trigger.kind) {
    case "daily":
      return `${trigger.minute} ${trigger.hour} * * *`;
    case "hourly":
      return `${trigger.minute} * * * *`;
    case "weekly":
      return `${trigger.minute} ${trigger.hour} * * ${CRON_WEEKDAY[trigger.weekday]}`;
    case "monthly":
      return `${trigger.minute} ${trigger.hour} ${trigger.dayOfMonth} * *`;
    case "cron":
      return trigger.expression;
    case "interval":
      return null;
  }
}

function nextCronFire(expression: string, reference: Date, timezone: string): Date {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new ConfigError(
      `Invalid cron expression "${expression}": expected 5 fields, got ${fields.length}`,
    );
  }

  try {
    const interval = CronExpressionParser.parse(expression, {
      currentDate: reference,
      tz: timezone,
    });
    let next = interval.next().toDate();
    while (next.getTime() <= reference.getTime()) {
      next = interval.next().toDate();
    }
    return next;
  } catch (error) {
    throw new ConfigError(`Invalid cron expression "${expression}": ${errorMessage(error)}`);
  }
}

/**
 * Earliest fire time strictly after `reference`.
 *
 * Interval triggers count from `lastFiredAt` when there is one. If a run
 * overran and that slot is already behind `reference`, whole intervals are
 * skipped rather than queued.
 */
export function nextFireAfter(
  trigger: TriggerDefinition,
  reference: Date,
  timezone: string,
  lastFiredAt?: Date | null,
): Date {
  if (trigger.kind === "interval") {
    const step = trigger.seconds * 1000;
    const base = (lastFiredAt ?? reference).getTime();
    let next = base + step;
    if (next <= reference.getTime()) {
      next += (Math.floor((reference.getTime() - next) / step) + 1) * step;
    }
    const due = new Date(next);
    if (Number.isNaN(due.getTime())) {
      throw new ConfigError(`Interval of ${trigger.seconds} seconds is out of range`);
    }
    return due;
  }

  const expression = toCronExpression(trigger);
  if (expression === null) {
    throw new ConfigError(`Trigger kind "${trigger.kind}" has no calendar form`);
  }
  return nextCronFire(expression, reference, timezone);
}

export function isDue(
  trigger: TriggerDefinition,
  now: Date,
  lastFiredAt: Date | null,
  ctx: DueContext,
): boolean {
  const reference = lastFiredAt ?? ctx.since;
  return now.getTime() >= nextFireAfter(trigger, reference, ctx.timezone, lastFiredAt).getTime();
}

/** The next `count` fire times after `from`, assuming every one of them fires. */
export function upcomingFires(
  trigger: TriggerDefinition,
  from: Date,
  timezone: string,
  count: number,
): Date[] {
  const fires: Date[] = [];
  let reference = from;
  let lastFiredAt: Date | null = null;

  for (let i = 0; i < count; i++) {
    const next = nextFireAfter(trigger, reference, timezone, lastFiredAt);
    fires.push(next);
    reference = next;
    lastFiredAt = next;
  }

  return fires;
}

const pad = (n: number) => String(n).padStart(2, "0");

export function describeTrigger(trigger: TriggerDefinition): string {
  switch (trigger.kind) {
    case "daily":
      return `every day at ${pad(trigger.hour)}:${pad(trigger.minute)}`;
    case "hourly":
      return `every hour at minute ${pad(trigger.minute)}`;
    case "weekly":
      return `every ${trigger.weekday} at ${pad(trigger.hour)}:${pad(trigger.minute)}`;
    case "monthly":
      return `day ${trigger.dayOfMonth} of every month at ${pad(trigger.hour)}:${pad(trigger.minute)}`;
    case "interval":
      return `every ${trigger.seconds} seconds`;
    case "cron":
      return `cron "${trigger.expression}"`;
  }
}

/** Wall-clock rendering in the given zone, e.g. "2026-10-19 18:00:00". */
export function formatWallClock(date: Date, timezone: string): string {
  return date.toLocaleString("sv-SE", { timeZone: timezone, hour12: false });
}
