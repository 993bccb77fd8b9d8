/**
 * Schedule descriptor parsing.
 *
 * Supported forms:
 *   daily:HH:MM            every day at HH:MM
 *   hourly:MM              every hour at minute MM
 *   weekly:<day>:HH:MM     e.g. weekly:monday:18:00
 *   monthly:<day>:HH:MM    e.g. monthly:15:09:00
 *   interval:<seconds>     at least 60
 *   cron:<expression>      standard 5-field cron
 */

import { ConfigError } from "./errors.ts";
import type { TriggerDefinition, TriggerKind, Weekday } from "./types.ts";

export const WEEKDAYS: readonly Weekday[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];

export const MIN_INTERVAL_SECONDS = 60;
/** One year */
export const MAX_INTERVAL_SECONDS = 31_536_000;

const FORMATS: Record<TriggerKind, string> = {
  daily: "daily:HH:MM",
  cron: "cron:<expression>",
  interval: "interval:<seconds>",
  hourly: "hourly:MM",
  weekly: "weekly:<day>:HH:MM",
  monthly: "monthly:<day>:HH:MM",
};

function isTriggerKind(value: string): value is TriggerKind {
  return Object.hasOwn(FORMATS, value);
}

function isWeekday(value: string): value is Weekday {
  return (WEEKDAYS as readonly string[]).includes(value);
}

function parseField(raw: string, label: string, min: number, max: number): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`Invalid ${label} "${raw}": expected an integer`);
  }
  const value = Number.parseInt(trimmed, 10);
  if (value < min || value > max) {
    throw new ConfigError(`Invalid ${label} ${value}: must be between ${min} and ${max}`);
  }
  return value;
}

function expectParts(kind: TriggerKind, parts: string[], count: number): void {
  if (parts.length !== count) {
    throw new ConfigError(`Invalid ${kind} schedule. Expected format: ${FORMATS[kind]}`);
  }
}

/**
 * Parse a schedule descriptor into a trigger definition.
 * Throws ConfigError on anything malformed; values are never clamped.
 */
export function parseSchedule(descriptor: string): TriggerDefinition {
  const separator = descriptor.indexOf(":");
  const rawKind = separator === -1 ? descriptor : descriptor.slice(0, separator);
  const kind = rawKind.trim().toLowerCase();
  const rest = separator === -1 ? "" : descriptor.slice(separator + 1);

  if (!kind) {
    throw new ConfigError("Schedule descriptor is empty");
  }
  if (!isTriggerKind(kind)) {
    throw new ConfigError(
      `Unknown schedule kind "${rawKind.trim()}". Expected one of: ${Object.keys(FORMATS).join(", ")}`,
    );
  }

  const parts = rest === "" ? [] : rest.split(":");

  switch (kind) {
    case "daily": {
      expectParts(kind, parts, 2);
      return {
        kind,
        hour: parseField(parts[0], "hour", 0, 23),
        minute: parseField(parts[1], "minute", 0, 59),
      };
    }

    case "hourly": {
      expectParts(kind, parts, 1);
      return { kind, minute: parseField(parts[0], "minute", 0, 59) };
    }

    case "weekly": {
      expectParts(kind, parts, 3);
      const weekday = parts[0].trim().toLowerCase();
      if (!isWeekday(weekday)) {
        throw new ConfigError(`Invalid weekday "${parts[0]}". Must be one of: ${WEEKDAYS.join(", ")}`);
      }
      return {
        kind,
        weekday,
        hour: parseField(parts[1], "hour", 0, 23),
        minute: parseField(parts[2], "minute", 0, 59),
      };
    }

    case "monthly": {
      expectParts(kind, parts, 3);
      return {
        kind,
        dayOfMonth: parseField(parts[0], "day of month", 1, 31),
        hour: parseField(parts[1], "hour", 0, 23),
        minute: parseField(parts[2], "minute", 0, 59),
      };
    }

    case "interval": {
      expectParts(kind, parts, 1);
      const seconds = parseField(parts[0], "interval", 0, Number.MAX_SAFE_INTEGER);
      if (seconds < MIN_INTERVAL_SECONDS) {
        throw new ConfigError(
          `Interval must be at least ${MIN_INTERVAL_SECONDS} seconds, got ${seconds}`,
        );
      }
      if (seconds > MAX_INTERVAL_SECONDS) {
        throw new ConfigError(
          `Interval must be at most ${MAX_INTERVAL_SECONDS} seconds, got ${seconds}`,
        );
      }
      return { kind, seconds };
    }

    case "cron": {
      const expression = rest.trim();
      if (!expression) {
        throw new ConfigError(`Invalid cron schedule. Expected format: ${FORMATS.cron}`);
      }
      return { kind, expression };
    }
  }
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Render a trigger back into its canonical descriptor. */
export function formatSchedule(trigger: TriggerDefinition): string {
  switch (trigger.kind) {
    case "daily":
      return `daily:${pad(trigger.hour)}:${pad(trigger.minute)}`;
    case "hourly":
      return `hourly:${pad(trigger.minute)}`;
    case "weekly":
      return `weekly:${trigger.weekday}:${pad(trigger.hour)}:${pad(trigger.minute)}`;
    case "monthly":
      return `monthly:${trigger.dayOfMonth}:${pad(trigger.hour)}:${pad(trigger.minute)}`;
    case "interval":
      return `interval:${trigger.seconds}`;
    case "cron":
      return `cron:${trigger.expression}`;
  }
}
