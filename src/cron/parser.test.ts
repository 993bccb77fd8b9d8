import { describe, expect, it } from "vitest";
import { formatSchedule, parseSchedule } from "./parser.ts";
import { ConfigError } from "./errors.ts";

describe("parseSchedule", () => {
  it("parses daily", () => {
    expect(parseSchedule("daily:18:00")).toEqual({ kind: "daily", hour: 18, minute: 0 });
  });

  it("parses hourly", () => {
    expect(parseSchedule("hourly:30")).toEqual({ kind: "hourly", minute: 30 });
  });

  it("parses weekly with a case-insensitive weekday", () => {
    expect(parseSchedule("weekly:Monday:18:00")).toEqual({
      kind: "weekly",
      weekday: "monday",
      hour: 18,
      minute: 0,
    });
  });

  it("parses monthly", () => {
    expect(parseSchedule("monthly:1:18:00")).toEqual({
      kind: "monthly",
      dayOfMonth: 1,
      hour: 18,
      minute: 0,
    });
  });

  it("parses interval", () => {
    expect(parseSchedule("interval:3600")).toEqual({ kind: "interval", seconds: 3600 });
  });

  it("keeps the cron expression verbatim apart from outer whitespace", () => {
    expect(parseSchedule("cron: 0 18 * * 1-5 ")).toEqual({
      kind: "cron",
      expression: "0 18 * * 1-5",
    });
  });

  it("accepts an upper-case kind", () => {
    expect(parseSchedule("DAILY:09:05")).toEqual({ kind: "daily", hour: 9, minute: 5 });
  });

  it("rejects an empty descriptor", () => {
    expect(() => parseSchedule("")).toThrow("Schedule descriptor is empty");
  });

  it("rejects an unknown kind", () => {
    expect(() => parseSchedule("yearly:01:01")).toThrow(
      'Unknown schedule kind "yearly". Expected one of: daily, cron, interval, hourly, weekly, monthly',
    );
  });

  it("rejects the wrong number of fields", () => {
    expect(() => parseSchedule("daily:18")).toThrow(
      "Invalid daily schedule. Expected format: daily:HH:MM",
    );
    expect(() => parseSchedule("weekly:monday:18")).toThrow(
      "Invalid weekly schedule. Expected format: weekly:<day>:HH:MM",
    );
  });

  it("rejects out-of-range values instead of clamping", () => {
    expect(() => parseSchedule("daily:25:00")).toThrow("Invalid hour 25: must be between 0 and 23");
    expect(() => parseSchedule("hourly:60")).toThrow("Invalid minute 60: must be between 0 and 59");
    expect(() => parseSchedule("monthly:32:18:00")).toThrow(
      "Invalid day of month 32: must be between 1 and 31",
    );
    expect(() => parseSchedule("monthly:0:18:00")).toThrow(
      "Invalid day of month 0: must be between 1 and 31",
    );
  });

  it("rejects non-numeric fields", () => {
    expect(() => parseSchedule("daily:six:00")).toThrow('Invalid hour "six": expected an integer');
    expect(() => parseSchedule("daily:-1:00")).toThrow('Invalid hour "-1": expected an integer');
  });

  it("rejects an unknown weekday", () => {
    expect(() => parseSchedule("weekly:funday:18:00")).toThrow('Invalid weekday "funday"');
  });

  it("rejects intervals under a minute", () => {
    expect(() => parseSchedule("interval:59")).toThrow(
      "Interval must be at least 60 seconds, got 59",
    );
  });

  it("rejects intervals longer than a year", () => {
    expect(parseSchedule("interval:31536000")).toEqual({ kind: "interval", seconds: 31_536_000 });
    expect(() => parseSchedule("interval:31536001")).toThrow(
      "Interval must be at most 31536000 seconds, got 31536001",
    );
    expect(() => parseSchedule("interval:9000000000000")).toThrow(ConfigError);
  });

  it("rejects an empty cron expression", () => {
    expect(() => parseSchedule("cron:   ")).toThrow(
      "Invalid cron schedule. Expected format: cron:<expression>",
    );
  });

  it("throws ConfigError", () => {
    expect(() => parseSchedule("bogus")).toThrow(ConfigError);
  });
});

describe("formatSchedule", () => {
  it("renders canonical descriptors", () => {
    expect(formatSchedule({ kind: "daily", hour: 9, minute: 5 })).toBe("daily:09:05");
    expect(formatSchedule({ kind: "hourly", minute: 0 })).toBe("hourly:00");
    expect(formatSchedule({ kind: "weekly", weekday: "friday", hour: 7, minute: 30 })).toBe(
      "weekly:friday:07:30",
    );
    expect(formatSchedule({ kind: "monthly", dayOfMonth: 15, hour: 9, minute: 0 })).toBe(
      "monthly:15:09:00",
    );
    expect(formatSchedule({ kind: "interval", seconds: 90 })).toBe("interval:90");
    expect(formatSchedule({ kind: "cron", expression: "*/5 * * * *" })).toBe("cron:*/5 * * * *");
  });

  it("parses back to the same trigger", () => {
    for (const descriptor of ["daily:7:5", "weekly:SUNDAY:23:59", "monthly:31:00:00"]) {
      const trigger = parseSchedule(descriptor);
      expect(parseSchedule(formatSchedule(trigger))).toEqual(trigger);
    }
  });
});
