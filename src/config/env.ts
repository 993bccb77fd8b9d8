import fs from "node:fs";
import process from "node:process";
import { z } from "zod/v4";
import { ConfigError } from "../cron/errors.ts";
import { MAX_TIMER_SECONDS } from "../cron/retry.ts";
import type { RetryPolicy } from "../cron/types.ts";
import type { LogLevel } from "../daemon/logger.ts";
import { DEFAULT_BASE_URL } from "../workflow/client.ts";

export interface AppConfig {
  api: {
    /** Bearer token for the workflow API */
    token?: string;
    baseUrl: string;
  };
  workflow: {
    workflowId?: string;
    /** Passed through to the workflow as-is */
    parameters?: Record<string, unknown>;
  };
  schedule: {
    /** Schedule descriptor, e.g. "daily:18:00" */
    descriptor: string;
    timezone: string;
    enabled: boolean;
    /** Fire once right after the loop starts */
    runOnStart: boolean;
    pollIntervalSeconds: number;
  };
  retry: RetryPolicy;
  http: {
    enabled: boolean;
    port: number;
  };
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const booleanish = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  return value;
}, z.boolean());

const ConfigSchema = z.object({
  api: z.object({
    token: z.string().min(1).optional(),
    baseUrl: z.url().default(DEFAULT_BASE_URL),
  }),
  workflow: z.object({
    workflowId: z.string().min(1).optional(),
    parameters: z.record(z.string(), z.unknown()).optional(),
  }),
  schedule: z.object({
    descriptor: z.string().min(1).default("daily:18:00"),
    timezone: z.string().min(1).default("UTC"),
    enabled: booleanish.default(true),
    runOnStart: booleanish.default(false),
    pollIntervalSeconds: z.coerce.number().int().min(1).max(59).default(30),
  }),
  retry: z.object({
    maxRetries: z.coerce.number().int().min(0).default(3),
    retryDelaySeconds: z.coerce.number().min(0).max(MAX_TIMER_SECONDS).default(60),
    timeoutSeconds: z.coerce.number().min(0).max(MAX_TIMER_SECONDS).default(1800),
  }),
  http: z.object({
    enabled: booleanish.default(true),
    port: z.coerce.number().int().min(0).max(65535).default(8080),
  }),
  logLevel: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["debug", "info", "warn", "error"]),
  ).default("info"),
});

type RawSection = Record<string, unknown>;
type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseParameters(raw: string | undefined): Record<string, unknown> | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError("WORKFLOW_PARAMETERS must be a JSON object");
  }
  if (!isRecord(parsed)) {
    throw new ConfigError("WORKFLOW_PARAMETERS must be a JSON object");
  }
  return parsed;
}

function fromEnv(env: Env): RawConfig {
  return {
    api: { token: env.COZE_API_TOKEN, baseUrl: env.COZE_BASE_URL },
    workflow: {
      workflowId: env.COZE_WORKFLOW_ID,
      parameters: parseParameters(env.WORKFLOW_PARAMETERS),
    },
    schedule: {
      descriptor: env.SCHEDULE_CONFIG,
      timezone: env.SCHEDULE_TIMEZONE,
      enabled: env.SCHEDULE_ENABLED,
      runOnStart: env.RUN_ON_START,
      pollIntervalSeconds: env.POLL_INTERVAL_SECONDS,
    },
    retry: {
      maxRetries: env.MAX_RETRIES,
      retryDelaySeconds: env.RETRY_DELAY,
      timeoutSeconds: env.TIMEOUT_SECONDS,
    },
    http: { enabled: env.HTTP_ENABLED, port: env.PORT },
    logLevel: env.LOG_LEVEL,
  };
}

/** Read a JSON config file. Missing file or bad JSON is a ConfigError. */
export function readConfigFile(configPath: string): RawConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf-8");
  } catch {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/** Layer `over` onto `base` one section deep, ignoring undefined and empty values. */
function mergeRaw(base: RawConfig, over: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(over)) {
    if (value === undefined || value === "") continue;
    const current = merged[key];
    if (isRecord(value) && isRecord(current)) {
      const section: RawSection = { ...current };
      for (const [field, fieldValue] of Object.entries(value)) {
        if (fieldValue !== undefined && fieldValue !== "") section[field] = fieldValue;
      }
      merged[key] = section;
    } else if (isRecord(value)) {
      merged[key] = mergeRaw({}, value);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

const EMPTY_SECTIONS: RawConfig = {
  api: {},
  workflow: {},
  schedule: {},
  retry: {},
  http: {},
};

export interface LoadConfigOptions {
  /** Optional JSON file; environment variables override its values */
  configPath?: string;
  env?: Env;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const file = options.configPath ? readConfigFile(options.configPath) : {};
  const raw = mergeRaw(mergeRaw(EMPTY_SECTIONS, file), fromEnv(env));

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const cfg = result.data;
  return {
    api: cfg.api,
    workflow: cfg.workflow,
    schedule: cfg.schedule,
    retry: {
      maxRetries: cfg.retry.maxRetries,
      retryDelaySeconds: cfg.retry.retryDelaySeconds,
      timeoutSeconds: cfg.retry.timeoutSeconds > 0 ? cfg.retry.timeoutSeconds : undefined,
    },
    http: cfg.http,
    logLevel: cfg.logLevel,
  };
}

export function loadEnvConfig(env: Env = process.env): AppConfig {
  return loadConfig({ env });
}

/** Settings that are optional to load but required to invoke a workflow. */
export function validateConfig(cfg: AppConfig): string[] {
  const errors: string[] = [];

  if (!cfg.api.token) {
    errors.push("COZE_API_TOKEN is required. Set it to your workflow API token.");
  }
  if (!cfg.workflow.workflowId) {
    errors.push("COZE_WORKFLOW_ID is required. Set it to the id of the workflow to run.");
  }

  return errors;
}
