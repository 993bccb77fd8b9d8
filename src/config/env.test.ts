import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, loadEnvConfig, readConfigFile, validateConfig } from "./env.ts";
import { ConfigError } from "../cron/errors.ts";
import { DEFAULT_BASE_URL } from "../workflow/client.ts";

describe("loadEnvConfig", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.COZE_API_TOKEN;
    delete process.env.COZE_WORKFLOW_ID;
    delete process.env.SCHEDULE_CONFIG;
    delete process.env.SCHEDULE_TIMEZONE;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("reads process.env by default", () => {
    process.env.COZE_API_TOKEN = "test-secret";
    process.env.COZE_WORKFLOW_ID = "wf-1";
    process.env.SCHEDULE_CONFIG = "hourly:15";

    const config = loadEnvConfig();

    expect(config.api.token).toBe("test-secret");
    expect(config.workflow.workflowId).toBe("wf-1");
    expect(config.schedule.descriptor).toBe("hourly:15");
  });

  it("applies defaults when env vars are not set", () => {
    const config = loadEnvConfig({});

    expect(config.api.token).toBeUndefined();
    expect(config.api.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.workflow.workflowId).toBeUndefined();
    expect(config.workflow.parameters).toBeUndefined();
    expect(config.schedule).toEqual({
      descriptor: "daily:18:00",
      timezone: "UTC",
      enabled: true,
      runOnStart: false,
      pollIntervalSeconds: 30,
    });
    expect(config.retry).toEqual({ maxRetries: 3, retryDelaySeconds: 60, timeoutSeconds: 1800 });
    expect(config.http).toEqual({ enabled: true, port: 8080 });
    expect(config.logLevel).toBe("info");
  });

  it("reads every variable", () => {
    const config = loadEnvConfig({
      COZE_API_TOKEN: "test-secret",
      COZE_WORKFLOW_ID: "wf-1",
      COZE_BASE_URL: "http://localhost:9999",
      WORKFLOW_PARAMETERS: '{"city":"Paris","days":3}',
      SCHEDULE_CONFIG: "weekly:monday:09:00",
      SCHEDULE_TIMEZONE: "Asia/Shanghai",
      SCHEDULE_ENABLED: "false",
      RUN_ON_START: "yes",
      MAX_RETRIES: "5",
      RETRY_DELAY: "10",
      TIMEOUT_SECONDS: "120",
      POLL_INTERVAL_SECONDS: "15",
      PORT: "9090",
      HTTP_ENABLED: "off",
      LOG_LEVEL: "DEBUG",
    });

    expect(config).toEqual({
      api: { token: "test-secret", baseUrl: "http://localhost:9999" },
      workflow: { workflowId: "wf-1", parameters: { city: "Paris", days: 3 } },
      schedule: {
        descriptor: "weekly:monday:09:00",
        timezone: "Asia/Shanghai",
        enabled: false,
        runOnStart: true,
        pollIntervalSeconds: 15,
      },
      retry: { maxRetries: 5, retryDelaySeconds: 10, timeoutSeconds: 120 },
      http: { enabled: false, port: 9090 },
      logLevel: "debug",
    });
  });

  it("treats TIMEOUT_SECONDS=0 as no timeout", () => {
    expect(loadEnvConfig({ TIMEOUT_SECONDS: "0" }).retry.timeoutSeconds).toBeUndefined();
  });

  it("ignores empty values", () => {
    const config = loadEnvConfig({ SCHEDULE_CONFIG: "", MAX_RETRIES: "" });
    expect(config.schedule.descriptor).toBe("daily:18:00");
    expect(config.retry.maxRetries).toBe(3);
  });

  it("rejects non-numeric numbers", () => {
    expect(() => loadEnvConfig({ MAX_RETRIES: "abc" })).toThrow(ConfigError);
    expect(() => loadEnvConfig({ MAX_RETRIES: "abc" })).toThrow(/^Invalid configuration: retry\.maxRetries: /);
  });

  it("rejects a poll interval outside 1-59 seconds", () => {
    expect(() => loadEnvConfig({ POLL_INTERVAL_SECONDS: "60" })).toThrow(
      /^Invalid configuration: schedule\.pollIntervalSeconds: /,
    );
  });

  it("rejects durations longer than the longest timer delay", () => {
    expect(loadEnvConfig({ TIMEOUT_SECONDS: "2147483" }).retry.timeoutSeconds).toBe(2_147_483);
    expect(() => loadEnvConfig({ TIMEOUT_SECONDS: "3000000" })).toThrow(
      /^Invalid configuration: retry\.timeoutSeconds: /,
    );
    expect(() => loadEnvConfig({ RETRY_DELAY: "3000000" })).toThrow(
      /^Invalid configuration: retry\.retryDelaySeconds: /,
    );
  });

  it("rejects unrecognised booleans", () => {
    expect(() => loadEnvConfig({ SCHEDULE_ENABLED: "maybe" })).toThrow(
      /^Invalid configuration: schedule\.enabled: /,
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadEnvConfig({ LOG_LEVEL: "verbose" })).toThrow(/^Invalid configuration: logLevel: /);
  });

  it("requires WORKFLOW_PARAMETERS to be a JSON object", () => {
    expect(() => loadEnvConfig({ WORKFLOW_PARAMETERS: "[1,2]" })).toThrow(
      "WORKFLOW_PARAMETERS must be a JSON object",
    );
    expect(() => loadEnvConfig({ WORKFLOW_PARAMETERS: "{not json" })).toThrow(
      "WORKFLOW_PARAMETERS must be a JSON object",
    );
  });
});

describe("loadConfig with a config file", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "workflow-cron-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, content);
    return file;
  }

  it("layers environment variables over the file", () => {
    const configPath = writeConfig(
      JSON.stringify({
        schedule: { descriptor: "hourly:15", timezone: "Europe/Berlin" },
        workflow: { workflowId: "wf-file" },
        retry: { maxRetries: 1 },
        http: { port: 3000, enabled: false },
        logLevel: "warn",
      }),
    );

    const config = loadConfig({ configPath, env: { SCHEDULE_TIMEZONE: "UTC", PORT: "4000" } });

    expect(config.schedule.descriptor).toBe("hourly:15");
    expect(config.schedule.timezone).toBe("UTC");
    expect(config.workflow.workflowId).toBe("wf-file");
    expect(config.retry.maxRetries).toBe(1);
    expect(config.retry.retryDelaySeconds).toBe(60);
    expect(config.http).toEqual({ enabled: false, port: 4000 });
    expect(config.logLevel).toBe("warn");
  });

  it("reports a missing file", () => {
    const missing = path.join(dir, "missing.json");
    expect(() => readConfigFile(missing)).toThrow(`Config file not found: ${missing}`);
  });

  it("reports invalid JSON", () => {
    const configPath = writeConfig("{ nope");
    expect(() => readConfigFile(configPath)).toThrow(`Config file ${configPath} is not valid JSON`);
  });

  it("requires a JSON object", () => {
    const configPath = writeConfig("[]");
    expect(() => readConfigFile(configPath)).toThrow(`Config file ${configPath} must contain a JSON object`);
  });
});

describe("validateConfig", () => {
  it("returns no errors for a complete config", () => {
    const config = loadEnvConfig({ COZE_API_TOKEN: "test-secret", COZE_WORKFLOW_ID: "wf-1" });
    expect(validateConfig(config)).toEqual([]);
  });

  it("returns errors for missing token and workflow id", () => {
    expect(validateConfig(loadEnvConfig({}))).toEqual([
      "COZE_API_TOKEN is required. Set it to your workflow API token.",
      "COZE_WORKFLOW_ID is required. Set it to the id of the workflow to run.",
    ]);
  });
});
