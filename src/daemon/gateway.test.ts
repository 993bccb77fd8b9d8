import { describe, expect, it } from "vitest";
import { Gateway } from "./gateway.ts";
import { memoryLogger } from "./logger.ts";
import { createWorkflowScheduler } from "../cron/index.ts";
import { loadEnvConfig } from "../config/env.ts";

function setup(env: Record<string, string> = {}) {
  const config = loadEnvConfig({
    COZE_API_TOKEN: "test-secret",
    COZE_WORKFLOW_ID: "wf-1",
    SCHEDULE_CONFIG: "interval:3600",
    ...env,
  });
  const scheduler = createWorkflowScheduler(config, {
    logger: memoryLogger(),
    client: { runWorkflow: async () => ({ success: true, output: null }) },
  });
  const logger = memoryLogger();
  const gateway = new Gateway(config, { skipHttp: true, skipSignals: true, logger }, scheduler);
  return { gateway, scheduler, logger };
}

describe("Gateway", () => {
  it("starts the scheduler loop and stops it", async () => {
    const { gateway, scheduler, logger } = setup();

    await gateway.start();
    expect(scheduler.snapshot().phase).toBe("waiting");
    expect(scheduler.snapshot().nextDueAt).not.toBeNull();

    await gateway.stop();
    expect(scheduler.snapshot().phase).toBe("stopped");
    expect(logger.lines).toContain("info   Schedule: interval:3600 (UTC)");
    expect(logger.lines.at(-1)).toBe("info Stopped");
  });

  it("serves status only when the schedule is disabled", async () => {
    const { gateway, scheduler, logger } = setup({ SCHEDULE_ENABLED: "false" });

    await gateway.start();
    expect(scheduler.snapshot().phase).toBe("idle");
    expect(logger.lines).toContain("info Schedule disabled; serving status only");

    await gateway.stop();
    expect(scheduler.snapshot().phase).toBe("stopped");
  });
});
