import { ConfigError, InvocationError } from "./errors.ts";
import { parseSchedule } from "./parser.ts";
import { assertTimezone } from "./trigger.ts";
import { validateRetryPolicy } from "./retry.ts";
import { WorkflowScheduler, type WorkflowSchedulerOptions } from "./scheduler.ts";
import type { WorkflowTask } from "./types.ts";
import type { AppConfig } from "../config/env.ts";
import { WorkflowClient, type WorkflowRunResult } from "../workflow/client.ts";
import { consoleLogger } from "../daemon/logger.ts";

export * from "./types.ts";
export * from "./errors.ts";
export * from "./parser.ts";
export * from "./trigger.ts";
export * from "./retry.ts";
export * from "./state.ts";
export * from "./scheduler.ts";

type SchedulerOverrides = Partial<
  Pick<WorkflowSchedulerOptions<WorkflowRunResult>, "logger" | "now" | "sleep" | "retrySleep" | "onRun">
>;

/**
 * Wrap a workflow client call as a retryable task: `success: false` becomes
 * an InvocationError so the retry executor counts it as a failed attempt.
 */
export function createWorkflowTask(
  client: Pick<WorkflowClient, "runWorkflow">,
  workflowId: string,
  parameters?: Record<string, unknown>,
): WorkflowTask<WorkflowRunResult> {
  const logger = consoleLogger("workflow");

  return async (signal, attempt) => {
    const result = await client.runWorkflow({ workflowId, parameters }, signal);
    if (!result.success) {
      throw new InvocationError(result.error ?? "Workflow run failed");
    }
    logger.info(
      `Workflow ${workflowId} completed on attempt ${attempt}${result.debugUrl ? ` (${result.debugUrl})` : ""}`,
    );
    logger.debug(`Workflow output: ${JSON.stringify(result.output)}`);
    return result;
  };
}

/**
 * Build a scheduler for the configured workflow. Throws ConfigError for a bad
 * descriptor, timezone or retry policy, or missing credentials.
 */
export function createWorkflowScheduler(
  cfg: AppConfig,
  overrides: SchedulerOverrides & { client?: Pick<WorkflowClient, "runWorkflow"> } = {},
): WorkflowScheduler<WorkflowRunResult> {
  const trigger = parseSchedule(cfg.schedule.descriptor);
  assertTimezone(cfg.schedule.timezone);

  const policyErrors = validateRetryPolicy(cfg.retry);
  if (policyErrors.length > 0) {
    throw new ConfigError(`Invalid retry policy: ${policyErrors.join("; ")}`);
  }

  const { workflowId } = cfg.workflow;
  if (!workflowId) {
    throw new ConfigError("COZE_WORKFLOW_ID must be set to run a workflow");
  }

  let client = overrides.client;
  if (!client) {
    if (!cfg.api.token) {
      throw new ConfigError("COZE_API_TOKEN must be set to run a workflow");
    }
    client = new WorkflowClient({ token: cfg.api.token, baseUrl: cfg.api.baseUrl });
  }

  return new WorkflowScheduler({
    trigger,
    timezone: cfg.schedule.timezone,
    policy: cfg.retry,
    task: createWorkflowTask(client, workflowId, cfg.workflow.parameters),
    pollIntervalMs: cfg.schedule.pollIntervalSeconds * 1000,
    runOnStart: cfg.schedule.runOnStart,
    label: `workflow ${workflowId}`,
    logger: overrides.logger,
    now: overrides.now,
    sleep: overrides.sleep,
    retrySleep: overrides.retrySleep,
    onRun: overrides.onRun,
  });
}
