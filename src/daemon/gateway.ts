/**
 * Gateway: main service orchestrator.
 *
 * Boots the scheduler loop and the health server, and stops them in reverse
 * order on shutdown.
 */

import { createWorkflowScheduler, formatSchedule, parseSchedule } from "../cron/index.ts";
import type { WorkflowScheduler } from "../cron/scheduler.ts";
import type { AppConfig } from "../config/env.ts";
import type { WorkflowRunResult } from "../workflow/client.ts";
import { HealthServer } from "./health-server.ts";
import { installSignalHandlers } from "./lifecycle.ts";
import { consoleLogger, type Logger } from "./logger.ts";

export interface GatewayOptions {
  /** Skip the health server */
  skipHttp?: boolean;
  /** Build the scheduler but never start its loop */
  skipSchedule?: boolean;
  /** Don't install process signal handlers (tests, embedding) */
  skipSignals?: boolean;
  logger?: Logger;
}

export class Gateway {
  readonly scheduler: WorkflowScheduler<WorkflowRunResult>;
  private healthServer: HealthServer | null = null;
  private readonly logger: Logger;
  private readonly scheduleEnabled: boolean;

  constructor(
    private readonly config: AppConfig,
    private readonly options: GatewayOptions = {},
    scheduler?: WorkflowScheduler<WorkflowRunResult>,
  ) {
    this.logger = options.logger ?? consoleLogger("gateway");
    this.scheduler = scheduler ?? createWorkflowScheduler(config);
    this.scheduleEnabled = config.schedule.enabled && !options.skipSchedule;

    if (config.http.enabled && !options.skipHttp) {
      this.healthServer = new HealthServer(
        this.scheduler,
        {
          schedule: formatSchedule(parseSchedule(config.schedule.descriptor)),
          timezone: config.schedule.timezone,
          workflowId: config.workflow.workflowId,
          retry: config.retry,
          scheduleEnabled: this.scheduleEnabled,
        },
        config.http.port,
      );
    }
  }

  /** Start the service. Resolves once the loop and server are up. */
  async start(): Promise<void> {
    this.logger.info("Starting...");

    if (!this.options.skipSignals) {
      installSignalHandlers(() => this.stop());
    }

    // Validates the schedule; a bad cron expression fails here, before anything listens
    if (this.scheduleEnabled) {
      this.scheduler.prepare();
    }

    if (this.healthServer) {
      await this.healthServer.start();
    }

    if (this.scheduleEnabled) {
      this.scheduler.start();
    } else {
      this.logger.info("Schedule disabled; serving status only");
    }

    const { retry } = this.config;
    this.logger.info("Service is running");
    this.logger.info(`  Workflow: ${this.config.workflow.workflowId ?? "(unset)"}`);
    this.logger.info(`  Schedule: ${this.config.schedule.descriptor} (${this.config.schedule.timezone})`);
    this.logger.info(
      `  Retries: ${retry.maxRetries} x ${retry.retryDelaySeconds}s, timeout ${retry.timeoutSeconds ?? "none"}${retry.timeoutSeconds ? "s" : ""}`,
    );
  }

  /** Stop the service gracefully; a run in progress finishes first. */
  async stop(): Promise<void> {
    this.logger.info("Stopping...");

    await this.scheduler.stop();
    if (this.healthServer) {
      await this.healthServer.stop();
    }

    this.logger.info("Stopped");
  }
}
