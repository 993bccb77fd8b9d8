import type { Command } from "commander";
import chalk from "chalk";
import { validateConfig } from "../config/env.ts";
import {
  assertTimezone,
  describeTrigger,
  formatSchedule,
  formatWallClock,
  nextFireAfter,
  parseSchedule,
} from "../cron/index.ts";
import { exitWithError, loadCliConfig } from "./config.ts";

function maskToken(token: string | undefined): string {
  if (!token) return chalk.red("(not set)");
  return token.length <= 8 ? "****" : `${token.slice(0, 4)}...${token.slice(-4)}`;
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show the resolved configuration and the next run time")
    .option("-c, --config <path>", "JSON config file (environment variables override it)")
    .option("--json", "Print as JSON")
    .action((options: { config?: string; json?: boolean }) => {
      try {
        const cfg = loadCliConfig(options);
        const trigger = parseSchedule(cfg.schedule.descriptor);
        assertTimezone(cfg.schedule.timezone);
        const nextRun = cfg.schedule.enabled
          ? nextFireAfter(trigger, new Date(), cfg.schedule.timezone)
          : null;
        const problems = validateConfig(cfg);

        if (options.json) {
          console.log(
            JSON.stringify(
              {
                workflowId: cfg.workflow.workflowId ?? null,
                baseUrl: cfg.api.baseUrl,
                tokenSet: Boolean(cfg.api.token),
                schedule: formatSchedule(trigger),
                description: describeTrigger(trigger),
                timezone: cfg.schedule.timezone,
                scheduleEnabled: cfg.schedule.enabled,
                nextRun: nextRun?.toISOString() ?? null,
                retry: cfg.retry,
                http: cfg.http,
                problems,
              },
              null,
              2,
            ),
          );
          return;
        }

        console.log(chalk.bold("\nWorkflow\n"));
        console.log(`  ${chalk.dim("Workflow ID:".padEnd(16))}${cfg.workflow.workflowId ?? chalk.red("(not set)")}`);
        console.log(`  ${chalk.dim("API token:".padEnd(16))}${maskToken(cfg.api.token)}`);
        console.log(`  ${chalk.dim("Base URL:".padEnd(16))}${cfg.api.baseUrl}`);

        console.log(chalk.bold("\nSchedule\n"));
        console.log(`  ${chalk.dim("Descriptor:".padEnd(16))}${chalk.cyan(formatSchedule(trigger))}`);
        console.log(`  ${chalk.dim("Meaning:".padEnd(16))}${describeTrigger(trigger)}`);
        console.log(`  ${chalk.dim("Timezone:".padEnd(16))}${cfg.schedule.timezone}`);
        if (nextRun) {
          console.log(
            `  ${chalk.dim("Next run:".padEnd(16))}${formatWallClock(nextRun, cfg.schedule.timezone)} ${chalk.dim(`(${nextRun.toISOString()})`)}`,
          );
        } else {
          console.log(`  ${chalk.dim("Next run:".padEnd(16))}${chalk.yellow("disabled")}`);
        }

        const { retry } = cfg;
        console.log(chalk.bold("\nRetry\n"));
        console.log(`  ${chalk.dim("Max retries:".padEnd(16))}${retry.maxRetries}`);
        console.log(`  ${chalk.dim("Delay:".padEnd(16))}${retry.retryDelaySeconds}s`);
        console.log(
          `  ${chalk.dim("Timeout:".padEnd(16))}${retry.timeoutSeconds !== undefined ? `${retry.timeoutSeconds}s` : "none"}`,
        );

        console.log(chalk.bold("\nHealth server\n"));
        console.log(
          `  ${chalk.dim("HTTP:".padEnd(16))}${cfg.http.enabled ? chalk.green(`port ${cfg.http.port}`) : chalk.yellow("disabled")}`,
        );

        if (problems.length > 0) {
          console.log();
          for (const problem of problems) {
            console.log(chalk.yellow(`  ! ${problem}`));
          }
        }
        console.log();
      } catch (err) {
        exitWithError(err);
      }
    });
}
