import type { Command } from "commander";
import chalk from "chalk";
import { createWorkflowScheduler, type WorkflowScheduler } from "../cron/index.ts";
import type { WorkflowRunResult } from "../workflow/client.ts";
import { exitWithError, loadCliConfig } from "./config.ts";

export function registerOnceCommand(program: Command): void {
  program
    .command("once")
    .description("Run the workflow once now, with retries, then exit")
    .option("-c, --config <path>", "JSON config file (environment variables override it)")
    .action(async (options: { config?: string }) => {
      let scheduler: WorkflowScheduler<WorkflowRunResult>;
      try {
        scheduler = createWorkflowScheduler(loadCliConfig(options));
      } catch (err) {
        exitWithError(err);
      }

      const report = await scheduler.runOnce("manual");
      if (report?.outcome === "success") {
        console.log(chalk.green(`Workflow run succeeded (${report.attempts.length} attempt(s))`));
        if (report.output?.debugUrl) {
          console.log(chalk.dim(`  Debug: ${report.output.debugUrl}`));
        }
        return;
      }

      console.error(chalk.red(`Workflow run failed: ${report?.error ?? "not started"}`));
      process.exit(1);
    });
}
