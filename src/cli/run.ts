import type { Command } from "commander";
import chalk from "chalk";
import { Gateway } from "../daemon/gateway.ts";
import { exitWithError, loadCliConfig } from "./config.ts";

interface RunOptions {
  config?: string;
  http: boolean;
  schedule: boolean;
  runOnStart?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Start the scheduler loop and health server (foreground)")
    .option("-c, --config <path>", "JSON config file (environment variables override it)")
    .option("--no-http", "Don't start the health server")
    .option("--no-schedule", "Don't start the scheduler loop")
    .option("--run-on-start", "Run the workflow once immediately after start")
    .action(async (options: RunOptions) => {
      try {
        const cfg = loadCliConfig(options);
        if (options.runOnStart) cfg.schedule.runOnStart = true;
        const gateway = new Gateway(cfg, {
          skipHttp: !options.http,
          skipSchedule: !options.schedule,
        });
        await gateway.start();
      } catch (err) {
        exitWithError(err);
      }
      console.log(chalk.dim("Press Ctrl+C to stop"));
    });
}
