import type { Command } from "commander";
import chalk from "chalk";
import {
  assertTimezone,
  describeTrigger,
  formatWallClock,
  parseSchedule,
  upcomingFires,
} from "../cron/index.ts";
import { exitWithError } from "./config.ts";

export function registerNextCommand(program: Command): void {
  program
    .command("next <descriptor>")
    .description('Preview upcoming run times for a schedule, e.g. "weekly:monday:09:00"')
    .option("-n, --count <count>", "Number of run times to show", "5")
    .option("--tz <zone>", "IANA timezone", process.env.SCHEDULE_TIMEZONE || "UTC")
    .action((descriptor: string, options: { count: string; tz: string }) => {
      const count = Number(options.count);
      if (!Number.isInteger(count) || count < 1) {
        console.error(chalk.red(`--count must be a positive integer, got "${options.count}"`));
        process.exit(1);
      }

      try {
        const trigger = parseSchedule(descriptor);
        assertTimezone(options.tz);
        const fires = upcomingFires(trigger, new Date(), options.tz, count);

        console.log(chalk.bold(`\n${describeTrigger(trigger)} (${options.tz})\n`));
        for (const fire of fires) {
          console.log(`  ${chalk.cyan(formatWallClock(fire, options.tz))}  ${chalk.dim(fire.toISOString())}`);
        }
        console.log();
      } catch (err) {
        exitWithError(err);
      }
    });
}
