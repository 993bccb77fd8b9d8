import chalk from "chalk";
import { loadConfig, type AppConfig } from "../config/env.ts";
import { ConfigError } from "../cron/errors.ts";
import { setLogLevel } from "../daemon/logger.ts";

export interface ConfigOptions {
  config?: string;
}

/** Load config for a CLI command and apply its log level. */
export function loadCliConfig(options: ConfigOptions): AppConfig {
  const cfg = loadConfig({ configPath: options.config });
  setLogLevel(cfg.logLevel);
  return cfg;
}

/** Print a start-up failure and exit. ConfigError gets a short message, anything else its stack. */
export function exitWithError(err: unknown): never {
  if (err instanceof ConfigError) {
    console.error(chalk.red(`Configuration error: ${err.message}`));
  } else {
    console.error(chalk.red("Fatal error:"), err);
  }
  process.exit(1);
}
