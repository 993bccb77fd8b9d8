import { Command } from "commander";
import { APP_NAME, getVersion } from "../version.ts";
import { registerRunCommand } from "./run.ts";
import { registerOnceCommand } from "./once.ts";
import { registerStatusCommand } from "./status.ts";
import { registerNextCommand } from "./next.ts";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description("Run a Coze workflow on a schedule, with retries and a health endpoint")
    .version(getVersion());

  registerRunCommand(program);
  registerOnceCommand(program);
  registerStatusCommand(program);
  registerNextCommand(program);

  return program;
}
