import process from "node:process";
import { config } from "dotenv";
import { buildProgram } from "./cli/program.ts";

// .env.local takes precedence; real environment variables beat both
config({ path: [".env.local", ".env"], quiet: true });

await buildProgram().parseAsync(process.argv);
