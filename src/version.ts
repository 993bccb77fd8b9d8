import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const APP_NAME = "workflow-cron";

let cached: string | null = null;

/** Version from the nearest package.json above this file (works from src/ and dist/). */
export function getVersion(): string {
  if (cached) return cached;
  try {
    let dir = path.dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, "package.json");
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
        if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
          cached = pkg.version;
          return cached;
        }
      }
      dir = path.dirname(dir);
    }
  } catch {
    // fall through
  }
  return "0.0.0";
}
