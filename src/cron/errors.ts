import type { RunAttempt } from "./types.ts";

/** Bad schedule descriptor, timezone or retry settings. Fatal at start-up. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** A single attempt ran past its timeout. */
export class TimeoutError extends Error {
  override name = "TimeoutError";

  constructor(readonly timeoutSeconds: number) {
    super(`Attempt timed out after ${timeoutSeconds}s`);
  }
}

/** The remote call failed for any reason other than a timeout. */
export class InvocationError extends Error {
  override name = "InvocationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Every permitted attempt for one firing failed. */
export class ExhaustedRetriesError extends Error {
  override name = "ExhaustedRetriesError";

  constructor(
    readonly attempts: RunAttempt[],
    readonly lastError: Error,
  ) {
    super(`All ${attempts.length} attempt(s) failed; last error: ${lastError.message}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
