/**
 * Bounded fixed-delay retry around a single unit of work.
 */

import {
  ConfigError,
  ExhaustedRetriesError,
  InvocationError,
  TimeoutError,
  errorMessage,
} from "./errors.ts";
import type { RetryPolicy, RunAttempt, WorkflowTask } from "./types.ts";
import { consoleLogger, type Logger } from "../daemon/logger.ts";

export type Sleep = (ms: number) => Promise<void>;

/** Longest delay setTimeout honours, in whole seconds */
export const MAX_TIMER_SECONDS = 2_147_483;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  logger?: Logger;
  /** Included in every log line, e.g. the workflow id */
  label?: string;
  sleep?: Sleep;
  now?: () => Date;
  onAttempt?: (attempt: RunAttempt) => void;
}

export interface RetryResult<T> {
  value: T;
  attempts: RunAttempt[];
}

function normalizeError(err: unknown): Error {
  if (err instanceof TimeoutError || err instanceof InvocationError) {
    return err;
  }
  return new InvocationError(errorMessage(err), { cause: err });
}

/**
 * Run one attempt, aborting its signal and rejecting with TimeoutError once
 * the policy's timeout elapses. Work that ignores the signal keeps running in
 * the background but its result is discarded.
 */
async function runAttempt<T>(
  task: WorkflowTask<T>,
  attempt: number,
  timeoutSeconds: number | undefined,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutSeconds === undefined) {
    return task(controller.signal, attempt);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutSeconds);
      reject(error);
      controller.abort(error);
    }, timeoutSeconds * 1000);
  });

  try {
    return await Promise.race([task(controller.signal, attempt), timeout]);
  } catch (err) {
    // Work that rejects on abort would otherwise mask the timeout
    if (controller.signal.reason instanceof TimeoutError) throw controller.signal.reason;
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

export function validateRetryPolicy(policy: RetryPolicy): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    errors.push(`maxRetries must be a non-negative integer, got ${policy.maxRetries}`);
  }
  if (!Number.isFinite(policy.retryDelaySeconds) || policy.retryDelaySeconds < 0) {
    errors.push(`retryDelaySeconds must be >= 0, got ${policy.retryDelaySeconds}`);
  } else if (policy.retryDelaySeconds > MAX_TIMER_SECONDS) {
    errors.push(`retryDelaySeconds must be <= ${MAX_TIMER_SECONDS}, got ${policy.retryDelaySeconds}`);
  }
  if (policy.timeoutSeconds !== undefined) {
    if (!Number.isFinite(policy.timeoutSeconds) || policy.timeoutSeconds <= 0) {
      errors.push(`timeoutSeconds must be > 0 when set, got ${policy.timeoutSeconds}`);
    } else if (policy.timeoutSeconds > MAX_TIMER_SECONDS) {
      errors.push(`timeoutSeconds must be <= ${MAX_TIMER_SECONDS}, got ${policy.timeoutSeconds}`);
    }
  }
  return errors;
}

/**
 * Attempt `task` up to `maxRetries + 1` times, waiting `retryDelaySeconds`
 * between attempts. Resolves with the first successful value; throws
 * ExhaustedRetriesError once every attempt has failed, or ConfigError up
 * front when the policy itself is invalid.
 */
export async function executeWithRetry<T>(
  task: WorkflowTask<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const policyErrors = validateRetryPolicy(policy);
  if (policyErrors.length > 0) {
    throw new ConfigError(`Invalid retry policy: ${policyErrors.join("; ")}`);
  }

  const logger = options.logger ?? consoleLogger("retry");
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const total = policy.maxRetries + 1;
  const prefix = options.label ? `${options.label}: ` : "";

  const attempts: RunAttempt[] = [];
  let lastError: Error = new InvocationError("No attempt was made");

  for (let attempt = 1; attempt <= total; attempt++) {
    const startedAt = now();
    logger.info(`${prefix}attempt ${attempt}/${total} started`);

    try {
      const value = await runAttempt(task, attempt, policy.timeoutSeconds);
      const record: RunAttempt = { attempt, startedAt, finishedAt: now(), outcome: "success" };
      attempts.push(record);
      options.onAttempt?.(record);
      logger.info(`${prefix}attempt ${attempt}/${total} succeeded`);
      return { value, attempts };
    } catch (err) {
      lastError = normalizeError(err);
      const record: RunAttempt = {
        attempt,
        startedAt,
        finishedAt: now(),
        outcome: lastError instanceof TimeoutError ? "timeout" : "failure",
        error: lastError.message,
      };
      attempts.push(record);
      options.onAttempt?.(record);
      logger.warn(`${prefix}attempt ${attempt}/${total} ${record.outcome}: ${lastError.message}`);
    }

    if (attempt < total && policy.retryDelaySeconds > 0) {
      logger.info(`${prefix}retrying in ${policy.retryDelaySeconds}s`);
      await sleep(policy.retryDelaySeconds * 1000);
    }
  }

  logger.error(`${prefix}giving up after ${total} attempt(s)`);
  throw new ExhaustedRetriesError(attempts, lastError);
}
