import { Logger } from "../logger";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface BackoffOptions {
  maxAttempts: number;
  /** Attempt n (1-based) that fails waits baseDelayMs * 2^n before the next */
  baseDelayMs: number;
  label: string;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RetryExhaustedError";
  }
}

export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Run `operation` until it succeeds or maxAttempts is reached, waiting
 * 2^attempt backoff units between tries.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: BackoffOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === options.maxAttempts) {
        break;
      }

      const delayMs = backoffDelayMs(attempt, options.baseDelayMs);
      options.logger.warn(
        `${options.label} failed (attempt ${attempt}/${options.maxAttempts}). Retrying in ${delayMs / 1000} seconds...`,
        describeError(error)
      );
      await wait(delayMs);
    }
  }

  throw new RetryExhaustedError(
    `${options.label} failed after ${options.maxAttempts} attempts`,
    options.maxAttempts,
    { cause: lastError }
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
