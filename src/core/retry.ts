import { errorMessage, LogFields, Logger } from "../observability";
import { errorName, ExhaustedRetriesError } from "./errors";

export type Operation<T> = () => Promise<T>;

export const DEFAULT_MAX_ATTEMPTS = 5;

export interface RetryOptions {
  operationName: string;
  logger: Logger;
  maxAttempts?: number;
  /** Linear delay between attempts; zero retries immediately. */
  retryDelayMs?: number;
  fields?: LogFields;
}

export interface FailureLoggingOptions {
  logger: Logger;
  event: string;
  fields?: LogFields;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wraps `operation` so that every failure is retried until `maxAttempts` invocations
 * have been made. The final failure is rethrown as an {@link ExhaustedRetriesError}.
 */
export function withRetry<T>(operation: Operation<T>, options: RetryOptions): Operation<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS) || 1);
  const retryDelayMs = Math.max(0, options.retryDelayMs ?? 0);

  return async () => {
    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;
        options.logger.warn("retry_attempt_failed", {
          ...options.fields,
          operation: options.operationName,
          attempt,
          maxAttempts,
          error: errorMessage(error),
        });
        if (attempt < maxAttempts && retryDelayMs > 0) {
          await sleep(retryDelayMs * attempt);
        }
      }
    }
    throw new ExhaustedRetriesError(options.operationName, maxAttempts, lastError);
  };
}

export function withFailureLogging<T>(operation: Operation<T>, options: FailureLoggingOptions): Operation<T> {
  return async () => {
    try {
      return await operation();
    } catch (error) {
      options.logger.error(options.event, {
        ...options.fields,
        errorName: errorName(error),
        error: errorMessage(error),
      });
      throw error;
    }
  };
}
