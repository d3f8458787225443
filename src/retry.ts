import type pino from "pino";
import { HttpError, getRetryDelayMs, isRetriableStatus, wait } from "./http.js";

export async function withRetry<T>(
  logger: pino.Logger,
  operationName: string,
  fn: () => Promise<T>,
  maxAttempts = 5,
  signal?: AbortSignal,
): Promise<T> {
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await fn();
    } catch (error) {
      const cause = error instanceof Error && error.cause instanceof HttpError ? error.cause : error;
      const isHttpError = cause instanceof HttpError;
      const canRetry = isHttpError && isRetriableStatus(cause.status) && attempt < maxAttempts;

      if (!canRetry) {
        throw error;
      }

      const delayMs = getRetryDelayMs(cause, attempt);
      logger.warn(
        {
          operationName,
          attempt,
          maxAttempts,
          delayMs,
          status: cause.status,
        },
        "Transient server error, retrying",
      );
      await wait(delayMs, signal);
    }
  }
}
