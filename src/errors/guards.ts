// src/errors/guards.ts
import type { LogMeta, LoggingService } from "../utils/logger";
import { describeError, PersistenceFailureError, PublishFailureError } from ".";

export async function guardPublish<T>(
  operation: string,
  action: () => Promise<T>
): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new PublishFailureError(operation, error);
  }
}

export async function guardPersistence<T>(
  operation: string,
  action: () => Promise<T>
): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new PersistenceFailureError(operation, error);
  }
}

/**
 * Runs a cleanup step whose failure must not abort the caller. Failures are
 * logged as warnings; the result says whether the step succeeded.
 */
export async function attemptCleanup(
  logger: LoggingService,
  operation: string,
  meta: LogMeta,
  action: () => Promise<unknown>
): Promise<boolean> {
  try {
    await action();
    return true;
  } catch (error) {
    logger.logWarn(`Could not ${operation}`, { ...meta, error: describeError(error) });
    return false;
  }
}
