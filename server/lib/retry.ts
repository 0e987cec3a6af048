import { ConcurrencyConflictError } from './errors';
import { moduleLogger } from './logger';

const log = moduleLogger('retry');

/**
 * Re-runs a read-compute-write cycle when an optimistic-lock check fails.
 * Any other error, or the last conflict, propagates unchanged.
 */
export async function withConflictRetry<T>(
  operation: string,
  maxAttempts: number,
  fn: () => Promise<T>
): Promise<T> {
  let attempt = 1;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof ConcurrencyConflictError) || attempt >= maxAttempts) {
        throw error;
      }
      log.warn({ operation, attempt, maxAttempts }, `[Retry] ${operation} hit a version conflict, retrying`);
      attempt += 1;
    }
  }
}
