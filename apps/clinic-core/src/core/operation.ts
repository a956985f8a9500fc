import { fail, type OperationResult } from '@clinic-attendance/shared';

import { StoreConstraintError, type ClinicStore, type UnitOfWork } from '../data/unit-of-work.js';
import { errorMessage, type Logger } from '../server/logger.js';
import { persistenceFailure } from './failures.js';

/** Converts anything thrown by `body` into a logged PersistenceFailure. */
export async function guardOperation<T>(
  logger: Logger,
  operation: string,
  body: () => Promise<OperationResult<T>>,
): Promise<OperationResult<T>> {
  try {
    return await body();
  } catch (error) {
    logger.error('operation failed', { operation, error: errorMessage(error) });
    return fail(persistenceFailure());
  }
}

/**
 * Runs `work` once more when storage rejects it with `constraint`. The second pass reads the
 * competing row that caused the violation and reports it as a domain failure.
 */
export async function runWithConstraintRetry<T>(
  database: UnitOfWork,
  constraint: StoreConstraintError['constraint'],
  work: (store: ClinicStore) => Promise<T>,
): Promise<T> {
  try {
    return await database.run(work);
  } catch (error) {
    if (error instanceof StoreConstraintError && error.constraint === constraint) {
      return database.run(work);
    }

    throw error;
  }
}
