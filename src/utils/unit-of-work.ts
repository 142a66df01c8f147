import { logger } from '../middleware/logger.js';
import type { DatabaseAdapter, UnitOfWork } from './db-backend.js';

const log = logger.child({ module: 'unit-of-work' });

/**
 * Run `fn` inside a unit of work.
 *
 * - entering begins the transaction
 * - a throw from `fn` rolls back and rethrows; a failed rollback is logged
 *   and the original error still propagates
 * - returning without `uow.commit()` drops the uncommitted writes
 *
 * ```ts
 * await withUnitOfWork(adapter, async (uow) => {
 *   // writes…
 *   await uow.commit();
 * });
 * ```
 */
export async function withUnitOfWork<T>(
  adapter: Pick<DatabaseAdapter, 'unitOfWork'>,
  fn: (uow: UnitOfWork) => Promise<T>,
): Promise<T> {
  const uow = adapter.unitOfWork();
  await uow.begin();

  let result: T;
  try {
    result = await fn(uow);
  } catch (err) {
    try {
      await uow.rollback();
    } catch (rollbackErr) {
      log.error({ err: rollbackErr, cause: err }, 'Rollback failed');
    }
    throw err;
  }

  await uow.release();
  return result;
}
