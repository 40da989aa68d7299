/**
 * Store Error Translation
 * Layer: Infrastructure (Database)
 *
 * better-sqlite3 reports a rejected write as a SqliteError whose `code`
 * names the constraint (SQLITE_CONSTRAINT_UNIQUE, ..._FOREIGNKEY, ...).
 * Knex rethrows that error with the statement prepended to its message.
 * This maps those codes onto ConstraintViolationError and leaves every
 * other error untouched.
 */
import { ConstraintKind, ConstraintViolationError } from '@shared/errors/AppError';

const CONSTRAINT_CODES: Readonly<Record<string, ConstraintKind>> = {
  SQLITE_CONSTRAINT_UNIQUE: 'unique',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'unique',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign_key',
  SQLITE_CONSTRAINT_NOTNULL: 'not_null',
  SQLITE_CONSTRAINT_CHECK: 'check',
};

export function translateDbError(err: unknown): unknown {
  if (!(err instanceof Error) || !('code' in err) || typeof err.code !== 'string') {
    return err;
  }

  const constraint = CONSTRAINT_CODES[err.code];
  if (!constraint) return err;

  // Knex prefixes "<sql> - "; the driver's own text is the last segment.
  const detail = err.message.split(' - ').pop() ?? err.message;
  return new ConstraintViolationError(detail, constraint, { cause: err });
}

/** Runs a write and rethrows store constraint failures as ConstraintViolationError. */
export async function guardWrite<T>(write: () => PromiseLike<T>): Promise<T> {
  try {
    return await write();
  } catch (err) {
    throw translateDbError(err);
  }
}
