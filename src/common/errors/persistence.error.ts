/**
 * Raised by a cafe store when the underlying table cannot be read or written.
 * The driver error is kept as `cause` for the logs; clients only ever see a
 * generic 500 body.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * The table refused a row because of a UNIQUE constraint. Tables created by
 * older releases declare `name` unique; the current DDL does not.
 */
export class DuplicateCafeError extends PersistenceError {
  constructor(options?: { cause?: unknown }) {
    super('Cafe with this name already exists', options);
    this.name = 'DuplicateCafeError';
  }
}

function sqliteCode(err: unknown): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && err.code) return err.code;
  // TypeORM's QueryFailedError keeps the driver error alongside
  if ('driverError' in err) return sqliteCode(err.driverError);
  return undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  return sqliteCode(err) === 'SQLITE_CONSTRAINT_UNIQUE';
}
