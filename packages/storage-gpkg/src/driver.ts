import Database from 'better-sqlite3';
import type { SQLiteDriver, SQLiteDriverConfig } from './types.js';

/**
 * Create a better-sqlite3 driver (Node.js)
 *
 * In `existing` mode a missing file is an error (`SQLITE_CANTOPEN`); see
 * {@link isMissingFileError}.
 */
export function createBetterSqliteDriver(config: SQLiteDriverConfig): SQLiteDriver {
  const db = new Database(config.path, {
    fileMustExist: config.mode === 'existing',
    ...(config.verbose ? { verbose: config.verbose } : {}),
  });

  // Configure pragmas
  if (config.journalMode) {
    db.pragma(`journal_mode = ${config.journalMode}`);
  }

  if (config.synchronous) {
    db.pragma(`synchronous = ${config.synchronous}`);
  }

  return {
    path: config.path,
    exec: (sql: string) => {
      db.exec(sql);
    },
    prepare: <T>(sql: string) => db.prepare<unknown[], T>(sql),
    close: () => {
      db.close();
    },
    isOpen: () => db.open,
    inTransaction: () => db.inTransaction,
    pragma: (name: string) => db.pragma(name, { simple: true }),
  };
}

/**
 * True for the engine error raised when an `existing`-mode open finds no
 * file.
 */
export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'SQLITE_CANTOPEN';
}

/**
 * Message of an engine error, for wrapping in a GeoSyncError.
 */
export function engineMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Quote an SQL identifier.
 */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
