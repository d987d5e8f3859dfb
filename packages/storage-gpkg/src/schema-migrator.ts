import {
  MigrationFailedError,
  NoTableFoundError,
  resolveLogger,
  type Logger,
  type LoggerOption,
} from '@geosync/core';
import { engineMessage, quoteIdent } from './driver.js';
import type { SQLiteDriver } from './types.js';

/** SQLite conflict clause applied to the retrofitted constraint */
export type ConflictResolution = 'ROLLBACK' | 'ABORT' | 'FAIL' | 'IGNORE' | 'REPLACE';

/**
 * Catalog row from `sqlite_master`
 */
interface CatalogEntry {
  type: string;
  name: string;
  sql: string;
}

/**
 * Outcome of a successful migration
 */
export interface MigrationResult {
  tableName: string;
  /** Constraint clause added to the table definition */
  constraint: string;
  /** Index and trigger statements re-applied after the rebuild */
  reapplied: string[];
}

const CREATE_TABLE_PREFIX = /^\s*CREATE\s+TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?/i;

function skipQuoted(sql: string, start: number, close: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === close) {
      // doubled quote is an escaped quote
      if (close !== ']' && sql[i + 1] === close) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  throw new Error(`unterminated quote at offset ${start}`);
}

const CLOSING_QUOTE: Record<string, string> = { '"': '"', '`': '`', "'": "'", '[': ']' };

function skipIdentifier(sql: string, start: number): number {
  let end: number;
  const quote = CLOSING_QUOTE[sql.charAt(start)];
  if (quote !== undefined) {
    end = skipQuoted(sql, start, quote);
  } else {
    end = start;
    while (end < sql.length && /[A-Za-z0-9_$]/.test(sql.charAt(end))) end++;
    if (end === start) throw new Error(`expected a table name at offset ${start}`);
  }
  // schema-qualified name
  return sql.charAt(end) === '.' ? skipIdentifier(sql, end + 1) : end;
}

function findClosingParen(sql: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < sql.length) {
    const ch = sql.charAt(i);
    const quote = CLOSING_QUOTE[ch];
    if (quote !== undefined) {
      i = skipQuoted(sql, i, quote);
      continue;
    }
    if (ch === '-' && sql.charAt(i + 1) === '-') {
      const newline = sql.indexOf('\n', i);
      i = newline < 0 ? sql.length : newline + 1;
      continue;
    }
    if (ch === '(') depth++;
    if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  throw new Error('unbalanced parentheses in table definition');
}

/**
 * Rewrite a CREATE TABLE statement under `newName`, appending `constraint`
 * to its column list. Quoted names and string literals containing
 * parentheses are skipped; anything after the column list (e.g.
 * `WITHOUT ROWID`) is kept.
 */
export function rewriteCreateTable(sql: string, newName: string, constraint: string): string {
  const prefix = CREATE_TABLE_PREFIX.exec(sql);
  if (!prefix) {
    throw new Error('not a CREATE TABLE statement');
  }
  const nameEnd = skipIdentifier(sql, prefix[0].length);
  const open = sql.indexOf('(', nameEnd);
  if (open < 0) {
    throw new Error('table definition has no column list');
  }
  const close = findClosingParen(sql, open);
  return `CREATE TABLE ${quoteIdent(newName)} ${sql.slice(open, close)}, ${constraint}${sql.slice(close)}`;
}

/**
 * Retrofits a uniqueness constraint onto an existing, empty table.
 *
 * SQLite cannot add a table constraint with ALTER TABLE, so the table is
 * rebuilt: a copy is created under `tmp_<table>` with the constraint, the
 * original is dropped, the copy renamed back and the original indexes and
 * triggers re-created. All of it runs in one transaction with foreign keys
 * deferred.
 *
 * @example
 * ```typescript
 * const migrator = new SchemaMigrator(driver);
 * migrator.addUniqueConstraint('Point_0', 'xyz_id', 'REPLACE');
 * // INSERT of an existing xyz_id now replaces the old row
 * ```
 */
export class SchemaMigrator {
  private readonly logger: Logger;

  constructor(
    private readonly driver: SQLiteDriver,
    logger?: LoggerOption
  ) {
    this.logger = resolveLogger(logger, 'schema-migrator');
  }

  /**
   * @throws NoTableFoundError when the catalog has no such table
   * @throws MigrationFailedError when the table holds rows or a rebuild step fails
   */
  addUniqueConstraint(
    tableName: string,
    column: string,
    onConflict: ConflictResolution = 'REPLACE'
  ): MigrationResult {
    const catalog = this.readCatalog(tableName);
    const [definition, ...dependents] = catalog;
    if (definition?.type !== 'table') {
      throw new NoTableFoundError(tableName);
    }

    const present = this.driver
      .prepare<{ present: number }>(`SELECT EXISTS (SELECT 1 FROM ${quoteIdent(tableName)}) AS present`)
      .get();
    if (present?.present === 1) {
      throw new MigrationFailedError(tableName, 'table is not empty');
    }

    const constraint = `UNIQUE(${quoteIdent(column)}) ON CONFLICT ${onConflict}`;
    const tmpName = `tmp_${tableName}`;
    let createTmp: string;
    try {
      createTmp = rewriteCreateTable(definition.sql, tmpName, constraint);
    } catch (error) {
      throw new MigrationFailedError(tableName, engineMessage(error), definition.sql);
    }

    const reapplied = dependents.map((entry) => entry.sql);
    const steps = [
      'BEGIN',
      createTmp,
      'PRAGMA defer_foreign_keys = 1',
      `DROP TABLE ${quoteIdent(tableName)}`,
      `ALTER TABLE ${quoteIdent(tmpName)} RENAME TO ${quoteIdent(tableName)}`,
      'PRAGMA defer_foreign_keys = 0',
      ...reapplied,
      'COMMIT',
    ];

    const foreignKeys = this.driver.pragma('foreign_keys') === 1 ? 1 : 0;
    this.driver.exec('PRAGMA foreign_keys = 0');

    let current = '';
    try {
      for (const step of steps) {
        current = step;
        this.driver.exec(step);
      }
    } catch (error) {
      if (this.driver.inTransaction()) {
        this.driver.exec('ROLLBACK');
      }
      this.driver.exec(`PRAGMA foreign_keys = ${foreignKeys}`);
      this.logger.warn('Schema rebuild rolled back', { tableName, statement: current });
      throw new MigrationFailedError(
        tableName,
        engineMessage(error),
        current,
        error instanceof Error ? error : undefined
      );
    }
    this.driver.exec(`PRAGMA foreign_keys = ${foreignKeys}`);

    this.logger.debug('Unique constraint added', { tableName, column, reapplied: reapplied.length });
    return { tableName, constraint, reapplied };
  }

  private readCatalog(tableName: string): CatalogEntry[] {
    return this.driver
      .prepare<CatalogEntry>(
        `SELECT type, name, sql FROM sqlite_master
          WHERE tbl_name = ? AND sql IS NOT NULL
          ORDER BY CASE type WHEN 'table' THEN 0 ELSE 1 END, rowid`
      )
      .all(tableName);
  }
}

/**
 * Create a table and retrofit a REPLACE-on-conflict unique constraint on
 * `column` in one call.
 */
export function createConstrainedTable(
  driver: SQLiteDriver,
  createSql: string,
  tableName: string,
  column: string,
  logger?: LoggerOption
): MigrationResult {
  driver.exec(createSql);
  return new SchemaMigrator(driver, logger).addUniqueConstraint(tableName, column, 'REPLACE');
}
