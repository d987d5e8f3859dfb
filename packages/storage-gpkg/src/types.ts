import type {
  ConnectionDescriptor,
  Feature,
  GeometryKind,
  LoggerOption,
  SpaceMetadata,
} from '@geosync/core';

/**
 * How the driver opens the backing file.
 *
 * - `existing`: the file must already exist (add a layer to it)
 * - `create`: create the file when missing
 */
export type OpenMode = 'existing' | 'create';

/**
 * SQLite driver configuration
 */
export interface SQLiteDriverConfig {
  /** Path to database file */
  path: string;
  /** @default 'create' */
  mode?: OpenMode;
  /** Journal mode */
  journalMode?: 'DELETE' | 'TRUNCATE' | 'PERSIST' | 'MEMORY' | 'WAL' | 'OFF';
  /** Synchronous mode */
  synchronous?: 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';
  /** Log every statement through this function */
  verbose?: (message?: unknown, ...additional: unknown[]) => void;
}

/**
 * Run result from statement execution
 */
export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/**
 * SQLite statement prepared for execution
 */
export interface PreparedStatement<T> {
  run(...params: unknown[]): RunResult;
  get(...params: unknown[]): T | undefined;
  all(...params: unknown[]): T[];
}

/**
 * SQLite driver interface (abstraction over better-sqlite3)
 */
export interface SQLiteDriver {
  /** Path of the open file */
  readonly path: string;

  /** Execute one or more SQL statements */
  exec(sql: string): void;

  /** Prepare a statement */
  prepare<T = unknown>(sql: string): PreparedStatement<T>;

  /** Close the database */
  close(): void;

  /** Check if database is open */
  isOpen(): boolean;

  /** True while an explicit transaction is open */
  inTransaction(): boolean;

  /** Get pragma value */
  pragma(name: string): unknown;
}

/**
 * Opens a driver for a store file. Stores default to
 * `createBetterSqliteDriver`.
 */
export type DriverFactory = (config: SQLiteDriverConfig) => SQLiteDriver;

/**
 * Identifies the file a store writes to.
 */
export interface StoreIdentity {
  spaceId: string;
  /** Comma-separated tag filter, may be empty */
  tags: string;
  /** Disambiguates files of the same space and tags */
  unique: number;
}

/**
 * One backing table of a store
 */
export interface Partition {
  readonly geometryKind: GeometryKind;
  readonly index: number;
  readonly tableName: string;
  readonly filePath: string;
}

/**
 * PartitionStore configuration
 */
export interface PartitionStoreConfig {
  /** Directory the store file is created in */
  directory: string;
  identity: {
    spaceId: string;
    tags?: string;
    /** @default Math.floor(Date.now() / 100) */
    unique?: number;
  };
  /** Space metadata recorded as provenance */
  meta: SpaceMetadata;
  /** Connection the features came from, recorded as provenance */
  connection: ConnectionDescriptor;
  /** `AUTH:CODE` identifier. @default 'EPSG:4326' */
  crs?: string;
  /** Start a new partition once a partition holds this many features */
  maxFeaturesPerPartition?: number;
  logger?: LoggerOption;
  driverFactory?: DriverFactory;
}

/**
 * Options for reopening an existing store file
 */
export interface OpenStoreOptions {
  maxFeaturesPerPartition?: number;
  logger?: LoggerOption;
  driverFactory?: DriverFactory;
}

/**
 * Feature as read back from a partition table
 */
export interface StoredFeature {
  fid: number;
  id: string | null;
  geometryKind: GeometryKind;
  feature: Feature;
}
