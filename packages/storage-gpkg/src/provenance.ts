/**
 * Store provenance: where a store's features came from, and which
 * partitions it holds. Kept in two plain tables beside the GeoPackage
 * catalog so a store file can be reopened without the hub.
 *
 * @module provenance
 */

import {
  ValidationError,
  connectionFromJSON,
  connectionSchema,
  connectionToJSON,
  isGeometryKind,
  parseWith,
  spaceMetadataSchema,
  type ConnectionDescriptor,
  type GeometryKind,
  type SpaceMetadata,
} from '@geosync/core';
import { z } from 'zod';
import type { SQLiteDriver } from './types.js';

/** Keys of the `geosync_meta` table */
export const PROVENANCE_KEYS = {
  meta: 'xyz-hub',
  connection: 'xyz-hub-conn',
  tags: 'xyz-hub-tags',
  unique: 'xyz-hub-id',
  spaceId: 'geosync-space-id',
  crs: 'geosync-crs',
} as const;

export interface StoreProvenance {
  /** Space id the store file is named after */
  spaceId: string;
  meta: SpaceMetadata;
  connection: ConnectionDescriptor;
  tags: string;
  unique: number;
  crs: string;
}

/**
 * Row of the persisted partition listing
 */
export interface PartitionRecord {
  geometryKind: GeometryKind;
  index: number;
  tableName: string;
  /** Creation order across all kinds */
  seq: number;
}

const STORE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS geosync_meta (
    key TEXT PRIMARY KEY NOT NULL,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS geosync_partitions (
    kind TEXT NOT NULL,
    idx INTEGER NOT NULL,
    table_name TEXT NOT NULL UNIQUE,
    seq INTEGER NOT NULL,
    PRIMARY KEY (kind, idx)
  );
`;

const provenanceSchema = z.object({
  [PROVENANCE_KEYS.meta]: spaceMetadataSchema,
  [PROVENANCE_KEYS.connection]: connectionSchema,
  [PROVENANCE_KEYS.tags]: z.string(),
  [PROVENANCE_KEYS.unique]: z.number().int(),
  [PROVENANCE_KEYS.spaceId]: z.string().min(1),
  [PROVENANCE_KEYS.crs]: z.string(),
});

const partitionRowSchema = z.object({
  kind: z.custom<GeometryKind>((value) => typeof value === 'string' && isGeometryKind(value), {
    message: 'unknown geometry kind',
  }),
  idx: z.number().int().nonnegative(),
  table_name: z.string().min(1),
  seq: z.number().int(),
});

export function ensureStoreTables(driver: SQLiteDriver): void {
  driver.exec(STORE_TABLES_SQL);
}

/**
 * Write every provenance key, replacing earlier values.
 */
export function saveProvenance(driver: SQLiteDriver, provenance: StoreProvenance): void {
  const upsert = driver.prepare('INSERT OR REPLACE INTO geosync_meta (key, value) VALUES (?, ?)');
  const values: [string, unknown][] = [
    [PROVENANCE_KEYS.meta, provenance.meta],
    [PROVENANCE_KEYS.connection, connectionToJSON(provenance.connection)],
    [PROVENANCE_KEYS.tags, provenance.tags],
    [PROVENANCE_KEYS.unique, provenance.unique],
    [PROVENANCE_KEYS.spaceId, provenance.spaceId],
    [PROVENANCE_KEYS.crs, provenance.crs],
  ];
  for (const [key, value] of values) {
    upsert.run(key, JSON.stringify(value));
  }
}

/**
 * True once provenance has been written to the file.
 */
export function hasProvenance(driver: SQLiteDriver): boolean {
  return driver.prepare<{ hit: number }>('SELECT 1 AS hit FROM geosync_meta LIMIT 1').get() !== undefined;
}

/**
 * @throws ValidationError when a key is missing or malformed
 */
export function loadProvenance(driver: SQLiteDriver): StoreProvenance {
  const rows = driver.prepare<{ key: string; value: string }>('SELECT key, value FROM geosync_meta').all();
  const raw: Record<string, unknown> = {};
  for (const row of rows) {
    try {
      raw[row.key] = JSON.parse(row.value);
    } catch (error) {
      throw new ValidationError('store provenance', [
        { path: row.key, message: error instanceof Error ? error.message : String(error) },
      ]);
    }
  }

  const record = parseWith(provenanceSchema, raw, 'store provenance');
  return {
    spaceId: record[PROVENANCE_KEYS.spaceId],
    meta: record[PROVENANCE_KEYS.meta],
    connection: connectionFromJSON(record[PROVENANCE_KEYS.connection]),
    tags: record[PROVENANCE_KEYS.tags],
    unique: record[PROVENANCE_KEYS.unique],
    crs: record[PROVENANCE_KEYS.crs],
  };
}

/**
 * Append a partition to the listing. Returns its creation sequence.
 */
export function recordPartition(
  driver: SQLiteDriver,
  partition: Omit<PartitionRecord, 'seq'>
): number {
  const last = driver.prepare<{ seq: number | null }>('SELECT MAX(seq) AS seq FROM geosync_partitions').get();
  const seq = (last?.seq ?? -1) + 1;
  driver
    .prepare('INSERT INTO geosync_partitions (kind, idx, table_name, seq) VALUES (?, ?, ?, ?)')
    .run(partition.geometryKind, partition.index, partition.tableName, seq);
  return seq;
}

/**
 * Read the partition listing in creation order.
 *
 * @throws ValidationError for a malformed row or an index gap within a kind
 */
export function loadPartitionListing(driver: SQLiteDriver): PartitionRecord[] {
  const rows = driver.prepare('SELECT kind, idx, table_name, seq FROM geosync_partitions ORDER BY seq').all();
  const records = parseWith(z.array(partitionRowSchema), rows, 'partition listing').map((row) => ({
    geometryKind: row.kind,
    index: row.idx,
    tableName: row.table_name,
    seq: row.seq,
  }));

  const counts = new Map<GeometryKind, number>();
  for (const record of records) {
    const expected = counts.get(record.geometryKind) ?? 0;
    if (record.index !== expected) {
      throw new ValidationError('partition listing', [
        {
          path: record.tableName,
          message: `index ${record.index} of ${record.geometryKind}, expected ${expected}`,
        },
      ]);
    }
    counts.set(record.geometryKind, expected + 1);
  }
  return records;
}
