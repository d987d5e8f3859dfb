import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import {
  BatchWriteError,
  GeoSyncError,
  PartitionIndexGapError,
  PartitionWriteFailedError,
  StorageError,
  ensureGeoSyncError,
  geometryEnvelope,
  geometryKindOf,
  parseWith,
  resolveLogger,
  type ConnectionDescriptor,
  type Feature,
  type FeatureBatch,
  type GeometryKind,
  type KindFailure,
  type Logger,
  type SpaceMetadata,
} from '@geosync/core';
import { Subject, type Observable } from 'rxjs';
import { z } from 'zod';
import { asError, createBetterSqliteDriver, engineMessage, isMissingFileError, quoteIdent } from './driver.js';
import {
  DEFAULT_CRS,
  bootstrapGeoPackage,
  decodeGeometry,
  dropLayer,
  encodeGeometry,
  ensureSpatialRefSys,
  extentIndexSql,
  featureTableSql,
  hasGeometryColumn,
  parseCrs,
  registerLayer,
  type CrsInfo,
} from './geopackage.js';
import {
  defaultUnique,
  groupName,
  partitionDisplayName,
  partitionTableName,
  storeFileName,
} from './naming.js';
import {
  ensureStoreTables,
  hasProvenance,
  loadPartitionListing,
  loadProvenance,
  recordPartition,
  saveProvenance,
  type PartitionRecord,
  type StoreProvenance,
} from './provenance.js';
import { SchemaMigrator } from './schema-migrator.js';
import type {
  DriverFactory,
  OpenStoreOptions,
  Partition,
  PartitionStoreConfig,
  SQLiteDriver,
  StoreIdentity,
  StoredFeature,
} from './types.js';

/** Column holding the hub feature id; unique per partition */
export const FEATURE_ID_COLUMN = 'xyz_id';

/** Features written per geometry kind by one batch */
export type BatchWriteSummary = Record<string, number>;

interface StoreInit {
  filePath: string;
  identity: StoreIdentity;
  meta: SpaceMetadata;
  connection: ConnectionDescriptor;
  crs: string;
  maxFeaturesPerPartition: number;
  logger: Logger;
  openDriver: DriverFactory;
  driver: SQLiteDriver | null;
}

interface FeatureRow {
  fid: number;
  geom?: Buffer | null;
  xyz_id: string | null;
  properties: string | null;
}

const storeConfigSchema = z.object({
  directory: z.string().min(1),
  identity: z.object({
    spaceId: z.string().min(1),
    tags: z.string().default(''),
    unique: z.number().int().nonnegative().optional(),
  }),
  crs: z.string().default(DEFAULT_CRS),
  maxFeaturesPerPartition: z.number().int().positive().optional(),
});

const maxFeaturesSchema = z.number().int().positive().optional();

const storedPropertiesSchema = z.record(z.unknown()).nullable();

/**
 * First field where a file's provenance disagrees with the store opening it.
 */
function provenanceConflict(stored: StoreProvenance, expected: StoreProvenance): string | undefined {
  for (const key of ['spaceId', 'tags', 'unique', 'crs'] as const) {
    if (stored[key] !== expected[key]) {
      return `${key} is ${JSON.stringify(stored[key])}, expected ${JSON.stringify(expected[key])}`;
    }
  }
  if (stored.meta.id !== expected.meta.id) {
    return `space is "${stored.meta.id}", expected "${expected.meta.id}"`;
  }
  return undefined;
}

function parseProperties(text: string | null, tableName: string, fid: number): Record<string, unknown> | null {
  if (text === null) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StorageError('GEOSYNC_S300', `Unreadable properties in ${tableName} row ${fid}`, { tableName, fid }, asError(error));
  }
  return parseWith(storedPropertiesSchema, raw, `properties of ${tableName} row ${fid}`);
}

/**
 * Local materialized store for one space: a GeoPackage file holding one
 * table per (geometry kind, index) partition.
 *
 * Partition indices are allocated per kind from 0 without gaps and never
 * change. Every partition carries a unique constraint on the hub feature
 * id with REPLACE resolution, so writing a feature again replaces the
 * earlier row.
 *
 * A new file is created with the first partition: it is opened as an
 * existing file first, and created (with the GeoPackage catalog) only when
 * missing. When the file is already there, the store adds to it: the
 * file's provenance and partitions are kept, and a file recorded for
 * another identity or CRS is refused.
 *
 * @example
 * ```typescript
 * const store = PartitionStore.create({
 *   directory: '/data/layers',
 *   identity: { spaceId: 'abc', tags: 'roads' },
 *   meta,
 *   connection: conn,
 * });
 *
 * store.partitionCreated().subscribe((p) => console.log(store.displayName(p)));
 * store.writeFeatureBatch(page.features);
 * ```
 */
export class PartitionStore {
  readonly filePath: string;
  readonly identity: StoreIdentity;
  readonly crs: string;

  private spaceMeta: SpaceMetadata;
  private spaceConnection: ConnectionDescriptor;
  private readonly crsInfo: CrsInfo;
  private readonly maxFeaturesPerPartition: number;
  private readonly logger: Logger;
  private readonly openDriver: DriverFactory;
  private driver: SQLiteDriver | null;
  private readonly byKind = new Map<GeometryKind, Partition[]>();
  private readonly ordered: Partition[] = [];
  private readonly created$ = new Subject<Partition>();
  private closed = false;

  private constructor(init: StoreInit) {
    this.filePath = init.filePath;
    this.identity = init.identity;
    this.spaceMeta = init.meta;
    this.spaceConnection = init.connection;
    this.crs = init.crs;
    this.crsInfo = parseCrs(init.crs);
    this.maxFeaturesPerPartition = init.maxFeaturesPerPartition;
    this.logger = init.logger;
    this.openDriver = init.openDriver;
    this.driver = init.driver;
  }

  /**
   * Prepare a store. A new file is not written until the first partition
   * is created; an existing file of the same name is opened at once and
   * its partitions restored.
   *
   * @throws ValidationError for an invalid identity, CRS or capacity
   * @throws StorageError when an existing file cannot be opened or belongs
   * to another identity
   */
  static create(config: PartitionStoreConfig): PartitionStore {
    const parsed = parseWith(storeConfigSchema, config, 'store configuration');
    const identity: StoreIdentity = {
      spaceId: parsed.identity.spaceId,
      tags: parsed.identity.tags,
      unique: parsed.identity.unique ?? defaultUnique(),
    };
    const logger = resolveLogger(config.logger, 'partition-store');

    const store = new PartitionStore({
      filePath: join(parsed.directory, storeFileName(identity)),
      identity,
      meta: config.meta,
      connection: config.connection,
      crs: parsed.crs,
      maxFeaturesPerPartition: parsed.maxFeaturesPerPartition ?? Number.POSITIVE_INFINITY,
      logger,
      openDriver: config.driverFactory ?? createBetterSqliteDriver,
      driver: null,
    });
    if (existsSync(store.filePath)) {
      store.connect();
    }
    return store;
  }

  /**
   * Reopen a store file, restoring provenance and partitions.
   *
   * @throws StorageError (GEOSYNC_S300) when the file cannot be opened
   * @throws ValidationError when its provenance or partition listing is malformed
   */
  static open(filePath: string, options: OpenStoreOptions = {}): PartitionStore {
    const maxFeatures = parseWith(maxFeaturesSchema, options.maxFeaturesPerPartition, 'maxFeaturesPerPartition');
    const logger = resolveLogger(options.logger, 'partition-store');
    const openDriver = options.driverFactory ?? createBetterSqliteDriver;

    let driver: SQLiteDriver;
    try {
      driver = openDriver({ path: filePath, mode: 'existing' });
    } catch (error) {
      throw new StorageError(
        'GEOSYNC_S300',
        `Cannot open store ${filePath}: ${engineMessage(error)}`,
        { filePath },
        asError(error)
      );
    }

    try {
      const provenance = loadProvenance(driver);
      const listing = loadPartitionListing(driver);
      const store = new PartitionStore({
        filePath,
        identity: {
          spaceId: provenance.spaceId,
          tags: provenance.tags,
          unique: provenance.unique,
        },
        meta: provenance.meta,
        connection: provenance.connection,
        crs: provenance.crs,
        maxFeaturesPerPartition: maxFeatures ?? Number.POSITIVE_INFINITY,
        logger,
        openDriver,
        driver,
      });
      for (const record of listing) {
        store.register({
          geometryKind: record.geometryKind,
          index: record.index,
          tableName: record.tableName,
          filePath,
        });
      }
      logger.debug('Store reopened', { filePath, partitions: listing.length });
      return store;
    } catch (error) {
      driver.close();
      throw error;
    }
  }

  /** Space metadata recorded as provenance */
  get meta(): SpaceMetadata {
    return this.spaceMeta;
  }

  /** Connection the features came from */
  get connection(): ConnectionDescriptor {
    return this.spaceConnection;
  }

  /** Directory holding the store file */
  get directory(): string {
    return dirname(this.filePath);
  }

  /**
   * Provenance record as persisted in the file
   */
  provenance(): StoreProvenance {
    return {
      spaceId: this.identity.spaceId,
      meta: this.spaceMeta,
      connection: this.spaceConnection,
      tags: this.identity.tags,
      unique: this.identity.unique,
      crs: this.crs,
    };
  }

  /**
   * Emits each partition once it has been created and registered.
   */
  partitionCreated(): Observable<Partition> {
    return this.created$.asObservable();
  }

  // ── Partitions ──────────────────────────────────────────────────────

  /**
   * Return partition `index` of `kind`, creating it when `index` is the
   * next free index.
   *
   * @throws PartitionIndexGapError when `index` is beyond the next free index
   * @throws PartitionWriteFailedError when the table cannot be created
   * @throws MigrationFailedError when the id constraint cannot be added; the
   * table is removed and the index stays free
   */
  ensurePartition(kind: GeometryKind, index: number): Partition {
    this.assertOpen();
    const list = this.byKind.get(kind) ?? [];
    const existing = list[index];
    if (existing) return existing;
    if (index !== list.length) {
      throw new PartitionIndexGapError(kind, index, list.length);
    }
    return this.createPartition(kind, index);
  }

  /** All partitions in creation order */
  partitions(): Partition[] {
    return [...this.ordered];
  }

  /** Partitions of one kind, by index */
  partitionsOf(kind: GeometryKind): Partition[] {
    return [...(this.byKind.get(kind) ?? [])];
  }

  hasPartition(kind: GeometryKind, index: number): boolean {
    return this.getPartition(kind, index) !== undefined;
  }

  getPartition(kind: GeometryKind, index: number): Partition | undefined {
    return this.byKind.get(kind)?.[index];
  }

  /** `<title>-<id>[-(<tags>)]-<kind>-<index>` */
  displayName(partition: Pick<Partition, 'geometryKind' | 'index'>): string {
    return partitionDisplayName(this.meta, this.identity.tags, partition);
  }

  /** `<title>-<id>[-(<tags>)][-<n>]` */
  groupName(n?: number): string {
    return groupName(this.meta, this.identity.tags, n);
  }

  // ── Writes ──────────────────────────────────────────────────────────

  /**
   * Write features, routed by geometry kind.
   *
   * A feature whose id already lives in a partition of its kind is written
   * there, replacing the old row. Other features go to the lowest-index
   * partition with room, and a new partition is created when none has.
   * Each kind is written in its own transaction.
   *
   * @returns features written per kind
   * @throws BatchWriteError after the whole batch when any kind failed; the
   * kinds not listed in it were written
   */
  writeFeatureBatch(features: FeatureBatch): BatchWriteSummary {
    this.assertOpen();

    const groups = new Map<GeometryKind, Feature[]>();
    for (const feature of features) {
      const kind = geometryKindOf(feature);
      const group = groups.get(kind);
      if (group) {
        group.push(feature);
      } else {
        groups.set(kind, [feature]);
      }
    }

    const written: BatchWriteSummary = {};
    const failures: KindFailure[] = [];
    for (const [kind, group] of groups) {
      try {
        written[kind] = this.writeKind(kind, group);
      } catch (error) {
        const failure = ensureGeoSyncError(error, 'GEOSYNC_S300');
        this.logger.error('Writing features failed', failure, { geometryKind: kind, count: group.length });
        failures.push({ geometryKind: kind, error: failure });
      }
    }

    if (failures.length > 0) {
      throw new BatchWriteError(failures, written);
    }
    this.logger.debug('Feature batch written', { written });
    return written;
  }

  // ── Reads ───────────────────────────────────────────────────────────

  /** Rows across every partition */
  featureCount(): number {
    return this.ordered.reduce((sum, partition) => sum + this.rowCount(partition), 0);
  }

  /** Rows in one partition */
  partitionFeatureCount(partition: Partition): number {
    return this.rowCount(partition);
  }

  /**
   * Read a partition back as GeoJSON features, in insertion order. Ids come
   * back as strings.
   */
  readFeatures(partition: Partition): StoredFeature[] {
    const driver = this.requireDriver();
    const geometric = hasGeometryColumn(partition.geometryKind);
    const columns = geometric ? 'fid, geom, xyz_id, properties' : 'fid, xyz_id, properties';
    const rows = driver
      .prepare<FeatureRow>(`SELECT ${columns} FROM ${quoteIdent(partition.tableName)} ORDER BY fid`)
      .all();

    return rows.map((row): StoredFeature => ({
      fid: row.fid,
      id: row.xyz_id,
      geometryKind: partition.geometryKind,
      feature: {
        type: 'Feature',
        ...(row.xyz_id !== null ? { id: row.xyz_id } : {}),
        geometry: row.geom ? decodeGeometry(row.geom) : null,
        properties: parseProperties(row.properties, partition.tableName, row.fid),
      },
    }));
  }

  /**
   * Close the backing file. The store cannot be used afterwards.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.driver?.isOpen()) {
      this.driver.close();
    }
    this.driver = null;
    this.created$.complete();
  }

  // ── Private ─────────────────────────────────────────────────────────

  private assertOpen(): void {
    if (this.closed) {
      throw new GeoSyncError({ code: 'GEOSYNC_S304', message: `Store ${this.filePath} is closed` });
    }
  }

  private requireDriver(): SQLiteDriver {
    this.assertOpen();
    if (!this.driver) {
      throw new StorageError('GEOSYNC_S300', `Store ${this.filePath} has no partitions yet`);
    }
    return this.driver;
  }

  private register(partition: Partition): void {
    const frozen = Object.freeze(partition);
    const list = this.byKind.get(frozen.geometryKind);
    if (list) {
      list.push(frozen);
    } else {
      this.byKind.set(frozen.geometryKind, [frozen]);
    }
    this.ordered.push(frozen);
  }

  /**
   * Open the store file as an existing file, creating it only when the
   * engine reports it missing.
   */
  private openFile(tableName?: string): { driver: SQLiteDriver; created: boolean } {
    try {
      return { driver: this.openDriver({ path: this.filePath, mode: 'existing' }), created: false };
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw this.openFailure(error, tableName);
      }
    }

    this.logger.info('Creating store file', { filePath: this.filePath });
    try {
      return { driver: this.openDriver({ path: this.filePath, mode: 'create' }), created: true };
    } catch (error) {
      throw this.openFailure(error, tableName);
    }
  }

  private openFailure(error: unknown, tableName?: string): GeoSyncError {
    if (tableName !== undefined) {
      return new PartitionWriteFailedError(tableName, this.filePath, asError(error));
    }
    return new StorageError(
      'GEOSYNC_S300',
      `Cannot open store ${this.filePath}: ${engineMessage(error)}`,
      { filePath: this.filePath },
      asError(error)
    );
  }

  /**
   * Open the store file once. A new file gets the catalog and this store's
   * provenance; a file that already has provenance keeps it, and its
   * partitions are registered.
   */
  private connect(tableName?: string): SQLiteDriver {
    if (this.driver) return this.driver;

    const { driver, created } = this.openFile(tableName);
    let listing: PartitionRecord[] = [];
    try {
      if (created) {
        bootstrapGeoPackage(driver);
      }
      ensureStoreTables(driver);
      if (created || !hasProvenance(driver)) {
        saveProvenance(driver, this.provenance());
      } else {
        listing = this.adopt(driver);
      }
      ensureSpatialRefSys(driver, this.crsInfo);
    } catch (error) {
      driver.close();
      throw GeoSyncError.isGeoSyncError(error) ? error : this.openFailure(error, tableName);
    }

    this.driver = driver;
    for (const record of listing) {
      this.register({
        geometryKind: record.geometryKind,
        index: record.index,
        tableName: record.tableName,
        filePath: this.filePath,
      });
    }
    return driver;
  }

  /**
   * Take over the provenance of an existing file.
   *
   * @throws StorageError when the file was written for another identity or CRS
   */
  private adopt(driver: SQLiteDriver): PartitionRecord[] {
    const stored = loadProvenance(driver);
    const conflict = provenanceConflict(stored, this.provenance());
    if (conflict !== undefined) {
      throw new StorageError('GEOSYNC_S300', `Store ${this.filePath} was written for another layer: ${conflict}`, {
        filePath: this.filePath,
      });
    }
    const listing = loadPartitionListing(driver);
    this.spaceMeta = stored.meta;
    this.spaceConnection = stored.connection;
    this.logger.info('Adding to existing store file', { filePath: this.filePath, partitions: listing.length });
    return listing;
  }

  private createPartition(kind: GeometryKind, index: number): Partition {
    const tableName = partitionTableName(kind, index);
    const driver = this.connect(tableName);
    const adopted = this.getPartition(kind, index);
    if (adopted) return adopted;
    const next = this.partitionsOf(kind).length;
    if (index !== next) {
      throw new PartitionIndexGapError(kind, index, next);
    }
    const displayName = this.displayName({ geometryKind: kind, index });

    try {
      driver.exec('BEGIN');
      driver.exec(featureTableSql(tableName, kind));
      if (hasGeometryColumn(kind)) {
        driver.exec(extentIndexSql(tableName));
      }
      registerLayer(driver, tableName, kind, displayName, this.crsInfo);
      driver.exec('COMMIT');
    } catch (error) {
      if (driver.inTransaction()) {
        driver.exec('ROLLBACK');
      }
      throw new PartitionWriteFailedError(tableName, this.filePath, asError(error));
    }

    try {
      new SchemaMigrator(driver, this.logger).addUniqueConstraint(tableName, FEATURE_ID_COLUMN, 'REPLACE');
    } catch (error) {
      dropLayer(driver, tableName);
      this.logger.warn('Removed partition table after failed migration', { tableName });
      throw error;
    }

    try {
      recordPartition(driver, { geometryKind: kind, index, tableName });
    } catch (error) {
      dropLayer(driver, tableName);
      throw new PartitionWriteFailedError(tableName, this.filePath, asError(error));
    }

    const partition: Partition = { geometryKind: kind, index, tableName, filePath: this.filePath };
    this.register(partition);
    this.logger.info('Partition created', { tableName, displayName });
    this.created$.next(partition);
    return partition;
  }

  private rowCount(partition: Partition): number {
    const row = this.requireDriver()
      .prepare<{ n: number }>(`SELECT COUNT(*) AS n FROM ${quoteIdent(partition.tableName)}`)
      .get();
    return row?.n ?? 0;
  }

  private containsId(partition: Partition, id: string): boolean {
    const row = this.requireDriver()
      .prepare<{ hit: number }>(
        `SELECT 1 AS hit FROM ${quoteIdent(partition.tableName)} WHERE ${FEATURE_ID_COLUMN} = ? LIMIT 1`
      )
      .get(id);
    return row !== undefined;
  }

  private partitionHoldingId(kind: GeometryKind, id: string): Partition | undefined {
    return this.partitionsOf(kind).find((partition) => this.containsId(partition, id));
  }

  /**
   * Lowest-index partition of `kind` with room for one more feature.
   * `fill` caches row counts, including features already planned.
   */
  private partitionWithRoom(kind: GeometryKind, fill: Map<Partition, number>): Partition {
    for (const partition of this.partitionsOf(kind)) {
      let count = fill.get(partition);
      if (count === undefined) {
        count = this.rowCount(partition);
        fill.set(partition, count);
      }
      if (count < this.maxFeaturesPerPartition) return partition;
    }
    const partition = this.ensurePartition(kind, this.partitionsOf(kind).length);
    fill.set(partition, 0);
    return partition;
  }

  /**
   * Assign each feature of one kind to a partition, creating partitions as
   * needed. Features sharing an id land in the same partition.
   */
  private planKind(kind: GeometryKind, features: readonly Feature[]): Map<Partition, Feature[]> {
    const plan = new Map<Partition, Feature[]>();
    const placed = new Map<string, Partition>();
    const fill = new Map<Partition, number>();

    for (const feature of features) {
      const id = feature.id === undefined ? null : String(feature.id);
      let target = id === null ? undefined : (placed.get(id) ?? this.partitionHoldingId(kind, id));
      if (!target) {
        target = this.partitionWithRoom(kind, fill);
        fill.set(target, (fill.get(target) ?? 0) + 1);
      }
      if (id !== null) {
        placed.set(id, target);
      }
      const rows = plan.get(target);
      if (rows) {
        rows.push(feature);
      } else {
        plan.set(target, [feature]);
      }
    }
    return plan;
  }

  private rowValues(kind: GeometryKind, feature: Feature): unknown[] {
    const envelope = feature.geometry ? geometryEnvelope(feature.geometry) : null;
    const values: unknown[] = [];
    if (hasGeometryColumn(kind)) {
      values.push(feature.geometry ? encodeGeometry(feature.geometry, this.crsInfo.srsId) : null);
    }
    values.push(
      feature.id === undefined ? null : String(feature.id),
      feature.properties ? JSON.stringify(feature.properties) : null,
      envelope?.[0] ?? null,
      envelope?.[1] ?? null,
      envelope?.[2] ?? null,
      envelope?.[3] ?? null
    );
    return values;
  }

  private writeKind(kind: GeometryKind, features: readonly Feature[]): number {
    const plan = this.planKind(kind, features);
    const driver = this.requireDriver();
    const columns = [
      ...(hasGeometryColumn(kind) ? ['geom'] : []),
      FEATURE_ID_COLUMN,
      'properties',
      'min_x',
      'min_y',
      'max_x',
      'max_y',
    ];
    const placeholders = columns.map(() => '?').join(', ');

    let tableName = '';
    driver.exec('BEGIN');
    try {
      for (const [partition, rows] of plan) {
        tableName = partition.tableName;
        const insert = driver.prepare(
          `INSERT INTO ${quoteIdent(tableName)} (${columns.join(', ')}) VALUES (${placeholders})`
        );
        for (const feature of rows) {
          insert.run(...this.rowValues(kind, feature));
        }
      }
      driver.exec('COMMIT');
    } catch (error) {
      if (driver.inTransaction()) {
        driver.exec('ROLLBACK');
      }
      throw new PartitionWriteFailedError(tableName, this.filePath, asError(error));
    }
    return features.length;
  }
}
