/**
 * @geosync/storage-gpkg - partitioned GeoPackage store for hub features
 *
 * @packageDocumentation
 */

export { createBetterSqliteDriver, isMissingFileError, quoteIdent } from './driver.js';

export {
  DEFAULT_CRS,
  GPKG_APPLICATION_ID,
  GPKG_USER_VERSION,
  bootstrapGeoPackage,
  decodeGeometry,
  encodeGeometry,
  featureTableSql,
  parseCrs,
  type CrsInfo,
} from './geopackage.js';

export {
  STORE_FILE_EXTENSION,
  defaultUnique,
  groupName,
  partitionDisplayName,
  partitionTableName,
  sortPartitionsForDisplay,
  storeFileName,
  uniqueGroupName,
} from './naming.js';

export { FEATURE_ID_COLUMN, PartitionStore, type BatchWriteSummary } from './partition-store.js';

export {
  PROVENANCE_KEYS,
  loadPartitionListing,
  loadProvenance,
  type PartitionRecord,
  type StoreProvenance,
} from './provenance.js';

export {
  SchemaMigrator,
  createConstrainedTable,
  rewriteCreateTable,
  type ConflictResolution,
  type MigrationResult,
} from './schema-migrator.js';

export type {
  OpenMode,
  OpenStoreOptions,
  Partition,
  PartitionStoreConfig,
  PreparedStatement,
  RunResult,
  SQLiteDriver,
  SQLiteDriverConfig,
  StoreIdentity,
  StoredFeature,
} from './types.js';
