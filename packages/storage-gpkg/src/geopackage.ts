/**
 * GeoPackage layout: core catalog tables, feature table DDL and the
 * geometry blob encoding.
 *
 * Geometries are stored as GeoPackage binary: an 8 byte header (`GP`,
 * version, flags, srs_id), an optional envelope, then standard WKB.
 *
 * @module geopackage
 */

import {
  StorageError,
  geometryEnvelope,
  geometrySchema,
  parseWith,
  type Geometry,
  type GeometryKind,
} from '@geosync/core';
import wkx from 'wkx';
import { z } from 'zod';
import { quoteIdent } from './driver.js';
import type { SQLiteDriver } from './types.js';

/** `GPKG` */
export const GPKG_APPLICATION_ID = 0x47504b47;
/** GeoPackage 1.2 */
export const GPKG_USER_VERSION = 10200;

export const DEFAULT_CRS = 'EPSG:4326';

const WGS84_DEFINITION =
  'GEOGCS["WGS 84",DATUM["WGS_1984",SPHEROID["WGS 84",6378137,298.257223563,AUTHORITY["EPSG","7030"]],' +
  'AUTHORITY["EPSG","6326"]],PRIMEM["Greenwich",0,AUTHORITY["EPSG","8901"]],' +
  'UNIT["degree",0.0174532925199433,AUTHORITY["EPSG","9122"]],AUTHORITY["EPSG","4326"]]';

const CORE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS gpkg_spatial_ref_sys (
    srs_name TEXT NOT NULL,
    srs_id INTEGER NOT NULL PRIMARY KEY,
    organization TEXT NOT NULL,
    organization_coordsys_id INTEGER NOT NULL,
    definition TEXT NOT NULL,
    description TEXT
  );

  CREATE TABLE IF NOT EXISTS gpkg_contents (
    table_name TEXT NOT NULL PRIMARY KEY,
    data_type TEXT NOT NULL,
    identifier TEXT UNIQUE,
    description TEXT DEFAULT '',
    last_change DATETIME NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    min_x DOUBLE,
    min_y DOUBLE,
    max_x DOUBLE,
    max_y DOUBLE,
    srs_id INTEGER,
    CONSTRAINT fk_gc_r_srs_id FOREIGN KEY (srs_id) REFERENCES gpkg_spatial_ref_sys(srs_id)
  );

  CREATE TABLE IF NOT EXISTS gpkg_geometry_columns (
    table_name TEXT NOT NULL,
    column_name TEXT NOT NULL,
    geometry_type_name TEXT NOT NULL,
    srs_id INTEGER NOT NULL,
    z TINYINT NOT NULL,
    m TINYINT NOT NULL,
    CONSTRAINT pk_geom_cols PRIMARY KEY (table_name, column_name),
    CONSTRAINT uk_gc_table_name UNIQUE (table_name),
    CONSTRAINT fk_gc_tn FOREIGN KEY (table_name) REFERENCES gpkg_contents(table_name),
    CONSTRAINT fk_gc_srs FOREIGN KEY (srs_id) REFERENCES gpkg_spatial_ref_sys(srs_id)
  );
`;

/**
 * Parsed `AUTH:CODE` identifier
 */
export interface CrsInfo {
  readonly name: string;
  readonly organization: string;
  readonly code: number;
  readonly srsId: number;
}

const crsSchema = z.string().regex(/^[A-Za-z][A-Za-z0-9_]*:\d+$/, 'expected AUTH:CODE');

/**
 * @throws ValidationError for anything but `AUTH:CODE`
 */
export function parseCrs(crs: string): CrsInfo {
  const name = parseWith(crsSchema, crs, 'CRS identifier');
  const separator = name.indexOf(':');
  const organization = name.slice(0, separator).toUpperCase();
  const code = Number(name.slice(separator + 1));
  return { name, organization, code, srsId: code };
}

/**
 * Create the GeoPackage core tables and stamp the file header.
 */
export function bootstrapGeoPackage(driver: SQLiteDriver): void {
  driver.exec(`PRAGMA application_id = ${GPKG_APPLICATION_ID}`);
  driver.exec(`PRAGMA user_version = ${GPKG_USER_VERSION}`);
  driver.exec(CORE_TABLES_SQL);

  const insert = driver.prepare(
    `INSERT OR IGNORE INTO gpkg_spatial_ref_sys
      (srs_name, srs_id, organization, organization_coordsys_id, definition, description)
      VALUES (?, ?, ?, ?, ?, ?)`
  );
  insert.run('Undefined cartesian SRS', -1, 'NONE', -1, 'undefined', 'undefined cartesian coordinate reference system');
  insert.run('Undefined geographic SRS', 0, 'NONE', 0, 'undefined', 'undefined geographic coordinate reference system');
  insert.run('WGS 84 geodetic', 4326, 'EPSG', 4326, WGS84_DEFINITION, 'longitude/latitude coordinates in decimal degrees on the WGS 84 spheroid');
}

/**
 * Make sure `crs` has a row in `gpkg_spatial_ref_sys`.
 */
export function ensureSpatialRefSys(driver: SQLiteDriver, crs: CrsInfo): void {
  driver
    .prepare(
      `INSERT OR IGNORE INTO gpkg_spatial_ref_sys
        (srs_name, srs_id, organization, organization_coordsys_id, definition)
        VALUES (?, ?, ?, ?, 'undefined')`
    )
    .run(crs.name, crs.srsId, crs.organization, crs.code);
}

export function hasGeometryColumn(kind: GeometryKind): boolean {
  return kind !== 'NoGeometry';
}

/**
 * DDL for an empty partition table of `kind`.
 */
export function featureTableSql(tableName: string, kind: GeometryKind): string {
  const columns = ['fid INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL'];
  if (hasGeometryColumn(kind)) {
    columns.push(`geom ${kind.toUpperCase()}`);
  }
  columns.push('xyz_id TEXT', 'properties TEXT', 'min_x REAL', 'min_y REAL', 'max_x REAL', 'max_y REAL');
  return `CREATE TABLE ${quoteIdent(tableName)} (${columns.join(', ')})`;
}

export function extentIndexSql(tableName: string): string {
  return `CREATE INDEX ${quoteIdent(`${tableName}_extent`)} ON ${quoteIdent(tableName)} (min_x, min_y)`;
}

/**
 * Record a partition table in `gpkg_contents` (and `gpkg_geometry_columns`
 * when it has geometry).
 */
export function registerLayer(
  driver: SQLiteDriver,
  tableName: string,
  kind: GeometryKind,
  identifier: string,
  crs: CrsInfo
): void {
  const geometric = hasGeometryColumn(kind);
  driver
    .prepare('INSERT INTO gpkg_contents (table_name, data_type, identifier, srs_id) VALUES (?, ?, ?, ?)')
    .run(tableName, geometric ? 'features' : 'attributes', identifier, geometric ? crs.srsId : null);

  if (geometric) {
    driver
      .prepare(
        `INSERT INTO gpkg_geometry_columns (table_name, column_name, geometry_type_name, srs_id, z, m)
          VALUES (?, 'geom', ?, ?, 0, 0)`
      )
      .run(tableName, kind.toUpperCase(), crs.srsId);
  }
}

/**
 * Remove a partition table and its catalog rows.
 */
export function dropLayer(driver: SQLiteDriver, tableName: string): void {
  driver.exec(`DROP TABLE IF EXISTS ${quoteIdent(tableName)}`);
  driver.prepare('DELETE FROM gpkg_geometry_columns WHERE table_name = ?').run(tableName);
  driver.prepare('DELETE FROM gpkg_contents WHERE table_name = ?').run(tableName);
}

// ── Geometry blobs ──────────────────────────────────────────────────────

const MAGIC = 'GP';
const HEADER_BYTES = 8;
const FLAG_LITTLE_ENDIAN = 0b0000_0001;
const FLAG_ENVELOPE_XY = 0b0000_0010;
const FLAG_EMPTY = 0b0001_0000;

/** Envelope byte length by indicator (flag bits 1-3) */
const ENVELOPE_BYTES: Partial<Record<number, number>> = { 0: 0, 1: 32, 2: 48, 3: 48, 4: 64 };

/**
 * Encode a GeoJSON geometry as a GeoPackage geometry blob.
 */
export function encodeGeometry(geometry: Geometry, srsId: number): Buffer {
  const wkb = wkx.Geometry.parseGeoJSON(geometry).toWkb();
  const envelope = geometryEnvelope(geometry);

  const header = Buffer.alloc(envelope ? HEADER_BYTES + 32 : HEADER_BYTES);
  header.write(MAGIC, 0, 'ascii');
  header.writeUInt8(0, 2);
  header.writeUInt8(FLAG_LITTLE_ENDIAN | (envelope ? FLAG_ENVELOPE_XY : FLAG_EMPTY), 3);
  header.writeInt32LE(srsId, 4);
  if (envelope) {
    const [minX, minY, maxX, maxY] = envelope;
    header.writeDoubleLE(minX, 8);
    header.writeDoubleLE(maxX, 16);
    header.writeDoubleLE(minY, 24);
    header.writeDoubleLE(maxY, 32);
  }
  return Buffer.concat([header, wkb]);
}

/**
 * Decode a GeoPackage geometry blob back to GeoJSON.
 *
 * @throws StorageError (GEOSYNC_S300) for a blob without the `GP` header
 */
export function decodeGeometry(blob: Buffer): Geometry {
  if (blob.length < HEADER_BYTES || blob.toString('ascii', 0, 2) !== MAGIC) {
    throw new StorageError('GEOSYNC_S300', 'Not a GeoPackage geometry blob', { length: blob.length });
  }
  const indicator = (blob.readUInt8(3) >> 1) & 0b111;
  const envelopeBytes = ENVELOPE_BYTES[indicator];
  if (envelopeBytes === undefined) {
    throw new StorageError('GEOSYNC_S300', `Unknown envelope indicator ${indicator}`);
  }
  const parsed = wkx.Geometry.parse(blob.subarray(HEADER_BYTES + envelopeBytes));
  return parseWith(geometrySchema, parsed.toGeoJSON(), 'stored geometry');
}
