import { StorageError, ValidationError, type Geometry } from '@geosync/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createBetterSqliteDriver } from './driver.js';
import {
  GPKG_APPLICATION_ID,
  bootstrapGeoPackage,
  decodeGeometry,
  encodeGeometry,
  featureTableSql,
  parseCrs,
} from './geopackage.js';
import type { SQLiteDriver } from './types.js';

describe('parseCrs', () => {
  it('should split authority and code', () => {
    expect(parseCrs('epsg:3857')).toEqual({ name: 'epsg:3857', organization: 'EPSG', code: 3857, srsId: 3857 });
  });

  it('should reject identifiers without a code', () => {
    expect(() => parseCrs('WGS84')).toThrow(ValidationError);
  });
});

describe('geometry blobs', () => {
  it('should write the GeoPackage header and envelope', () => {
    const blob = encodeGeometry({ type: 'Point', coordinates: [1, 2] }, 4326);

    expect(blob.toString('ascii', 0, 2)).toBe('GP');
    expect(blob.readUInt8(2)).toBe(0);
    expect(blob.readUInt8(3)).toBe(0b0000_0011);
    expect(blob.readInt32LE(4)).toBe(4326);
    expect([blob.readDoubleLE(8), blob.readDoubleLE(16), blob.readDoubleLE(24), blob.readDoubleLE(32)]).toEqual([
      1, 1, 2, 2,
    ]);
    // 40 byte header + 21 byte WKB point
    expect(blob.length).toBe(61);
  });

  it('should decode what it encodes', () => {
    const polygon: Geometry = {
      type: 'Polygon',
      coordinates: [
        [
          [0, 0],
          [4, 0],
          [4, 3],
          [0, 0],
        ],
      ],
    };
    const blob = encodeGeometry(polygon, 4326);
    expect([blob.readDoubleLE(8), blob.readDoubleLE(16), blob.readDoubleLE(24), blob.readDoubleLE(32)]).toEqual([
      0, 4, 0, 3,
    ]);
    expect(decodeGeometry(blob)).toEqual(polygon);
  });

  it('should reject blobs without the GP magic', () => {
    expect(() => decodeGeometry(Buffer.from('not a geometry'))).toThrow(StorageError);
  });
});

describe('bootstrapGeoPackage', () => {
  let driver: SQLiteDriver;

  beforeEach(() => {
    driver = createBetterSqliteDriver({ path: ':memory:' });
  });

  afterEach(() => {
    driver.close();
  });

  it('should stamp the header and seed the spatial reference systems', () => {
    bootstrapGeoPackage(driver);

    expect(driver.pragma('application_id')).toBe(GPKG_APPLICATION_ID);
    expect(driver.pragma('user_version')).toBe(10200);
    const srs = driver
      .prepare<{ srs_id: number }>('SELECT srs_id FROM gpkg_spatial_ref_sys ORDER BY srs_id')
      .all()
      .map((row) => row.srs_id);
    expect(srs).toEqual([-1, 0, 4326]);
  });

  it('should be safe to run twice', () => {
    bootstrapGeoPackage(driver);
    bootstrapGeoPackage(driver);
    expect(driver.prepare<{ n: number }>('SELECT COUNT(*) AS n FROM gpkg_spatial_ref_sys').get()?.n).toBe(3);
  });
});

describe('featureTableSql', () => {
  it('should type the geometry column by kind', () => {
    expect(featureTableSql('MultiPolygon_2', 'MultiPolygon')).toBe(
      'CREATE TABLE "MultiPolygon_2" (fid INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL, geom MULTIPOLYGON, xyz_id TEXT, properties TEXT, min_x REAL, min_y REAL, max_x REAL, max_y REAL)'
    );
  });

  it('should leave out the geometry column for features without geometry', () => {
    expect(featureTableSql('NoGeometry_0', 'NoGeometry')).toBe(
      'CREATE TABLE "NoGeometry_0" (fid INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL, xyz_id TEXT, properties TEXT, min_x REAL, min_y REAL, max_x REAL, max_y REAL)'
    );
  });
});
