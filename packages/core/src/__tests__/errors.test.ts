import { describe, expect, it } from 'vitest';
import {
  BatchWriteError,
  GeoSyncError,
  InvalidEndpointError,
  MigrationFailedError,
  NoTableFoundError,
  PartitionIndexGapError,
  PartitionWriteFailedError,
  TransportFailureError,
  ensureGeoSyncError,
  getErrorCategory,
} from '../errors/index.js';

describe('error codes', () => {
  it('should derive categories from the code letter', () => {
    expect(getErrorCategory('GEOSYNC_V100')).toBe('validation');
    expect(getErrorCategory('GEOSYNC_R200')).toBe('request');
    expect(getErrorCategory('GEOSYNC_S301')).toBe('storage');
    expect(getErrorCategory('GEOSYNC_C500')).toBe('connection');
    expect(getErrorCategory('GEOSYNC_M700')).toBe('migration');
    expect(getErrorCategory('GEOSYNC_X900')).toBe('internal');
  });
});

describe('GeoSyncError', () => {
  it('should use the default message for a code', () => {
    const error = GeoSyncError.fromCode('GEOSYNC_S300');
    expect(error.message).toBe('Storage operation failed');
    expect(error.category).toBe('storage');
  });

  it('should format code, context and suggestion', () => {
    const error = new GeoSyncError({ code: 'GEOSYNC_X900', context: { a: 1 } });
    expect(error.format()).toBe(
      '[GEOSYNC_X900] Internal error\nContext: {"a":1}\nSuggestion: An unexpected error occurred. Please report this issue.'
    );
  });

  it('should serialize the cause chain', () => {
    const inner = new Error('SQLITE_BUSY');
    const json = GeoSyncError.wrap(inner, 'GEOSYNC_S300').toJSON();
    expect(json.cause).toMatchObject({ name: 'Error', message: 'SQLITE_BUSY' });
  });

  it('should match errors by category', () => {
    const error = new PartitionIndexGapError('Point', 2, 1);
    expect(GeoSyncError.isCategory(error, 'storage')).toBe(true);
    expect(GeoSyncError.isCategory(error, 'request')).toBe(false);
    expect(GeoSyncError.isCategory(new Error('plain'), 'storage')).toBe(false);
  });

  it('should wrap unknown values', () => {
    expect(ensureGeoSyncError('boom').message).toBe('boom');
    const same = GeoSyncError.fromCode('GEOSYNC_S300');
    expect(ensureGeoSyncError(same)).toBe(same);
  });
});

describe('typed errors', () => {
  it('InvalidEndpointError names the endpoint', () => {
    const error = new InvalidEndpointError('/spaces/{space_id}', 'missing space id');
    expect(error.message).toBe('Invalid endpoint "/spaces/{space_id}": missing space id');
    expect(GeoSyncError.isCode(error, 'GEOSYNC_R200')).toBe(true);
  });

  it('TransportFailureError carries reply tag and params', () => {
    const error = new TransportFailureError('timeout', 'statistics', { limit: 2 });
    expect(error.code).toBe('GEOSYNC_C500');
    expect(error.context).toEqual({ reason: 'timeout', replyTag: 'statistics', params: { limit: 2 } });
  });

  it('TransportFailureError uses C501 for http status failures', () => {
    const error = new TransportFailureError('http', 'iterate', {}, { statusCode: 403 });
    expect(error.code).toBe('GEOSYNC_C501');
    expect(error.statusCode).toBe(403);
  });

  it('PartitionIndexGapError explains the expected index', () => {
    const error = new PartitionIndexGapError('Point', 2, 1);
    expect(error.message).toBe('Cannot create partition Point_2: next index for "Point" is 1');
  });

  it('PartitionWriteFailedError reports table and engine text', () => {
    const error = new PartitionWriteFailedError('Point_0', '/tmp/a.gpkg', new Error('disk I/O error'));
    expect(error.message).toBe('Partition "Point_0" in /tmp/a.gpkg: disk I/O error');
  });

  it('migration errors name the table', () => {
    expect(new NoTableFoundError('Point_0').code).toBe('GEOSYNC_M701');
    const failed = new MigrationFailedError('Point_0', 'syntax error', 'DROP TABLE "Point_0"');
    expect(failed.message).toBe('Migration of "Point_0" failed: syntax error');
    expect(failed.context).toEqual({ tableName: 'Point_0', statement: 'DROP TABLE "Point_0"' });
  });

  it('BatchWriteError lists failed kinds', () => {
    const error = new BatchWriteError(
      [{ geometryKind: 'Polygon', error: new NoTableFoundError('Polygon_0') }],
      { Point: 3 }
    );
    expect(error.message).toBe('Polygon: No table "Polygon_0" found in the store catalog');
    expect(error.context).toEqual({ failedKinds: ['Polygon'], written: { Point: 3 } });
  });
});
