/**
 * GeoJSON feature model as exchanged with the hub.
 */

/** `[x, y]` or `[x, y, z]` */
export type Position = number[];

export interface PointGeometry {
  type: 'Point';
  coordinates: Position;
}

export interface MultiPointGeometry {
  type: 'MultiPoint';
  coordinates: Position[];
}

export interface LineStringGeometry {
  type: 'LineString';
  coordinates: Position[];
}

export interface MultiLineStringGeometry {
  type: 'MultiLineString';
  coordinates: Position[][];
}

export interface PolygonGeometry {
  type: 'Polygon';
  coordinates: Position[][];
}

export interface MultiPolygonGeometry {
  type: 'MultiPolygon';
  coordinates: Position[][][];
}

export interface GeometryCollection {
  type: 'GeometryCollection';
  geometries: Geometry[];
}

export type Geometry =
  | PointGeometry
  | MultiPointGeometry
  | LineStringGeometry
  | MultiLineStringGeometry
  | PolygonGeometry
  | MultiPolygonGeometry
  | GeometryCollection;

export type GeometryType = Geometry['type'];

/**
 * A hub feature. `id` is the stable identifier used for deduplication.
 */
export interface Feature {
  type: 'Feature';
  id?: string | number;
  geometry: Geometry | null;
  properties?: Record<string, unknown> | null;
}

export interface FeatureCollection {
  type: 'FeatureCollection';
  features: Feature[];
}

/** Ordered features decoded from one reply; consumed once by the store */
export type FeatureBatch = readonly Feature[];

/**
 * Geometry classification used to route features into partitions.
 * Features without geometry are `NoGeometry`.
 */
export type GeometryKind = GeometryType | 'NoGeometry';

export const GEOMETRY_KINDS: readonly GeometryKind[] = [
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
  'NoGeometry',
];

export function isGeometryKind(value: string): value is GeometryKind {
  return (GEOMETRY_KINDS as readonly string[]).includes(value);
}

export function geometryKindOf(feature: Feature): GeometryKind {
  return feature.geometry ? feature.geometry.type : 'NoGeometry';
}

/**
 * Display groups, in the order they are shown.
 */
export type GeometryGroup = 'Point' | 'Line' | 'Polygon' | 'Unknown geometry' | 'No geometry';

export const GEOMETRY_GROUP_ORDER: Record<GeometryGroup, number> = {
  Point: 0,
  Line: 1,
  Polygon: 2,
  'Unknown geometry': 3,
  'No geometry': 4,
};

export function geometryGroup(kind: GeometryKind): GeometryGroup {
  switch (kind) {
    case 'Point':
    case 'MultiPoint':
      return 'Point';
    case 'LineString':
    case 'MultiLineString':
      return 'Line';
    case 'Polygon':
    case 'MultiPolygon':
      return 'Polygon';
    case 'NoGeometry':
      return 'No geometry';
    default:
      return 'Unknown geometry';
  }
}

/** Geographic query rectangle, in CRS units */
export interface BoundingBox {
  west: number;
  south: number;
  east: number;
  north: number;
}

/** `[minX, minY, maxX, maxY]` */
export type Envelope = [number, number, number, number];

/**
 * Compute the envelope of a geometry, or null when it has no positions.
 */
export function geometryEnvelope(geometry: Geometry): Envelope | null {
  const positions: Position[] = [];
  collectPositions(geometry, positions);
  if (positions.length === 0) return null;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [x = NaN, y = NaN] of positions) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return [minX, minY, maxX, maxY];
}

function collectPositions(geometry: Geometry, out: Position[]): void {
  switch (geometry.type) {
    case 'Point':
      out.push(geometry.coordinates);
      break;
    case 'MultiPoint':
    case 'LineString':
      out.push(...geometry.coordinates);
      break;
    case 'MultiLineString':
    case 'Polygon':
      for (const ring of geometry.coordinates) out.push(...ring);
      break;
    case 'MultiPolygon':
      for (const polygon of geometry.coordinates) {
        for (const ring of polygon) out.push(...ring);
      }
      break;
    case 'GeometryCollection':
      for (const child of geometry.geometries) collectPositions(child, out);
      break;
  }
}
