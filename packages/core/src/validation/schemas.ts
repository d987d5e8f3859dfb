/**
 * zod schemas for everything that crosses a process boundary: hub reply
 * bodies, connection descriptors and space metadata loaded back from a
 * store's provenance record.
 *
 * @module validation
 */

import { z } from 'zod';
import { ValidationError, type FieldValidationIssue } from '../errors/geosync-error.js';
import type { Feature, Geometry } from '../types/feature.js';

const position = z.array(z.number()).min(2);

const pointSchema = z.object({ type: z.literal('Point'), coordinates: position });
const multiPointSchema = z.object({ type: z.literal('MultiPoint'), coordinates: z.array(position) });
const lineStringSchema = z.object({ type: z.literal('LineString'), coordinates: z.array(position) });
const multiLineStringSchema = z.object({
  type: z.literal('MultiLineString'),
  coordinates: z.array(z.array(position)),
});
const polygonSchema = z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(position)) });
const multiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(z.array(position))),
});

export const geometrySchema: z.ZodType<Geometry> = z.lazy(() =>
  z.union([
    pointSchema,
    multiPointSchema,
    lineStringSchema,
    multiLineStringSchema,
    polygonSchema,
    multiPolygonSchema,
    z.object({ type: z.literal('GeometryCollection'), geometries: z.array(geometrySchema) }),
  ])
);

export const featureSchema: z.ZodType<Feature> = z.object({
  type: z.literal('Feature'),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: geometrySchema.nullable(),
  properties: z.record(z.unknown()).nullable().optional(),
});

/**
 * One page of a bbox/tile/iterate/search reply. `handle` (or
 * `nextPageToken`) is the cursor for the following page.
 */
export const featurePageSchema = z.object({
  type: z.literal('FeatureCollection').optional(),
  features: z.array(featureSchema).default([]),
  handle: z.string().optional(),
  nextPageToken: z.string().optional(),
});

export type FeaturePageBody = z.infer<typeof featurePageSchema>;

export const copyrightEntrySchema = z.object({
  label: z.string(),
  alt: z.string().optional(),
});

export const spaceMetadataSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().default(''),
    description: z.string().optional(),
    tags: z.array(z.string()).optional(),
    license: z.string().optional(),
    copyright: z.array(copyrightEntrySchema).optional(),
  })
  .passthrough();

export const connectionSchema = z.object({
  server: z.string().url(),
  spaceId: z.string().min(1).optional(),
  token: z.string().optional(),
  headers: z.record(z.string()).optional(),
});

function toIssues(error: z.ZodError): FieldValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse `value` with `schema`, raising a ValidationError describing `what`.
 */
export function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  what: string,
  code: 'GEOSYNC_V100' | 'GEOSYNC_V101' = 'GEOSYNC_V100'
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(what, toIssues(result.error), code);
  }
  return result.data;
}
