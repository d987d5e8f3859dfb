import {
  GEOMETRY_GROUP_ORDER,
  geometryGroup,
  type GeometryKind,
  type SpaceMetadata,
} from '@geosync/core';
import type { Partition, StoreIdentity } from './types.js';

export const STORE_FILE_EXTENSION = '.gpkg';

/** Tenths of a second since the epoch */
export function defaultUnique(now: number = Date.now()): number {
  return Math.floor(now / 100);
}

/**
 * `<spaceId>_<tags with "," replaced by "_">_<unique>.gpkg`
 */
export function storeFileName(identity: StoreIdentity): string {
  return `${identity.spaceId}_${identity.tags.replace(/,/g, '_')}_${identity.unique}${STORE_FILE_EXTENSION}`;
}

/** Backing table of partition `index` of `kind` */
export function partitionTableName(kind: GeometryKind, index: number): string {
  return `${kind}_${index}`;
}

function tagsSuffix(tags: string): string {
  return tags.length > 0 ? `-(${tags})` : '';
}

/**
 * `<title>-<id>[-(<tags>)][-<n>]`
 */
export function groupName(meta: Pick<SpaceMetadata, 'id' | 'title'>, tags: string, n?: number): string {
  const base = `${meta.title}-${meta.id}${tagsSuffix(tags)}`;
  return n === undefined ? base : `${base}-${n}`;
}

/**
 * Group name that does not collide with `existing`: when other names
 * already start with the base name, their count is appended.
 */
export function uniqueGroupName(
  meta: Pick<SpaceMetadata, 'id' | 'title'>,
  tags: string,
  existing: readonly string[]
): string {
  const base = groupName(meta, tags);
  const clashes = existing.filter((name) => name.startsWith(base)).length;
  return clashes > 0 ? groupName(meta, tags, clashes) : base;
}

/**
 * `<title>-<id>[-(<tags>)]-<kind>-<index>`
 */
export function partitionDisplayName(
  meta: Pick<SpaceMetadata, 'id' | 'title'>,
  tags: string,
  partition: Pick<Partition, 'geometryKind' | 'index'>
): string {
  return `${meta.title}-${meta.id}${tagsSuffix(tags)}-${partition.geometryKind}-${partition.index}`;
}

/**
 * Order partitions for display: by geometry group (Point, Line, Polygon,
 * unknown, none), then kind, then index.
 */
export function sortPartitionsForDisplay<P extends Pick<Partition, 'geometryKind' | 'index'>>(
  partitions: readonly P[]
): P[] {
  return [...partitions].sort((a, b) => {
    const byGroup =
      GEOMETRY_GROUP_ORDER[geometryGroup(a.geometryKind)] - GEOMETRY_GROUP_ORDER[geometryGroup(b.geometryKind)];
    if (byGroup !== 0) return byGroup;
    if (a.geometryKind !== b.geometryKind) return a.geometryKind < b.geometryKind ? -1 : 1;
    return a.index - b.index;
  });
}
