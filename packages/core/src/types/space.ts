import { parseWith, spaceMetadataSchema } from '../validation/schemas.js';

export interface CopyrightEntry {
  label: string;
  alt?: string;
}

/**
 * Hub-side description of a space. Unknown keys are kept as-is.
 */
export interface SpaceMetadata {
  id: string;
  title: string;
  description?: string;
  tags?: string[];
  license?: string;
  copyright?: CopyrightEntry[];
  [key: string]: unknown;
}

/** Fields the hub assigns; never sent when creating a space */
const SERVER_ASSIGNED_FIELDS = [
  'id',
  'owner',
  'createdAt',
  'updatedAt',
  'contentUpdatedAt',
  'rights',
] as const;

export type NewSpaceInfo = Omit<Partial<SpaceMetadata>, (typeof SERVER_ASSIGNED_FIELDS)[number]> & {
  title: string;
};

export function parseSpaceMetadata(value: unknown): SpaceMetadata {
  return parseWith(spaceMetadataSchema, value, 'space metadata', 'GEOSYNC_V101');
}

/**
 * Copy of `info` without server-assigned fields, ready for `addSpace`.
 */
export function prepareNewSpaceInfo(info: Partial<SpaceMetadata> & { title: string }): NewSpaceInfo {
  const copy: Record<string, unknown> = { ...info };
  for (const field of SERVER_ASSIGNED_FIELDS) {
    delete copy[field];
  }
  return { ...copy, title: info.title };
}

/**
 * Render copyright entries, in order, as display lines.
 */
export function formatCopyright(entries: readonly CopyrightEntry[]): string[] {
  return entries.map((entry) => (entry.alt ? `${entry.label}: ${entry.alt}` : entry.label));
}
