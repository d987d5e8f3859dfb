/**
 * @geosync/core - shared model, errors and logging for geosync packages
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Validation
export {
  connectionSchema,
  copyrightEntrySchema,
  featurePageSchema,
  featureSchema,
  geometrySchema,
  parseWith,
  spaceMetadataSchema,
  type FeaturePageBody,
} from './validation/schemas.js';
