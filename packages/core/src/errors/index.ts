/**
 * GeoSync error system
 *
 * Every failure carries a stable code (GEOSYNC_R200, GEOSYNC_S301, ...),
 * a category, a suggestion and structured context.
 *
 * @example
 * ```typescript
 * import { GeoSyncError, TransportFailureError } from '@geosync/core';
 *
 * reply.result.catch((error) => {
 *   if (error instanceof TransportFailureError && error.reason === 'timeout') {
 *     // retry the same page with error.params
 *   }
 * });
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  BatchWriteError,
  GeoSyncError,
  InvalidEndpointError,
  MigrationFailedError,
  NoTableFoundError,
  PartitionIndexGapError,
  PartitionWriteFailedError,
  StorageError,
  TransportFailureError,
  ValidationError,
  ensureGeoSyncError,
  type FieldValidationIssue,
  type GeoSyncErrorOptions,
  type KindFailure,
  type SerializedGeoSyncError,
  type TransportFailureReason,
} from './geosync-error.js';
