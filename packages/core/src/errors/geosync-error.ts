/**
 * GeoSyncError - structured error with a code, category and context
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a GeoSyncError
 */
export interface GeoSyncErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a GeoSyncError
 */
export interface SerializedGeoSyncError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedGeoSyncError | { name: string; message: string; stack?: string };
}

/**
 * Base error class for every failure raised by geosync packages.
 *
 * @example
 * ```typescript
 * try {
 *   store.ensurePartition('Point', 3);
 * } catch (error) {
 *   if (GeoSyncError.isCode(error, 'GEOSYNC_S301')) {
 *     // allocation order bug in the caller
 *   }
 * }
 * ```
 */
export class GeoSyncError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: GeoSyncErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'GeoSyncError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GeoSyncError);
    }
  }

  /**
   * Create a GeoSyncError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): GeoSyncError {
    return new GeoSyncError({ code, context });
  }

  /**
   * Wrap an existing error with a GeoSyncError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): GeoSyncError {
    return new GeoSyncError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isGeoSyncError(error: unknown): error is GeoSyncError {
    return error instanceof GeoSyncError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return GeoSyncError.isGeoSyncError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return GeoSyncError.isGeoSyncError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedGeoSyncError {
    const result: SerializedGeoSyncError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (GeoSyncError.isGeoSyncError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Field validation issue
 */
export interface FieldValidationIssue {
  /** Dotted path of the offending field */
  path: string;
  /** Human-readable message */
  message: string;
}

/**
 * Payload or provenance record failed schema validation
 */
export class ValidationError extends GeoSyncError {
  readonly issues: FieldValidationIssue[];

  constructor(
    what: string,
    issues: FieldValidationIssue[],
    code: 'GEOSYNC_V100' | 'GEOSYNC_V101' = 'GEOSYNC_V100'
  ) {
    const detail = issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ');
    super({
      code,
      message: `Invalid ${what}: ${detail}`,
      context: { what, issues },
    });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Malformed or under-specified request template. Never retried.
 */
export class InvalidEndpointError extends GeoSyncError {
  readonly endpoint: string;

  constructor(endpoint: string, message: string, context?: Record<string, unknown>) {
    super({
      code: 'GEOSYNC_R200',
      message: `Invalid endpoint "${endpoint}": ${message}`,
      context: { ...context, endpoint },
    });
    this.name = 'InvalidEndpointError';
    this.endpoint = endpoint;
  }
}

/**
 * Why a hub call failed at the transport level
 */
export type TransportFailureReason = 'network' | 'timeout' | 'aborted' | 'http';

/**
 * Network-level failure of one hub call. Carries the reply tag and call
 * parameters so a paging controller can retry just that page.
 */
export class TransportFailureError extends GeoSyncError {
  readonly reason: TransportFailureReason;
  readonly replyTag: string;
  readonly params: Record<string, unknown>;
  readonly statusCode?: number;

  constructor(
    reason: TransportFailureReason,
    replyTag: string,
    params: Record<string, unknown>,
    options: { message?: string; statusCode?: number; url?: string; cause?: Error } = {}
  ) {
    super({
      code: reason === 'http' ? 'GEOSYNC_C501' : 'GEOSYNC_C500',
      message: options.message ?? `Hub call "${replyTag}" failed (${reason})`,
      context: {
        reason,
        replyTag,
        params,
        ...(options.statusCode !== undefined ? { statusCode: options.statusCode } : {}),
        ...(options.url ? { url: options.url } : {}),
      },
      cause: options.cause,
    });
    this.name = 'TransportFailureError';
    this.reason = reason;
    this.replyTag = replyTag;
    this.params = params;
    this.statusCode = options.statusCode;
  }
}

/**
 * Partition requested out of allocation order
 */
export class PartitionIndexGapError extends GeoSyncError {
  constructor(geometryKind: string, requested: number, expected: number) {
    super({
      code: 'GEOSYNC_S301',
      message: `Cannot create partition ${geometryKind}_${requested}: next index for "${geometryKind}" is ${expected}`,
      context: { geometryKind, requested, expected },
    });
    this.name = 'PartitionIndexGapError';
  }
}

/**
 * The storage engine refused to create or write a partition table
 */
export class PartitionWriteFailedError extends GeoSyncError {
  readonly tableName: string;

  constructor(tableName: string, filePath: string, cause: Error) {
    super({
      code: 'GEOSYNC_S302',
      message: `Partition "${tableName}" in ${filePath}: ${cause.message}`,
      context: { tableName, filePath },
      cause,
    });
    this.name = 'PartitionWriteFailedError';
    this.tableName = tableName;
  }
}

/**
 * Schema migration found nothing to migrate
 */
export class NoTableFoundError extends GeoSyncError {
  readonly tableName: string;

  constructor(tableName: string) {
    super({
      code: 'GEOSYNC_M701',
      message: `No table "${tableName}" found in the store catalog`,
      context: { tableName },
    });
    this.name = 'NoTableFoundError';
    this.tableName = tableName;
  }
}

/**
 * A step of the schema rewrite transaction failed
 */
export class MigrationFailedError extends GeoSyncError {
  readonly tableName: string;
  readonly statement?: string;

  constructor(tableName: string, message: string, statement?: string, cause?: Error) {
    super({
      code: 'GEOSYNC_M700',
      message: `Migration of "${tableName}" failed: ${message}`,
      context: { tableName, ...(statement ? { statement } : {}) },
      cause,
    });
    this.name = 'MigrationFailedError';
    this.tableName = tableName;
    this.statement = statement;
  }
}

/**
 * Per geometry kind failure inside a feature batch
 */
export interface KindFailure {
  geometryKind: string;
  error: GeoSyncError;
}

/**
 * Raised after a batch when one or more geometry kinds could not be written.
 * The kinds not listed in `failures` were committed.
 */
export class BatchWriteError extends GeoSyncError {
  readonly failures: KindFailure[];
  readonly written: Record<string, number>;

  constructor(failures: KindFailure[], written: Record<string, number>) {
    super({
      code: 'GEOSYNC_S303',
      message: failures.map((f) => `${f.geometryKind}: ${f.error.message}`).join('; '),
      context: { failedKinds: failures.map((f) => f.geometryKind), written },
      cause: failures[0]?.error,
    });
    this.name = 'BatchWriteError';
    this.failures = failures;
    this.written = written;
  }
}

/**
 * Storage error
 */
export class StorageError extends GeoSyncError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * Helper function to ensure errors are GeoSyncErrors
 */
export function ensureGeoSyncError(
  error: unknown,
  defaultCode: ErrorCode = 'GEOSYNC_X900'
): GeoSyncError {
  if (GeoSyncError.isGeoSyncError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return GeoSyncError.wrap(error, defaultCode);
  }

  return new GeoSyncError({
    code: defaultCode,
    message: String(error),
  });
}
