/**
 * GeoSync Error Codes
 *
 * Error codes are structured as GEOSYNC_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - R: Request errors (R200-R299)
 * - S: Storage errors (S300-S399)
 * - C: Connection/transport errors (C500-C599)
 * - M: Migration errors (M700-M799)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  GEOSYNC_V100: {
    code: 'GEOSYNC_V100',
    message: 'Validation failed',
    suggestion: 'Check the validation issues for the offending fields.',
  },
  GEOSYNC_V101: {
    code: 'GEOSYNC_V101',
    message: 'Malformed hub reply',
    suggestion: 'The hub returned a body that is not a feature collection or space record.',
  },

  // Request errors (R200-R299)
  GEOSYNC_R200: {
    code: 'GEOSYNC_R200',
    message: 'Invalid endpoint',
    suggestion: 'Check the endpoint template and that the connection carries a space id.',
  },
  GEOSYNC_R201: {
    code: 'GEOSYNC_R201',
    message: 'Invalid request arguments',
    suggestion: 'The call needs a non-empty argument list.',
  },

  // Storage errors (S300-S399)
  GEOSYNC_S300: {
    code: 'GEOSYNC_S300',
    message: 'Storage operation failed',
    suggestion: 'Check the store file permissions and available disk space.',
  },
  GEOSYNC_S301: {
    code: 'GEOSYNC_S301',
    message: 'Partition index gap',
    suggestion: 'Partitions of one geometry kind must be created in order 0, 1, 2, ...',
  },
  GEOSYNC_S302: {
    code: 'GEOSYNC_S302',
    message: 'Partition write failed',
    suggestion: 'The storage engine refused to create or write the partition table.',
  },
  GEOSYNC_S303: {
    code: 'GEOSYNC_S303',
    message: 'Feature batch partially written',
    suggestion: 'Inspect the per-kind failures; other geometry kinds were written.',
  },
  GEOSYNC_S304: {
    code: 'GEOSYNC_S304',
    message: 'Store is closed',
    suggestion: 'Open the store again before writing.',
  },

  // Connection/transport errors (C500-C599)
  GEOSYNC_C500: {
    code: 'GEOSYNC_C500',
    message: 'Transport failure',
    suggestion: 'Check network connectivity and hub status; the page may be retried.',
  },
  GEOSYNC_C501: {
    code: 'GEOSYNC_C501',
    message: 'Hub replied with an error status',
    suggestion: 'Check the token, the space id and the request parameters.',
  },

  // Migration errors (M700-M799)
  GEOSYNC_M700: {
    code: 'GEOSYNC_M700',
    message: 'Schema migration failed',
    suggestion: 'The partition is unusable; it is dropped and recreated on next use.',
  },
  GEOSYNC_M701: {
    code: 'GEOSYNC_M701',
    message: 'No table found',
    suggestion: 'The initial table write did not produce a table in the catalog.',
  },

  // Internal errors (X900-X999)
  GEOSYNC_X900: {
    code: 'GEOSYNC_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'validation'
  | 'request'
  | 'storage'
  | 'connection'
  | 'migration'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(8);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'R':
      return 'request';
    case 'S':
      return 'storage';
    case 'C':
      return 'connection';
    case 'M':
      return 'migration';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
