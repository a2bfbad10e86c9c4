/**
 * Error Codes
 *
 * Every Failure carries one of these codes. The REMOTE_* family is produced
 * only by the bookdrop client; ingestion and gate codes are terminal and
 * reported to the caller as-is.
 */

export const ERROR_CODES = [
  // Access
  'UNAUTHORIZED',
  'VALIDATION_ERROR',
  'NOT_FOUND',

  // Transfer policy and execution
  'TYPE_REJECTED',
  'SIZE_REJECTED',
  'TRANSPORT_FAILURE',
  'STORAGE_FAILURE',

  // Remote library service
  'REMOTE_UNCONFIGURED',
  'REMOTE_INVALID_CREDENTIAL',
  'REMOTE_FORBIDDEN',
  'REMOTE_NOT_FOUND',
  'REMOTE_BAD_REQUEST',
  'REMOTE_INTERNAL',
  'REMOTE_SERVICE_UNAVAILABLE',
  'REMOTE_NETWORK_ERROR',
  'REMOTE_TIMEOUT',
  'REMOTE_INVALID_RESPONSE',

  // Import orchestration
  'ORCHESTRATION_TIMEOUT',

  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * Codes that originate from an HTTP status returned by the remote service
 */
export type RemoteStatusErrorCode = Extract<
  ErrorCode,
  | 'REMOTE_INVALID_CREDENTIAL'
  | 'REMOTE_FORBIDDEN'
  | 'REMOTE_NOT_FOUND'
  | 'REMOTE_BAD_REQUEST'
  | 'REMOTE_INTERNAL'
  | 'REMOTE_SERVICE_UNAVAILABLE'
>;
