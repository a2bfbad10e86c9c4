/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

import type { CallerContext, ErrorCode } from '../types/index.js';

/**
 * Extended Hono context with caller
 */
declare module 'hono' {
  interface ContextVariableMap {
    caller: CallerContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

/**
 * Error code to HTTP status mapping.
 * UNAUTHORIZED here is an identified caller outside the allow-set; a
 * missing identity is rejected with 401 before any service runs.
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ContentfulStatusCode> = {
  UNAUTHORIZED: 403,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  TYPE_REJECTED: 415,
  SIZE_REJECTED: 413,
  TRANSPORT_FAILURE: 502,
  STORAGE_FAILURE: 500,
  REMOTE_UNCONFIGURED: 503,
  REMOTE_INVALID_CREDENTIAL: 502,
  REMOTE_FORBIDDEN: 502,
  REMOTE_NOT_FOUND: 404,
  REMOTE_BAD_REQUEST: 502,
  REMOTE_INTERNAL: 502,
  REMOTE_SERVICE_UNAVAILABLE: 503,
  REMOTE_NETWORK_ERROR: 502,
  REMOTE_TIMEOUT: 504,
  REMOTE_INVALID_RESPONSE: 502,
  ORCHESTRATION_TIMEOUT: 504,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ContentfulStatusCode {
  return ERROR_STATUS_MAP[code];
}
