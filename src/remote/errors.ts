/**
 * Remote error classification
 *
 * Maps a non-success HTTP response or a failed request onto the REMOTE_*
 * error codes.
 */

import type { Failure, RemoteStatusErrorCode } from '../types/index.js';
import { failure } from '../types/index.js';

import { remoteErrorBodySchema } from './schemas.js';

const STATUS_CODE_MAP: Record<number, RemoteStatusErrorCode> = {
  401: 'REMOTE_INVALID_CREDENTIAL',
  403: 'REMOTE_FORBIDDEN',
  404: 'REMOTE_NOT_FOUND',
  400: 'REMOTE_BAD_REQUEST',
  500: 'REMOTE_INTERNAL',
  503: 'REMOTE_SERVICE_UNAVAILABLE',
};

function parseJson(bodyText: string): unknown {
  try {
    return JSON.parse(bodyText);
  } catch {
    return null;
  }
}

/**
 * Classify an HTTP error response.
 * Structured bodies map by status; anything else is a generic bad request
 * carrying the raw status and body.
 */
export function classifyErrorResponse(status: number, bodyText: string): Failure {
  const parsed = remoteErrorBodySchema.safeParse(parseJson(bodyText));

  if (!parsed.success) {
    return failure(
      'REMOTE_BAD_REQUEST',
      `API request failed with status ${status}: ${bodyText}`,
      { status, body: bodyText }
    );
  }

  const body = parsed.data;
  const code = STATUS_CODE_MAP[status] ?? 'REMOTE_BAD_REQUEST';
  const message = code === 'REMOTE_INVALID_CREDENTIAL' ? 'Invalid API token' : body.message;

  return failure(code, message, {
    status,
    ...(body.error !== undefined && { remoteError: body.error }),
    ...(body.path !== undefined && { path: body.path }),
  });
}

/**
 * fetch() wraps socket errors as TypeError('fetch failed') with a cause
 */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  if (err.cause instanceof Error) {
    return `${err.message} (${err.cause.message})`;
  }
  return err.message;
}

/**
 * Classify a request that produced no response
 */
export function classifyRequestError(
  err: unknown,
  context: { timedOut: boolean; cancelled: boolean; timeoutMs: number }
): Failure {
  if (context.cancelled) {
    return failure('REMOTE_TIMEOUT', 'Request cancelled: deadline exceeded', {
      cause: 'deadline',
    });
  }
  if (context.timedOut) {
    return failure(
      'REMOTE_TIMEOUT',
      `Request timed out after ${context.timeoutMs}ms`,
      { cause: 'request_timeout' }
    );
  }
  return failure('REMOTE_NETWORK_ERROR', `Network error: ${describeError(err)}`);
}
