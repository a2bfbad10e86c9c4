/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';
import type { ZodError } from 'zod';

import type { Failure } from '../../types/index.js';
import { getErrorStatus } from '../types.js';
import type { ErrorResponse, SuccessResponse } from '../types.js';

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: Failure['error'],
  requestId: string
): Response {
  const body: ErrorResponse = {
    error: {
      code: error.code,
      message: error.message,
      details: error.details,
      requestId,
    },
  };
  return c.json(body, getErrorStatus(error.code));
}

/**
 * 400 response for a request that failed schema validation
 */
export function validationErrorResponse(
  c: Context,
  error: ZodError,
  requestId: string,
  fallbackMessage: string
): Response {
  const issue = error.issues[0];
  let message = fallbackMessage;
  if (issue !== undefined) {
    message =
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message;
  }

  const body: ErrorResponse = {
    error: {
      code: 'VALIDATION_ERROR',
      message,
      requestId,
    },
  };
  return c.json(body, 400);
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  const body: SuccessResponse<T> = {
    data,
    meta: { requestId },
  };
  return c.json(body, status);
}

/**
 * Read a JSON body; a missing or malformed body reads as undefined and is
 * left to schema validation
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}
