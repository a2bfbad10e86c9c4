/**
 * Caller Middleware
 * Constructs CallerContext from the X-Caller-Id header
 *
 * The upstream transport has already authenticated the caller and passes
 * its integer identity along. Allow-set membership is decided by the
 * services through AccessGate.
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { CallerContext } from '../../types/index.js';

export const CALLER_HEADER = 'X-Caller-Id';

const CALLER_ID_PATTERN = /^-?\d+$/;

/**
 * Parse a caller id header value; null when absent or not an integer
 */
export function parseCallerId(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  const trimmed = raw.trim();
  if (!CALLER_ID_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Create caller middleware for protected routes
 */
export function createCallerMiddleware() {
  return async function callerMiddleware(c: Context, next: Next) {
    const requestId = nanoid();
    c.set('requestId', requestId);

    const callerId = parseCallerId(c.req.header(CALLER_HEADER));
    if (callerId === null) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: `Missing or invalid ${CALLER_HEADER} header`,
            requestId,
          },
        },
        401
      );
    }

    const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
    const userAgent = c.req.header('user-agent');

    const caller: CallerContext = {
      callerId,
      requestId,
      ...(ip !== undefined && { ip }),
      ...(userAgent !== undefined && { userAgent }),
    };

    c.set('caller', caller);
    return next();
  };
}
