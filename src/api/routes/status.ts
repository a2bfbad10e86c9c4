/**
 * Status Route
 * Running configuration summary for allowed callers
 */

import { Hono } from 'hono';

import type { AccessGate, StatusService } from '../../services/index.js';
import { errorResponse, successResponse } from '../utils/response.js';

interface StatusRoutesDeps {
  statusService: StatusService;
  accessGate: Pick<AccessGate, 'isAllowed' | 'describe'>;
}

/**
 * Create status routes
 */
export function createStatusRoutes(deps: StatusRoutesDeps): Hono {
  const { statusService, accessGate } = deps;
  const app = new Hono();

  /**
   * GET /status
   */
  app.get('/status', (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    if (!accessGate.isAllowed(caller)) {
      return errorResponse(
        c,
        {
          code: 'UNAUTHORIZED',
          message: 'You are not authorized to use this service',
        },
        requestId
      );
    }

    return successResponse(
      c,
      {
        caller: accessGate.describe(caller.callerId),
        ...statusService.getStatus(),
      },
      requestId
    );
  });

  return app;
}
