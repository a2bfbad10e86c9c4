/**
 * Bookdrop Routes
 * Manual inspection and import of the remote staging area
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { BookdropService } from '../../services/index.js';
import { BOOKDROP_FILE_STATUSES } from '../../types/index.js';
import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

const listFilesQuerySchema = z.object({
  status: z
    .string()
    .trim()
    .toUpperCase()
    .pipe(z.enum(BOOKDROP_FILE_STATUSES))
    .optional(),
  page: z.coerce.number().int().nonnegative().optional(),
  size: z.coerce.number().int().positive().optional(),
});

const importBodySchema = z
  .object({
    fileIds: z.array(z.number().int().positive()).min(1).optional(),
  })
  .default({});

interface BookdropRoutesDeps {
  bookdropService: BookdropService;
}

/**
 * Create bookdrop routes
 */
export function createBookdropRoutes(deps: BookdropRoutesDeps): Hono {
  const { bookdropService } = deps;
  const app = new Hono();

  /**
   * GET /libraries
   * Libraries and their paths, for preference selection
   */
  app.get('/libraries', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const result = await bookdropService.listLibraries(caller);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /bookdrop/files?status&page&size
   */
  app.get('/bookdrop/files', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const validation = listFilesQuerySchema.safeParse(c.req.query());
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId, 'Invalid query');
    }

    const query = validation.data;
    const result = await bookdropService.listFiles(caller, {
      ...(query.status !== undefined && { status: query.status }),
      ...(query.page !== undefined && { page: query.page }),
      ...(query.size !== undefined && { size: query.size }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /bookdrop/summary
   */
  app.get('/bookdrop/summary', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const result = await bookdropService.getSummary(caller);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /bookdrop/rescan
   */
  app.post('/bookdrop/rescan', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const result = await bookdropService.rescan(caller);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { rescanned: true }, requestId);
  });

  /**
   * POST /bookdrop/import
   * Body: { fileIds?: number[] } - without ids, every NEW file is imported
   */
  app.post('/bookdrop/import', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const validation = importBodySchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId, 'Invalid import request');
    }

    const { fileIds } = validation.data;
    const result =
      fileIds === undefined
        ? await bookdropService.importAllNew(caller)
        : await bookdropService.importFiles(caller, fileIds);

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
