/**
 * Preference Routes
 * Read, select and clear the caller's import destination
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { IngestService } from '../../services/index.js';
import { hasLibrary } from '../../types/index.js';
import type { UserPreference } from '../../types/index.js';
import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

const selectPreferenceSchema = z.object({
  libraryId: z.number().int().positive(),
  pathId: z.number().int().nonnegative().optional(),
  libraryName: z.string().trim().min(1).optional(),
  pathName: z.string().trim().min(1).optional(),
});

interface PreferenceRoutesDeps {
  ingestService: Pick<
    IngestService,
    'getPreference' | 'selectPreference' | 'clearPreference'
  >;
}

function formatPreference(preference: UserPreference) {
  return {
    ...preference,
    configured: hasLibrary(preference),
  };
}

/**
 * Create preference routes
 */
export function createPreferenceRoutes(deps: PreferenceRoutesDeps): Hono {
  const { ingestService } = deps;
  const app = new Hono();

  /**
   * GET /preferences
   */
  app.get('/preferences', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const result = await ingestService.getPreference(caller);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatPreference(result.data), requestId);
  });

  /**
   * PUT /preferences
   * Body: { libraryId, pathId?, libraryName?, pathName? }
   */
  app.put('/preferences', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const validation = selectPreferenceSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId, 'Invalid preference');
    }

    const body = validation.data;
    const result = await ingestService.selectPreference(caller, {
      libraryId: body.libraryId,
      ...(body.pathId !== undefined && { pathId: body.pathId }),
      ...(body.libraryName !== undefined && { libraryName: body.libraryName }),
      ...(body.pathName !== undefined && { pathName: body.pathName }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatPreference(result.data), requestId);
  });

  /**
   * DELETE /preferences
   */
  app.delete('/preferences', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const result = await ingestService.clearPreference(caller);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { cleared: true }, requestId);
  });

  return app;
}
