/**
 * Ingest Route
 * Hand one file over for storage and (optionally) library import
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { IngestService } from '../../services/index.js';
import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

const ingestBodySchema = z.object({
  sourceLocation: z.string().trim().url('sourceLocation must be a URL'),
  declaredName: z.string().trim().min(1, 'declaredName is required').max(255),
  declaredSize: z.number().int().nonnegative().optional(),
});

interface IngestRoutesDeps {
  ingestService: Pick<IngestService, 'ingest'>;
}

/**
 * Create ingest routes
 */
export function createIngestRoutes(deps: IngestRoutesDeps): Hono {
  const { ingestService } = deps;
  const app = new Hono();

  /**
   * POST /ingest
   * Body: { sourceLocation, declaredName, declaredSize? }
   */
  app.post('/ingest', async (c) => {
    const caller = c.get('caller');
    const requestId = c.get('requestId');

    const validation = ingestBodySchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId, 'Invalid ingest request');
    }

    const body = validation.data;
    const result = await ingestService.ingest(
      caller,
      {
        sourceLocation: body.sourceLocation,
        declaredName: body.declaredName,
        ...(body.declaredSize !== undefined && { declaredSize: body.declaredSize }),
      },
      { signal: c.req.raw.signal }
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const receipt = result.data;
    return successResponse(
      c,
      {
        status: receipt.status,
        message: receipt.message,
        fileName: receipt.artifact.fileName,
        path: receipt.artifact.path,
        bytesWritten: receipt.artifact.bytesWritten,
        import:
          receipt.import === undefined
            ? null
            : {
                ...receipt.import.terminal,
                finalizeCalls: receipt.import.finalizeCalls,
              },
      },
      requestId,
      201
    );
  });

  return app;
}
