/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { logger } from 'hono/logger';

import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import type {
  AccessGate,
  BookdropService,
  IngestService,
  StatusService,
} from '../services/index.js';

import { createCallerMiddleware } from './middleware/caller.js';
import { createBookdropRoutes } from './routes/bookdrop.js';
import { createHealthRoutes } from './routes/health.js';
import { createIngestRoutes } from './routes/ingest.js';
import { createPreferenceRoutes } from './routes/preferences.js';
import { createStatusRoutes } from './routes/status.js';

/**
 * Services the HTTP surface delegates to
 */
export interface AppDeps {
  accessGate: AccessGate;
  ingestService: IngestService;
  bookdropService: BookdropService;
  statusService: StatusService;
  logger?: Logger;
}

const PROTECTED_PREFIXES = [
  '/api/v1/status',
  '/api/v1/ingest',
  '/api/v1/preferences',
  '/api/v1/libraries',
  '/api/v1/bookdrop/*',
];

/**
 * Create the main Hono application
 */
export function createApp(deps: AppDeps): Hono {
  const { accessGate, ingestService, bookdropService, statusService } = deps;
  const log = deps.logger ?? createLogger('http');
  const app = new Hono();

  // Global middleware
  app.use('*', logger((message) => log.info(message)));

  // Public routes (no caller identity)
  app.route('/api/v1', createHealthRoutes());

  // Caller identity for everything else
  const callerMiddleware = createCallerMiddleware();
  for (const prefix of PROTECTED_PREFIXES) {
    app.use(prefix, callerMiddleware);
  }

  app.route('/api/v1', createStatusRoutes({ statusService, accessGate }));
  app.route('/api/v1', createIngestRoutes({ ingestService }));
  app.route('/api/v1', createPreferenceRoutes({ ingestService }));
  app.route('/api/v1', createBookdropRoutes({ bookdropService }));

  // 404 handler
  app.notFound((c) => {
    const requestId = c.get('requestId') ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    log.error('Unhandled error', { error: err, path: c.req.path });
    const requestId = c.get('requestId') ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
