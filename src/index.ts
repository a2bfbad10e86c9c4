/**
 * Application Entry Point
 *
 * Loads configuration, wires all services and starts the Hono application.
 */

import 'dotenv/config';
import { mkdir } from 'node:fs/promises';

import { serve } from '@hono/node-server';

import { createContainer } from './container.js';
import { ConfigError, createLogger, loadConfig } from './lib/index.js';
import type { AppConfig } from './lib/index.js';

const log = createLogger('server');

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    log.error(err.message);
    process.exit(1);
  }
  throw err;
}

await mkdir(config.storageRoot, { recursive: true });

const container = await createContainer(config);

log.info('Server starting', {
  port: config.port,
  storageRoot: config.storageRoot,
  allowedCallers: config.allowedCallerIds.length,
  allowedFileTypes: config.allowedFileTypes,
  maxFileSizeMB: config.maxFileSizeMB,
});
if (config.remote.enabled) {
  log.info('Library integration enabled', {
    baseUrl: config.remote.baseUrl,
    autoImport: config.remote.autoImport,
    retryAttempts: config.remote.retryAttempts,
    retryDelayMs: config.remote.retryDelayMs,
  });
} else {
  log.info('Library integration disabled');
}

const server = serve({
  fetch: container.app.fetch,
  port: config.port,
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info('Shutting down', { signal });

  await new Promise<void>((resolve) => {
    server.close((err) => {
      if (err) {
        log.error('Error closing server', { error: err });
      }
      resolve();
    });
  });
  await container.preferences.flushed();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error('Shutdown failed', { error: err });
      process.exit(1);
    });
  });
}

export { container };
