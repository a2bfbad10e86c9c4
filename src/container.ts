/**
 * Service wiring
 *
 * Builds every service from AppConfig. The entry point and the
 * integration tests share this so both run the same graph.
 */

import type { Hono } from 'hono';

import { createApp } from './api/index.js';
import type { AppConfig } from './lib/index.js';
import { createLogger } from './lib/index.js';
import { createImportOrchestrator } from './orchestrator/index.js';
import type { SleepFn } from './orchestrator/index.js';
import { createBookdropClient } from './remote/index.js';
import type { BookdropClient, FetchLike } from './remote/index.js';
import {
  createAccessGate,
  createAuditService,
  createBookdropService,
  createIngestService,
  createLocalFileStorage,
  createLoggerAuditSink,
  createPreferenceFileDb,
  createPreferenceStore,
  createStatusService,
  createTransferService,
  createTransferValidator,
} from './services/index.js';
import type {
  AccessGate,
  BookdropService,
  IngestService,
  PreferenceStore,
  PreferenceStoreDb,
  StatusService,
} from './services/index.js';

export interface Container {
  app: Hono;
  accessGate: AccessGate;
  preferences: PreferenceStore;
  client: BookdropClient;
  ingestService: IngestService;
  bookdropService: BookdropService;
  statusService: StatusService;
}

/**
 * Seams replaced in tests
 */
export interface ContainerOverrides {
  /** fetch used for library service calls */
  remoteFetch?: FetchLike;

  /** fetch used to pull transfer sources */
  transferFetch?: FetchLike;

  preferencesDb?: PreferenceStoreDb;
  sleep?: SleepFn;
}

export async function createContainer(
  config: AppConfig,
  overrides: ContainerOverrides = {}
): Promise<Container> {
  const auditService = createAuditService({
    sink: createLoggerAuditSink(createLogger('audit')),
  });

  const accessGate = createAccessGate({
    allowedCallerIds: config.allowedCallerIds,
    auditService,
  });

  const policy = {
    allowedFileTypes: config.allowedFileTypes,
    maxFileSizeMB: config.maxFileSizeMB,
  };

  const transferService = createTransferService({
    validator: createTransferValidator({ policy }),
    storage: createLocalFileStorage(config.storageRoot),
    ...(overrides.transferFetch !== undefined && { fetch: overrides.transferFetch }),
  });

  const preferences = await createPreferenceStore({
    db:
      overrides.preferencesDb ??
      createPreferenceFileDb({ filePath: config.preferencesFile }),
  });

  const { remote } = config;
  const client = createBookdropClient({
    baseUrl: remote.baseUrl,
    apiToken: remote.apiToken,
    timeoutMs: remote.requestTimeoutMs,
    ...(overrides.remoteFetch !== undefined && { fetch: overrides.remoteFetch }),
  });

  const defaults = {
    ...(remote.defaultLibraryId !== undefined && { libraryId: remote.defaultLibraryId }),
    ...(remote.defaultPathId !== undefined && { pathId: remote.defaultPathId }),
  };

  const orchestrator = createImportOrchestrator({
    client,
    preferences,
    policy: {
      maxAttempts: remote.retryAttempts,
      retryDelayMs: remote.retryDelayMs,
      runTimeoutMs: remote.runTimeoutMs,
    },
    defaults,
    ...(overrides.sleep !== undefined && { sleep: overrides.sleep }),
  });

  const ingestService = createIngestService({
    accessGate,
    transferService,
    preferences,
    orchestrator,
    client,
    auditService,
    autoImport: remote.autoImport,
  });

  const bookdropService = createBookdropService({
    accessGate,
    client,
    preferences,
    auditService,
    defaults,
  });

  const statusService = createStatusService({
    storageRoot: config.storageRoot,
    policy,
    accessGate,
    remote,
  });

  const app = createApp({
    accessGate,
    ingestService,
    bookdropService,
    statusService,
  });

  return {
    app,
    accessGate,
    preferences,
    client,
    ingestService,
    bookdropService,
    statusService,
  };
}
