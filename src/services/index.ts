/**
 * Service Layer Exports
 *
 * All business logic lives here. Services return Result<T> and receive
 * their collaborators through factory deps.
 */

// AuditService
export type { AuditService, AuditServiceSink } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createLoggerAuditSink } from './audit.sink.js';

// AccessGate
export type { AccessGate, AccessGateAudit } from './access.service.js';
export { createAccessGate } from './access.service.js';

// Transfer
export type { TransferValidator } from './transfer.validator.js';
export { createTransferValidator } from './transfer.validator.js';
export type {
  TransferService,
  TransferServiceStorage,
  TransferOptions,
} from './transfer.service.js';
export {
  createTransferService,
  DEFAULT_TRANSFER_TIMEOUT_MS,
} from './transfer.service.js';
export { createLocalFileStorage, candidatePath } from './file.storage.js';

// PreferenceStore
export type {
  PreferenceStore,
  PreferenceStoreDb,
  DestinationDefaults,
} from './preference.service.js';
export {
  createPreferenceStore,
  resolveImportDestination,
} from './preference.service.js';
export { createPreferenceFileDb } from './preference.storage.js';

// IngestService
export type {
  IngestService,
  IngestServiceAudit,
  IngestServiceDeps,
} from './ingest.service.js';
export { createIngestService } from './ingest.service.js';

// BookdropService
export type {
  BookdropService,
  BookdropServiceAudit,
  ListFilesParams,
} from './bookdrop.service.js';
export { createBookdropService, IMPORT_ALL_PAGE_SIZE } from './bookdrop.service.js';

// StatusService
export type { StatusService, ServiceStatus } from './status.service.js';
export { createStatusService } from './status.service.js';
