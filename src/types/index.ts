/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { ErrorCode, RemoteStatusErrorCode } from './errors.js';
export { ERROR_CODES } from './errors.js';
export type { CallerIdentity, CallerContext } from './caller.js';
export type { AuditEvent, AuditRecord } from './audit.js';
export type { PageParams, Page } from './pagination.js';
export {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  normalizePageParams,
} from './pagination.js';
export type {
  TransferRequest,
  StoredArtifact,
  TransferPolicy,
} from './transfer.js';
export type {
  UserPreference,
  PreferenceTable,
  SelectPreferenceParams,
} from './preference.js';
export { EMPTY_PREFERENCE, hasLibrary } from './preference.js';
export type {
  BookdropFileStatus,
  BookdropFile,
  BookdropPage,
  ImportOutcome,
  NotificationSummary,
  LibraryPath,
  Library,
  ImportDestination,
  RemoteErrorBody,
} from './bookdrop.js';
export { BOOKDROP_FILE_STATUSES } from './bookdrop.js';
export type {
  RetryPolicy,
  RunError,
  FailureReason,
  ImportTerminal,
  ImportRunState,
  ImportRunEvent,
  ImportRunInput,
  ImportRunResult,
} from './import.js';
export { DEFAULT_RETRY_POLICY } from './import.js';
export type { IngestStatus, IngestReceipt } from './ingest.js';
