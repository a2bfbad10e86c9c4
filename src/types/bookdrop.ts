/**
 * Bookdrop Domain Types
 *
 * Mirrors the remote library service's staging area ("bookdrop"). These
 * records are owned by the remote service; this service only reads them
 * and refers to them by id.
 */

import type { Page } from './pagination.js';

export const BOOKDROP_FILE_STATUSES = [
  'NEW',
  'PROCESSED',
  'IMPORTED',
  'FAILED',
] as const;

export type BookdropFileStatus = (typeof BOOKDROP_FILE_STATUSES)[number];

/**
 * A file staged in the remote bookdrop
 */
export interface BookdropFile {
  id: number;
  fileName: string;
  filePath: string;
  fileSize: number;
  status: string;
  dateAdded: string;
  dateScanned: string;
}

export type BookdropPage = Page<BookdropFile>;

/**
 * Result of one finalize call
 */
export interface ImportOutcome {
  success: boolean;
  importedCount: number;
  failedCount: number;
  importedIds: number[];
  failedIds: number[];
  message: string;
}

/**
 * Counts per staging status
 */
export interface NotificationSummary {
  totalFiles: number;
  newFiles: number;
  processedFiles: number;
  importedFiles: number;
  failedFiles: number;
}

export interface LibraryPath {
  id: number;
  path: string;
}

export interface Library {
  id: number;
  name: string;
  paths: LibraryPath[];
}

/**
 * Optional destination pin for a finalize call
 */
export interface ImportDestination {
  libraryId?: number;
  pathId?: number;
}

/**
 * Structured error body returned by the remote service
 */
export interface RemoteErrorBody {
  message: string;
  status?: number;
  path?: string;
  timestamp?: string;
  error?: string;
}
