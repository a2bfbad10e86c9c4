/**
 * BookdropService Implementation
 *
 * SCOPE: manual operations on the remote staging area, on behalf of an
 * allowed caller: list, rescan, import selected or all new files, summary,
 * library listing.
 *
 * Dependencies: AccessGate, BookdropClient, PreferenceStore, AuditService
 *
 * GUARDRAILS:
 * - Result pattern required (no thrown errors)
 * - every operation requires an allowed caller and an enabled client
 */

import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import type { BookdropClient } from '../remote/index.js';
import type {
  AuditEvent,
  BookdropFileStatus,
  BookdropPage,
  CallerContext,
  ImportOutcome,
  Library,
  NotificationSummary,
  PageParams,
  Result,
} from '../types/index.js';
import { success, failure, normalizePageParams } from '../types/index.js';

import type { AccessGate } from './access.service.js';
import type { DestinationDefaults, PreferenceStore } from './preference.service.js';
import { resolveImportDestination } from './preference.service.js';

/**
 * Minimal AuditService interface (subset needed by BookdropService)
 */
export interface BookdropServiceAudit {
  log: (caller: CallerContext, event: AuditEvent) => Result<void>;
}

export interface ListFilesParams extends Partial<PageParams> {
  status?: BookdropFileStatus;
}

/**
 * BookdropService interface
 */
export interface BookdropService {
  listFiles(
    caller: CallerContext,
    params?: ListFilesParams
  ): Promise<Result<BookdropPage>>;
  rescan(caller: CallerContext): Promise<Result<void>>;
  importFiles(
    caller: CallerContext,
    fileIds: number[]
  ): Promise<Result<ImportOutcome>>;
  importAllNew(caller: CallerContext): Promise<Result<ImportOutcome>>;
  getSummary(caller: CallerContext): Promise<Result<NotificationSummary>>;
  listLibraries(caller: CallerContext): Promise<Result<Library[]>>;
}

/**
 * Page requested when collecting NEW files for a bulk import
 */
export const IMPORT_ALL_PAGE_SIZE = 100;

/**
 * Create BookdropService instance
 */
export function createBookdropService(deps: {
  accessGate: AccessGate;
  client: BookdropClient;
  preferences: Pick<PreferenceStore, 'get'>;
  auditService: BookdropServiceAudit;
  defaults?: DestinationDefaults;
  logger?: Logger;
}): BookdropService {
  const { accessGate, client, preferences, auditService } = deps;
  const defaults = deps.defaults ?? {};
  const log = deps.logger ?? createLogger('bookdrop');

  /**
   * Access and configuration checks shared by every operation
   */
  function guard(caller: CallerContext): Result<void> {
    if (!accessGate.isAllowed(caller)) {
      return failure('UNAUTHORIZED', 'You are not authorized to use this service');
    }
    if (!client.isEnabled()) {
      return failure(
        'REMOTE_UNCONFIGURED',
        'Library integration is not configured. Set REMOTE_API_URL and REMOTE_API_TOKEN.'
      );
    }
    return success(undefined);
  }

  async function finalizeFor(
    caller: CallerContext,
    fileIds: number[]
  ): Promise<Result<ImportOutcome>> {
    const destination = await resolveImportDestination(
      preferences,
      caller.callerId,
      defaults
    );

    const result = await client.finalize(fileIds, destination);
    if (!result.success) {
      return result;
    }

    auditService.log(caller, {
      action: 'bookdrop:import',
      resourceType: 'bookdrop',
      details: {
        fileIds,
        libraryId: destination.libraryId,
        pathId: destination.pathId,
        importedCount: result.data.importedCount,
        failedCount: result.data.failedCount,
      },
    });

    return result;
  }

  return {
    async listFiles(
      caller: CallerContext,
      params: ListFilesParams = {}
    ): Promise<Result<BookdropPage>> {
      const allowed = guard(caller);
      if (!allowed.success) {
        return allowed;
      }

      const { page, size } = normalizePageParams(params);
      return client.listStaged({
        ...(params.status !== undefined && { status: params.status }),
        page,
        size,
      });
    },

    async rescan(caller: CallerContext): Promise<Result<void>> {
      const allowed = guard(caller);
      if (!allowed.success) {
        return allowed;
      }

      const result = await client.rescan();
      if (result.success) {
        auditService.log(caller, {
          action: 'bookdrop:rescan',
          resourceType: 'bookdrop',
        });
      }
      return result;
    },

    async importFiles(
      caller: CallerContext,
      fileIds: number[]
    ): Promise<Result<ImportOutcome>> {
      const allowed = guard(caller);
      if (!allowed.success) {
        return allowed;
      }

      if (fileIds.length === 0) {
        return failure('VALIDATION_ERROR', 'fileIds must not be empty');
      }
      if (!fileIds.every((id) => Number.isInteger(id) && id > 0)) {
        return failure('VALIDATION_ERROR', 'fileIds must be positive integers');
      }

      return finalizeFor(caller, fileIds);
    },

    async importAllNew(caller: CallerContext): Promise<Result<ImportOutcome>> {
      const allowed = guard(caller);
      if (!allowed.success) {
        return allowed;
      }

      const staged = await client.listStaged({
        status: 'NEW',
        page: 0,
        size: IMPORT_ALL_PAGE_SIZE,
      });
      if (!staged.success) {
        return staged;
      }

      if (staged.data.content.length === 0) {
        return success({
          success: true,
          importedCount: 0,
          failedCount: 0,
          importedIds: [],
          failedIds: [],
          message: 'No new files found to import',
        });
      }

      const fileIds = staged.data.content.map((file) => file.id);
      log.info('Importing all new bookdrop files', {
        callerId: caller.callerId,
        count: fileIds.length,
      });
      return finalizeFor(caller, fileIds);
    },

    async getSummary(caller: CallerContext): Promise<Result<NotificationSummary>> {
      const allowed = guard(caller);
      if (!allowed.success) {
        return allowed;
      }
      return client.getNotificationSummary();
    },

    async listLibraries(caller: CallerContext): Promise<Result<Library[]>> {
      const allowed = guard(caller);
      if (!allowed.success) {
        return allowed;
      }
      return client.listLibraries();
    },
  };
}
