/**
 * IngestService Implementation
 *
 * SCOPE: the collaborator-facing entry point. One call per inbound file:
 * access check, transfer, then (when the library integration is on) an
 * import run. Also owns destination preference selection.
 *
 * Dependencies: AccessGate, TransferService, PreferenceStore,
 * ImportOrchestrator, BookdropClient (library lookup), AuditService
 *
 * GUARDRAILS:
 * - Result pattern required (no thrown errors)
 * - a stored file is reported as stored even when its import fails
 * - every mutation emits an audit event
 */

import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import type { ImportOrchestrator } from '../orchestrator/index.js';
import type { BookdropClient } from '../remote/index.js';
import type {
  AuditEvent,
  CallerContext,
  ImportTerminal,
  IngestReceipt,
  IngestStatus,
  Result,
  SelectPreferenceParams,
  TransferRequest,
  UserPreference,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

import type { AccessGate } from './access.service.js';
import type { PreferenceStore } from './preference.service.js';
import type { TransferService } from './transfer.service.js';

/**
 * Minimal AuditService interface (subset needed by IngestService)
 */
export interface IngestServiceAudit {
  log: (caller: CallerContext, event: AuditEvent) => Result<void>;
}

/**
 * IngestService interface
 */
export interface IngestService {
  ingest(
    caller: CallerContext,
    request: TransferRequest,
    options?: { signal?: AbortSignal }
  ): Promise<Result<IngestReceipt>>;
  getPreference(caller: CallerContext): Promise<Result<UserPreference>>;
  selectPreference(
    caller: CallerContext,
    params: SelectPreferenceParams
  ): Promise<Result<UserPreference>>;
  clearPreference(caller: CallerContext): Promise<Result<void>>;
}

export interface IngestServiceDeps {
  accessGate: AccessGate;
  transferService: TransferService;
  preferences: PreferenceStore;
  orchestrator: ImportOrchestrator;
  client: Pick<BookdropClient, 'isEnabled' | 'listLibraries'>;
  auditService: IngestServiceAudit;
  autoImport: boolean;
  logger?: Logger;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

const TERMINAL_TO_STATUS: Record<ImportTerminal['status'], IngestStatus> = {
  imported: 'imported',
  partially_imported: 'partially_imported',
  no_new_imports: 'no_new_imports',
  failed: 'import_failed',
};

function unauthorized(): Result<never> {
  return failure('UNAUTHORIZED', 'You are not authorized to use this service');
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create IngestService instance
 */
export function createIngestService(deps: IngestServiceDeps): IngestService {
  const {
    accessGate,
    transferService,
    preferences,
    orchestrator,
    client,
    auditService,
    autoImport,
  } = deps;
  const log = deps.logger ?? createLogger('ingest');

  /**
   * Fill in missing library/path names from the remote library list
   */
  async function resolvePreference(
    params: SelectPreferenceParams
  ): Promise<Result<UserPreference>> {
    const pathId = params.pathId ?? 0;
    const preference: UserPreference = {
      libraryId: params.libraryId,
      pathId,
      libraryName: params.libraryName ?? '',
      pathName: params.pathName ?? '',
    };

    const needsLibraryName = params.libraryName === undefined;
    const needsPathName = pathId > 0 && params.pathName === undefined;
    if (!client.isEnabled() || (!needsLibraryName && !needsPathName)) {
      return success(preference);
    }

    const libraries = await client.listLibraries();
    if (!libraries.success) {
      return libraries;
    }

    const library = libraries.data.find((lib) => lib.id === params.libraryId);
    if (library === undefined) {
      return failure('NOT_FOUND', `Library ${params.libraryId} not found`, {
        libraryId: params.libraryId,
      });
    }
    if (needsLibraryName) {
      preference.libraryName = library.name;
    }

    if (pathId > 0) {
      const libraryPath = library.paths.find((p) => p.id === pathId);
      if (libraryPath === undefined) {
        return failure(
          'NOT_FOUND',
          `Path ${pathId} not found in library '${library.name}'`,
          { libraryId: library.id, pathId }
        );
      }
      if (needsPathName) {
        preference.pathName = libraryPath.path;
      }
    }

    return success(preference);
  }

  return {
    async ingest(
      caller: CallerContext,
      request: TransferRequest,
      options?: { signal?: AbortSignal }
    ): Promise<Result<IngestReceipt>> {
      if (!accessGate.isAllowed(caller)) {
        log.warn('Unauthorized transfer attempt', {
          callerId: caller.callerId,
          requestId: caller.requestId,
        });
        return unauthorized();
      }

      const stored = await transferService.download(caller, request, options);
      if (!stored.success) {
        return stored;
      }
      const artifact = stored.data;

      auditService.log(caller, {
        action: 'artifact:stored',
        resourceType: 'artifact',
        resourceId: artifact.fileName,
        details: { path: artifact.path, bytesWritten: artifact.bytesWritten },
      });

      if (!autoImport || !client.isEnabled()) {
        return success({
          artifact,
          status: 'stored',
          message: `File '${artifact.fileName}' downloaded successfully`,
        });
      }

      const run = await orchestrator.run({
        callerId: caller.callerId,
        fileName: artifact.fileName,
        ...(options?.signal !== undefined && { signal: options.signal }),
      });

      auditService.log(caller, {
        action: 'artifact:import',
        resourceType: 'artifact',
        resourceId: artifact.fileName,
        details: {
          status: run.terminal.status,
          finalizeCalls: run.finalizeCalls,
        },
      });

      return success({
        artifact,
        status: TERMINAL_TO_STATUS[run.terminal.status],
        message: run.message,
        import: { terminal: run.terminal, finalizeCalls: run.finalizeCalls },
      });
    },

    async getPreference(caller: CallerContext): Promise<Result<UserPreference>> {
      if (!accessGate.isAllowed(caller)) {
        return unauthorized();
      }
      return success(await preferences.get(caller.callerId));
    },

    async selectPreference(
      caller: CallerContext,
      params: SelectPreferenceParams
    ): Promise<Result<UserPreference>> {
      if (!accessGate.isAllowed(caller)) {
        return unauthorized();
      }

      if (!Number.isInteger(params.libraryId) || params.libraryId <= 0) {
        return failure('VALIDATION_ERROR', 'libraryId must be a positive integer');
      }
      if (
        params.pathId !== undefined &&
        (!Number.isInteger(params.pathId) || params.pathId < 0)
      ) {
        return failure('VALIDATION_ERROR', 'pathId must be a non-negative integer');
      }

      const resolved = await resolvePreference(params);
      if (!resolved.success) {
        return resolved;
      }

      await preferences.set(caller.callerId, resolved.data);

      auditService.log(caller, {
        action: 'preference:set',
        resourceType: 'preference',
        resourceId: String(caller.callerId),
        details: { libraryId: resolved.data.libraryId, pathId: resolved.data.pathId },
      });

      return success(resolved.data);
    },

    async clearPreference(caller: CallerContext): Promise<Result<void>> {
      if (!accessGate.isAllowed(caller)) {
        return unauthorized();
      }

      await preferences.clear(caller.callerId);

      auditService.log(caller, {
        action: 'preference:clear',
        resourceType: 'preference',
        resourceId: String(caller.callerId),
      });

      return success(undefined);
    },
  };
}
