/**
 * Bookdrop Client
 *
 * Stateless request/response mapping onto the remote library service's
 * bookdrop HTTP surface. Every call carries the bearer token, a fixed
 * per-call timeout, and the caller's optional AbortSignal.
 *
 * Wire contract (pinned; deviations are integration errors):
 *   POST /api/v1/bookdrop/rescan
 *   GET  /api/v1/bookdrop/files?status&page&size
 *   POST /api/v1/bookdrop/imports/finalize?defaultLibraryId&defaultPathId
 *        body { "fileIds": number[] }
 *   GET  /api/v1/bookdrop/notification
 *   GET  /api/v1/libraries
 */

import type { z } from 'zod';

import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import { createDeadline } from '../lib/deadline.js';
import type {
  BookdropFileStatus,
  BookdropPage,
  ImportDestination,
  ImportOutcome,
  Library,
  NotificationSummary,
  Result,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

import { classifyErrorResponse, classifyRequestError } from './errors.js';
import {
  bookdropPageSchema,
  importOutcomeSchema,
  libraryListSchema,
  notificationSummarySchema,
} from './schemas.js';

/**
 * Minimal fetch signature the client depends on
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface BookdropClientConfig {
  /** Service origin, e.g. http://library.local:6060 (no trailing slash) */
  baseUrl: string;

  /** Bearer token */
  apiToken: string;

  /** Per-call timeout in milliseconds (default 30s) */
  timeoutMs?: number;

  /** fetch override, for tests */
  fetch?: FetchLike;

  logger?: Logger;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ListStagedParams {
  status?: BookdropFileStatus;
  page: number;
  size: number;
}

/**
 * Page size used by finalizeAll when collecting staged ids
 */
export const FINALIZE_ALL_PAGE_SIZE = 1000;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export interface BookdropClient {
  /** True when both base URL and token are configured */
  isEnabled(): boolean;

  /** Ask the service to re-index its staging folder */
  rescan(options?: CallOptions): Promise<Result<void>>;

  /** Staged files, optionally filtered by status */
  listStaged(
    params: ListStagedParams,
    options?: CallOptions
  ): Promise<Result<BookdropPage>>;

  /** Promote the given staged files into the library */
  finalize(
    fileIds: number[],
    destination?: ImportDestination,
    options?: CallOptions
  ): Promise<Result<ImportOutcome>>;

  /** Finalize every staged file */
  finalizeAll(
    destination?: ImportDestination,
    options?: CallOptions
  ): Promise<Result<ImportOutcome>>;

  getNotificationSummary(
    options?: CallOptions
  ): Promise<Result<NotificationSummary>>;

  listLibraries(options?: CallOptions): Promise<Result<Library[]>>;
}

type QueryValue = string | number | undefined;

interface RequestSpec {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal | undefined;
}

interface RawResponse {
  status: number;
  text: string;
}

/**
 * Create a bookdrop client.
 * An unconfigured client is still returned; every call on it fails fast.
 */
export function createBookdropClient(config: BookdropClientConfig): BookdropClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const apiToken = config.apiToken;
  const timeoutMs = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const doFetch: FetchLike = config.fetch ?? ((input, init) => fetch(input, init));
  const log = config.logger ?? createLogger('bookdrop-client');

  function isEnabled(): boolean {
    return baseUrl !== '' && apiToken !== '';
  }

  function buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(`${baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }

  /**
   * Perform one request and return the raw body of a 2xx response
   */
  async function send(spec: RequestSpec): Promise<Result<RawResponse>> {
    if (!isEnabled()) {
      return failure(
        'REMOTE_UNCONFIGURED',
        'Remote library client is not configured'
      );
    }

    let url: string;
    try {
      url = buildUrl(spec.path, spec.query);
    } catch (err) {
      log.error('Invalid remote URL', { baseUrl, path: spec.path, error: err });
      return failure(
        'REMOTE_UNCONFIGURED',
        `Remote library base URL is not a valid URL: ${baseUrl}`
      );
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${apiToken}`,
      Accept: 'application/json',
    };
    if (spec.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const deadline = createDeadline(timeoutMs, spec.signal);
    let raw: RawResponse;
    try {
      const res = await doFetch(url, {
        method: spec.method,
        headers,
        ...(spec.body !== undefined && { body: JSON.stringify(spec.body) }),
        signal: deadline.signal,
      });
      raw = { status: res.status, text: await res.text() };
    } catch (err) {
      const cancelled = spec.signal?.aborted ?? false;
      const result = classifyRequestError(err, {
        cancelled,
        timedOut: !cancelled && deadline.signal.aborted,
        timeoutMs,
      });
      log.error('Remote request failed', {
        method: spec.method,
        path: spec.path,
        code: result.error.code,
        error: err,
      });
      return result;
    } finally {
      deadline.dispose();
    }

    log.debug('Remote response', {
      method: spec.method,
      path: spec.path,
      status: raw.status,
    });

    if (raw.status < 200 || raw.status > 299) {
      const result = classifyErrorResponse(raw.status, raw.text);
      log.warn('Remote request rejected', {
        method: spec.method,
        path: spec.path,
        status: raw.status,
        code: result.error.code,
      });
      return result;
    }

    return success(raw);
  }

  /**
   * Perform a request and validate its JSON body against schema
   */
  async function sendJson<S extends z.ZodTypeAny>(
    spec: RequestSpec,
    schema: S
  ): Promise<Result<z.output<S>>> {
    const response = await send(spec);
    if (!response.success) {
      return response;
    }

    let body: unknown;
    try {
      body = JSON.parse(response.data.text);
    } catch {
      return failure(
        'REMOTE_INVALID_RESPONSE',
        `Failed to decode response from ${spec.path}`,
        { status: response.data.status }
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      log.warn('Remote response did not match contract', {
        path: spec.path,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return failure(
        'REMOTE_INVALID_RESPONSE',
        `Unexpected response shape from ${spec.path}`,
        { status: response.data.status }
      );
    }

    return success(parsed.data);
  }

  async function finalize(
    fileIds: number[],
    destination?: ImportDestination,
    options?: CallOptions
  ): Promise<Result<ImportOutcome>> {
    // defaultPathId is only meaningful next to a library
    const libraryId = destination?.libraryId;
    const pathId = libraryId !== undefined ? destination?.pathId : undefined;

    log.info('Finalizing bookdrop import', {
      fileCount: fileIds.length,
      libraryId,
      pathId,
    });

    const result = await sendJson(
      {
        method: 'POST',
        path: '/api/v1/bookdrop/imports/finalize',
        query: { defaultLibraryId: libraryId, defaultPathId: pathId },
        body: { fileIds },
        signal: options?.signal,
      },
      importOutcomeSchema
    );

    if (result.success) {
      log.info('Finalize completed', {
        importedCount: result.data.importedCount,
        failedCount: result.data.failedCount,
        success: result.data.success,
      });
    }
    return result;
  }

  async function listStaged(
    params: ListStagedParams,
    options?: CallOptions
  ): Promise<Result<BookdropPage>> {
    return sendJson(
      {
        method: 'GET',
        path: '/api/v1/bookdrop/files',
        query: { status: params.status, page: params.page, size: params.size },
        signal: options?.signal,
      },
      bookdropPageSchema
    );
  }

  return {
    isEnabled,

    async rescan(options?: CallOptions): Promise<Result<void>> {
      const result = await send({
        method: 'POST',
        path: '/api/v1/bookdrop/rescan',
        signal: options?.signal,
      });
      if (!result.success) {
        return result;
      }
      log.info('Bookdrop rescanned');
      return success(undefined);
    },

    listStaged,

    finalize,

    async finalizeAll(
      destination?: ImportDestination,
      options?: CallOptions
    ): Promise<Result<ImportOutcome>> {
      if (!isEnabled()) {
        return failure(
          'REMOTE_UNCONFIGURED',
          'Remote library client is not configured'
        );
      }

      const staged = await listStaged(
        { page: 0, size: FINALIZE_ALL_PAGE_SIZE },
        options
      );
      if (!staged.success) {
        return failure(
          staged.error.code,
          `Failed to get bookdrop files: ${staged.error.message}`,
          staged.error.details
        );
      }

      if (staged.data.content.length === 0) {
        return success({
          success: true,
          importedCount: 0,
          failedCount: 0,
          importedIds: [],
          failedIds: [],
          message: 'No files to import',
        });
      }

      const fileIds = staged.data.content.map((file) => file.id);
      return finalize(fileIds, destination, options);
    },

    async getNotificationSummary(
      options?: CallOptions
    ): Promise<Result<NotificationSummary>> {
      return sendJson(
        {
          method: 'GET',
          path: '/api/v1/bookdrop/notification',
          signal: options?.signal,
        },
        notificationSummarySchema
      );
    },

    async listLibraries(options?: CallOptions): Promise<Result<Library[]>> {
      return sendJson(
        { method: 'GET', path: '/api/v1/libraries', signal: options?.signal },
        libraryListSchema
      );
    },
  };
}
