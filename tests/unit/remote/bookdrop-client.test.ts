/**
 * BookdropClient Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';

import type { FetchLike } from '@/remote/index.js';
import { createBookdropClient, FINALIZE_ALL_PAGE_SIZE } from '@/remote/index.js';

import {
  createFakeLibraryService,
  finalizeOutcome,
  jsonResponse,
  stagedPage,
  TEST_API_TOKEN,
  TEST_BASE_URL,
} from '../../helpers/test-utils.js';

/**
 * Never answers; rejects once the request signal aborts
 */
const hangingFetch: FetchLike = (_input, init) =>
  new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });

function createClient(fetch: FetchLike, timeoutMs?: number) {
  return createBookdropClient({
    baseUrl: `${TEST_BASE_URL}/`,
    apiToken: TEST_API_TOKEN,
    fetch,
    ...(timeoutMs !== undefined && { timeoutMs }),
  });
}

describe('BookdropClient', () => {
  // ─────────────────────────────────────────────────────────────
  // CONFIGURATION
  // ─────────────────────────────────────────────────────────────

  describe('unconfigured', () => {
    it.each([
      ['base URL', { baseUrl: '', apiToken: TEST_API_TOKEN }],
      ['token', { baseUrl: TEST_BASE_URL, apiToken: '' }],
    ])('should fail fast without a %s and send nothing', async (_label, config) => {
      const fetch = vi.fn<FetchLike>();
      const client = createBookdropClient({ ...config, fetch });

      expect(client.isEnabled()).toBe(false);
      const results = await Promise.all([
        client.rescan(),
        client.listStaged({ page: 0, size: 10 }),
        client.finalize([1]),
        client.finalizeAll(),
        client.getNotificationSummary(),
        client.listLibraries(),
      ]);

      for (const result of results) {
        expect(result).toEqual({
          success: false,
          error: {
            code: 'REMOTE_UNCONFIGURED',
            message: 'Remote library client is not configured',
          },
        });
      }
      expect(fetch).not.toHaveBeenCalled();
    });

    it('should return a failure for a base URL without a scheme', async () => {
      const fetch = vi.fn<FetchLike>();
      const client = createBookdropClient({
        baseUrl: '192.168.1.5:6060',
        apiToken: TEST_API_TOKEN,
        fetch,
      });

      const invalid = {
        success: false,
        error: {
          code: 'REMOTE_UNCONFIGURED',
          message: 'Remote library base URL is not a valid URL: 192.168.1.5:6060',
        },
      };
      expect(await client.rescan()).toEqual(invalid);
      expect(await client.listLibraries()).toEqual(invalid);
      expect(fetch).not.toHaveBeenCalled();
    });
  });

  // ─────────────────────────────────────────────────────────────
  // REQUEST SHAPES
  // ─────────────────────────────────────────────────────────────

  describe('rescan', () => {
    it('should POST with the bearer token', async () => {
      const remote = createFakeLibraryService({
        'POST /api/v1/bookdrop/rescan': () => new Response(null, { status: 200 }),
      });
      const client = createClient(remote.fetch);

      const result = await client.rescan();

      expect(result).toEqual({ success: true, data: undefined });
      expect(remote.requests).toHaveLength(1);
      expect(remote.requests[0]?.headers.authorization).toBe(`Bearer ${TEST_API_TOKEN}`);
    });

    it('should accept any 2xx status', async () => {
      const remote = createFakeLibraryService({
        'POST /api/v1/bookdrop/rescan': () => new Response(null, { status: 204 }),
      });

      const result = await createClient(remote.fetch).rescan();

      expect(result.success).toBe(true);
    });
  });

  describe('listStaged', () => {
    it('should pass status, page and size as query parameters', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/bookdrop/files': () => jsonResponse(stagedPage([1, 2])),
      });

      const result = await createClient(remote.fetch).listStaged({
        status: 'NEW',
        page: 2,
        size: 25,
      });

      expect(remote.requests[0]?.query).toEqual({ status: 'NEW', page: '2', size: '25' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.content.map((f) => f.id)).toEqual([1, 2]);
      }
    });

    it('should omit the status filter when none is given', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/bookdrop/files': () => jsonResponse(stagedPage([])),
      });

      await createClient(remote.fetch).listStaged({ page: 0, size: 50 });

      expect(remote.requests[0]?.query).toEqual({ page: '0', size: '50' });
    });

    it('should fill missing fields with zero values', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/bookdrop/files': () =>
          jsonResponse({ content: [{ id: 5, fileName: null }] }),
      });

      const result = await createClient(remote.fetch).listStaged({ page: 0, size: 1 });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.content[0]).toEqual({
          id: 5,
          fileName: '',
          filePath: '',
          fileSize: 0,
          status: '',
          dateAdded: '',
          dateScanned: '',
        });
      }
    });
  });

  describe('finalize', () => {
    it('should send the ids and destination', async () => {
      const remote = createFakeLibraryService({
        'POST /api/v1/bookdrop/imports/finalize': () => jsonResponse(finalizeOutcome([4, 5])),
      });

      const result = await createClient(remote.fetch).finalize([4, 5], {
        libraryId: 3,
        pathId: 9,
      });

      const request = remote.requests[0];
      expect(request?.query).toEqual({ defaultLibraryId: '3', defaultPathId: '9' });
      expect(request?.body).toEqual({ fileIds: [4, 5] });
      expect(request?.headers['content-type']).toBe('application/json');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.importedCount).toBe(2);
      }
    });

    it('should drop a path given without a library', async () => {
      const remote = createFakeLibraryService({
        'POST /api/v1/bookdrop/imports/finalize': () => jsonResponse(finalizeOutcome([])),
      });

      await createClient(remote.fetch).finalize([1], { pathId: 9 });

      expect(remote.requests[0]?.query).toEqual({});
    });
  });

  describe('finalizeAll', () => {
    it('should return a no-op outcome without finalizing when nothing is staged', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/bookdrop/files': () => jsonResponse(stagedPage([])),
      });

      const result = await createClient(remote.fetch).finalizeAll();

      expect(result).toEqual({
        success: true,
        data: {
          success: true,
          importedCount: 0,
          failedCount: 0,
          importedIds: [],
          failedIds: [],
          message: 'No files to import',
        },
      });
      expect(remote.calls('POST /api/v1/bookdrop/imports/finalize')).toHaveLength(0);
    });

    it('should finalize every staged id from one large page', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/bookdrop/files': () => jsonResponse(stagedPage([11, 12, 13])),
        'POST /api/v1/bookdrop/imports/finalize': () =>
          jsonResponse(finalizeOutcome([11, 12], [13])),
      });

      const result = await createClient(remote.fetch).finalizeAll({ libraryId: 2 });

      expect(remote.calls('GET /api/v1/bookdrop/files')[0]?.query).toEqual({
        page: '0',
        size: String(FINALIZE_ALL_PAGE_SIZE),
      });
      const finalize = remote.calls('POST /api/v1/bookdrop/imports/finalize')[0];
      expect(finalize?.body).toEqual({ fileIds: [11, 12, 13] });
      expect(finalize?.query).toEqual({ defaultLibraryId: '2' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.failedIds).toEqual([13]);
      }
    });

    it('should prefix a listing failure', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/bookdrop/files': () =>
          jsonResponse({ message: 'maintenance window' }, 503),
      });

      const result = await createClient(remote.fetch).finalizeAll();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('REMOTE_SERVICE_UNAVAILABLE');
        expect(result.error.message).toBe('Failed to get bookdrop files: maintenance window');
      }
    });
  });

  describe('getNotificationSummary and listLibraries', () => {
    it('should decode the summary', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/bookdrop/notification': () =>
          jsonResponse({ totalFiles: 4, newFiles: 1, processedFiles: 1, importedFiles: 2 }),
      });

      const result = await createClient(remote.fetch).getNotificationSummary();

      expect(result).toEqual({
        success: true,
        data: { totalFiles: 4, newFiles: 1, processedFiles: 1, importedFiles: 2, failedFiles: 0 },
      });
    });

    it('should decode libraries with their paths', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/libraries': () =>
          jsonResponse([{ id: 1, name: 'Main', paths: [{ id: 2, path: '/books' }] }]),
      });

      const result = await createClient(remote.fetch).listLibraries();

      expect(result).toEqual({
        success: true,
        data: [{ id: 1, name: 'Main', paths: [{ id: 2, path: '/books' }] }],
      });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // FAILURES
  // ─────────────────────────────────────────────────────────────

  describe('failures', () => {
    it('should classify an error status', async () => {
      const remote = createFakeLibraryService({
        'POST /api/v1/bookdrop/rescan': () => jsonResponse({ message: 'nope' }, 401),
      });

      const result = await createClient(remote.fetch).rescan();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('REMOTE_INVALID_CREDENTIAL');
        expect(result.error.message).toBe('Invalid API token');
      }
    });

    it('should report a network error', async () => {
      const fetch = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));

      const result = await createClient(fetch).rescan();

      expect(result).toEqual({
        success: false,
        error: { code: 'REMOTE_NETWORK_ERROR', message: 'Network error: fetch failed' },
      });
    });

    it('should time out a request that never answers', async () => {
      const result = await createClient(hangingFetch, 20).rescan();

      expect(result).toEqual({
        success: false,
        error: {
          code: 'REMOTE_TIMEOUT',
          message: 'Request timed out after 20ms',
          details: { cause: 'request_timeout' },
        },
      });
    });

    it('should stop when the caller deadline has passed', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await createClient(hangingFetch).rescan({ signal: controller.signal });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'REMOTE_TIMEOUT',
          message: 'Request cancelled: deadline exceeded',
          details: { cause: 'deadline' },
        },
      });
    });

    it('should reject a success body that is not JSON', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/libraries': () => new Response('<html>', { status: 200 }),
      });

      const result = await createClient(remote.fetch).listLibraries();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('REMOTE_INVALID_RESPONSE');
      }
    });

    it('should reject a success body of the wrong shape', async () => {
      const remote = createFakeLibraryService({
        'GET /api/v1/libraries': () => jsonResponse({ libraries: [] }),
      });

      const result = await createClient(remote.fetch).listLibraries();

      expect(result).toEqual({
        success: false,
        error: {
          code: 'REMOTE_INVALID_RESPONSE',
          message: 'Unexpected response shape from /api/v1/libraries',
          details: { status: 200 },
        },
      });
    });
  });
});
