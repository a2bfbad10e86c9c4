/**
 * Application Wiring Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { createApp } from '@/api/app.js';
import type {
  AccessGate,
  BookdropService,
  IngestService,
  StatusService,
} from '@/services/index.js';

describe('createApp', () => {
  let getStatus: StatusService['getStatus'];
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    getStatus = () => ({
      storageRoot: '/data',
      allowedCallers: 1,
      allowedFileTypes: [],
      maxFileSizeMB: 20,
      remote: { enabled: false, baseUrl: '', autoImport: false },
    });

    const accessGate: AccessGate = {
      isAllowed: (caller) => caller.callerId === 42,
      allowedCount: () => 1,
      describe: (callerId) => `User ${callerId}`,
    };
    const ingestService: IngestService = {
      ingest: vi.fn<IngestService['ingest']>(),
      getPreference: vi.fn<IngestService['getPreference']>(),
      selectPreference: vi.fn<IngestService['selectPreference']>(),
      clearPreference: vi.fn<IngestService['clearPreference']>(),
    };
    const bookdropService: BookdropService = {
      listFiles: vi.fn<BookdropService['listFiles']>(),
      rescan: vi.fn<BookdropService['rescan']>(),
      importFiles: vi.fn<BookdropService['importFiles']>(),
      importAllNew: vi.fn<BookdropService['importAllNew']>(),
      getSummary: vi.fn<BookdropService['getSummary']>(),
      listLibraries: vi.fn<BookdropService['listLibraries']>(),
    };

    app = createApp({
      accessGate,
      ingestService,
      bookdropService,
      statusService: { getStatus: () => getStatus() },
    });
  });

  it('should serve health without a caller', async () => {
    const res = await app.request('/api/v1/health');

    expect(res.status).toBe(200);
  });

  it('should require a caller on every protected prefix', async () => {
    const paths = [
      '/api/v1/status',
      '/api/v1/preferences',
      '/api/v1/libraries',
      '/api/v1/bookdrop/summary',
    ];

    for (const path of paths) {
      const res = await app.request(path);
      expect(res.status).toBe(401);
    }

    const res = await app.request('/api/v1/ingest', { method: 'POST' });
    expect(res.status).toBe(401);
  });

  it('should route an identified caller', async () => {
    const res = await app.request('/api/v1/status', { headers: { 'X-Caller-Id': '42' } });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { caller: 'User 42', maxFileSizeMB: 20 } });
  });

  it('should answer 404 for unknown endpoints', async () => {
    const res = await app.request('/api/v1/unknown');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Endpoint not found', requestId: 'unknown' },
    });
  });

  it('should convert thrown errors to 500', async () => {
    getStatus = () => {
      throw new Error('boom');
    };

    const res = await app.request('/api/v1/status', { headers: { 'X-Caller-Id': '42' } });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId: expect.any(String),
      },
    });
  });
});
