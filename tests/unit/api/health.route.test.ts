/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createHealthRoutes } from '@/api/routes/health.js';

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should return 200 with status, timestamp and version', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes());

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
        version: 'v1',
      });
    });
  });
});
