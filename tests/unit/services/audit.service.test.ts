/**
 * AuditService Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';

import type { AuditService, AuditServiceSink } from '@/services/audit.service.js';
import { createAuditService } from '@/services/audit.service.js';
import { createLoggerAuditSink } from '@/services/audit.sink.js';
import type { Logger } from '@/lib/logger.js';
import type { AuditEvent } from '@/types/index.js';

import { createTestCaller } from '../../helpers/test-utils.js';

const createTestEvent = (overrides?: Partial<AuditEvent>): AuditEvent => ({
  action: 'preference:set',
  resourceType: 'preference',
  resourceId: '42',
  details: { libraryId: 3 },
  ...overrides,
});

describe('AuditService', () => {
  let auditService: AuditService;
  let mockSink: { write: Mock<AuditServiceSink['write']> };

  beforeEach(() => {
    mockSink = { write: vi.fn<AuditServiceSink['write']>() };
    auditService = createAuditService({ sink: mockSink });
  });

  describe('log', () => {
    it('should hand a full record to the sink', () => {
      const caller = createTestCaller({
        callerId: 42,
        requestId: 'req_audit',
        ip: '10.0.0.1',
        userAgent: 'relay-test',
      });

      const result = auditService.log(caller, createTestEvent());

      expect(result.success).toBe(true);
      expect(mockSink.write).toHaveBeenCalledWith({
        timestamp: expect.any(Date),
        callerId: 42,
        action: 'preference:set',
        resourceType: 'preference',
        resourceId: '42',
        details: { libraryId: 3 },
        ipAddress: '10.0.0.1',
        userAgent: 'relay-test',
        requestId: 'req_audit',
      });
    });

    it('should default optional fields to null and empty details', () => {
      const caller = createTestCaller({ requestId: 'req_min' });

      auditService.log(caller, { action: 'bookdrop:rescan', resourceType: 'bookdrop' });

      expect(mockSink.write).toHaveBeenCalledWith(
        expect.objectContaining({
          resourceId: null,
          details: {},
          ipAddress: null,
          userAgent: null,
        })
      );
    });

    it('should return INTERNAL_ERROR when the sink throws', () => {
      mockSink.write.mockImplementation(() => {
        throw new Error('sink down');
      });

      const result = auditService.log(createTestCaller(), createTestEvent());

      expect(result).toEqual({
        success: false,
        error: { code: 'INTERNAL_ERROR', message: 'Failed to write audit log' },
      });
    });
  });
});

describe('LoggerAuditSink', () => {
  it('should log the action with the record fields', () => {
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn(),
    };
    const sink = createLoggerAuditSink(logger);

    sink.write({
      timestamp: new Date('2024-01-01T00:00:00Z'),
      callerId: 9,
      action: 'access:denied',
      resourceType: 'caller',
      resourceId: '9',
      details: { reason: 'not listed' },
      ipAddress: null,
      userAgent: null,
      requestId: 'req_sink',
    });

    expect(logger.info).toHaveBeenCalledWith('access:denied', {
      callerId: 9,
      resourceType: 'caller',
      resourceId: '9',
      requestId: 'req_sink',
      ip: null,
      reason: 'not listed',
    });
  });
});
