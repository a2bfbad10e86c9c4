/**
 * AccessGate Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';

import type { AccessGateAudit } from '@/services/access.service.js';
import { createAccessGate } from '@/services/access.service.js';
import { success } from '@/types/index.js';

import { createTestCaller } from '../../helpers/test-utils.js';

describe('AccessGate', () => {
  let mockAudit: { log: Mock<AccessGateAudit['log']> };

  beforeEach(() => {
    mockAudit = { log: vi.fn<AccessGateAudit['log']>().mockReturnValue(success(undefined)) };
  });

  describe('isAllowed', () => {
    it('should allow a caller in the allow-set', () => {
      const gate = createAccessGate({ allowedCallerIds: [42, 7], auditService: mockAudit });

      expect(gate.isAllowed(createTestCaller({ callerId: 42 }))).toBe(true);
    });

    it('should deny a caller outside the allow-set', () => {
      const gate = createAccessGate({ allowedCallerIds: [7], auditService: mockAudit });

      expect(gate.isAllowed(createTestCaller({ callerId: 42 }))).toBe(false);
    });

    it('should deny everyone when the allow-set is empty', () => {
      const gate = createAccessGate({ allowedCallerIds: [], auditService: mockAudit });

      expect(gate.isAllowed(createTestCaller({ callerId: 0 }))).toBe(false);
    });

    it('should audit grants and denials', () => {
      const gate = createAccessGate({ allowedCallerIds: [42], auditService: mockAudit });
      const allowed = createTestCaller({ callerId: 42 });
      const denied = createTestCaller({ callerId: 13 });

      gate.isAllowed(allowed);
      gate.isAllowed(denied);

      expect(mockAudit.log).toHaveBeenNthCalledWith(1, allowed, {
        action: 'access:granted',
        resourceType: 'caller',
        resourceId: '42',
      });
      expect(mockAudit.log).toHaveBeenNthCalledWith(2, denied, {
        action: 'access:denied',
        resourceType: 'caller',
        resourceId: '13',
      });
    });
  });

  describe('allowedCount', () => {
    it('should count distinct callers', () => {
      const gate = createAccessGate({ allowedCallerIds: [1, 2, 2, 3], auditService: mockAudit });

      expect(gate.allowedCount()).toBe(3);
    });
  });

  describe('describe', () => {
    it('should label authorized and unauthorized callers', () => {
      const gate = createAccessGate({ allowedCallerIds: [5], auditService: mockAudit });

      expect(gate.describe(5)).toBe('User 5 (authorized)');
      expect(gate.describe(6)).toBe('User 6 (unauthorized)');
    });
  });
});
