/**
 * AuditService Implementation
 *
 * Purpose: append-only audit trail of access decisions and mutations.
 * Dependencies: None (lowest level service)
 */

import type {
  AuditEvent,
  AuditRecord,
  CallerContext,
  Result,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

/**
 * Sink abstraction for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceSink {
  write: (record: AuditRecord) => void;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(caller: CallerContext, event: AuditEvent): Result<void>;
}

/**
 * Build audit record from caller and event
 */
function buildRecord(caller: CallerContext, event: AuditEvent): AuditRecord {
  return {
    timestamp: new Date(),
    callerId: caller.callerId,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    ipAddress: caller.ip ?? null,
    userAgent: caller.userAgent ?? null,
    requestId: caller.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: {
  sink: AuditServiceSink;
}): AuditService {
  const { sink } = deps;

  return {
    /**
     * Record an audit event
     * No permission check - all services can log
     */
    log(caller: CallerContext, event: AuditEvent): Result<void> {
      try {
        sink.write(buildRecord(caller, event));
        return success(undefined);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },
  };
}
