/**
 * Audit Types
 * Types for the AuditService
 */

import type { CallerIdentity } from './caller.js';

/**
 * Event to be recorded by the audit trail
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g., 'access:granted', 'preference:set'
  resourceType: string; // e.g., 'caller', 'artifact'
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Audit record as handed to the sink
 */
export interface AuditRecord {
  timestamp: Date;
  callerId: CallerIdentity;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string;
}
