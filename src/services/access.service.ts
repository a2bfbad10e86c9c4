/**
 * AccessGate Implementation
 *
 * Decides whether a caller may use the pipeline at all. The allow-set is
 * fixed at construction and never changes for the process lifetime.
 *
 * GUARDRAILS:
 * - Never errors; absence from the set is a plain `false`
 * - Every decision (grant and deny) emits an audit event
 */

import type {
  AuditEvent,
  CallerContext,
  CallerIdentity,
  Result,
} from '../types/index.js';

/**
 * Minimal AuditService interface (subset needed by AccessGate)
 */
export interface AccessGateAudit {
  log: (caller: CallerContext, event: AuditEvent) => Result<void>;
}

export interface AccessGate {
  isAllowed(caller: CallerContext): boolean;
  allowedCount(): number;
  describe(callerId: CallerIdentity): string;
}

/**
 * Create AccessGate instance
 */
export function createAccessGate(deps: {
  allowedCallerIds: readonly CallerIdentity[];
  auditService: AccessGateAudit;
}): AccessGate {
  const allowed: ReadonlySet<CallerIdentity> = new Set(deps.allowedCallerIds);
  const { auditService } = deps;

  return {
    isAllowed(caller: CallerContext): boolean {
      const granted = allowed.has(caller.callerId);

      auditService.log(caller, {
        action: granted ? 'access:granted' : 'access:denied',
        resourceType: 'caller',
        resourceId: String(caller.callerId),
      });

      return granted;
    },

    allowedCount(): number {
      return allowed.size;
    },

    describe(callerId: CallerIdentity): string {
      return allowed.has(callerId)
        ? `User ${callerId} (authorized)`
        : `User ${callerId} (unauthorized)`;
    },
  };
}
