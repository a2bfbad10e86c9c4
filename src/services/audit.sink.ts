/**
 * Logger-backed audit sink
 * Audit records go to the structured log under the 'audit' scope
 */

import type { Logger } from '../lib/logger.js';
import type { AuditRecord } from '../types/index.js';

import type { AuditServiceSink } from './audit.service.js';

export function createLoggerAuditSink(logger: Logger): AuditServiceSink {
  return {
    write(record: AuditRecord): void {
      logger.info(record.action, {
        callerId: record.callerId,
        resourceType: record.resourceType,
        resourceId: record.resourceId,
        requestId: record.requestId,
        ip: record.ipAddress,
        ...record.details,
      });
    },
  };
}
