/**
 * StatusService
 * Read-only summary of the running configuration
 */

import type { RemoteConfig } from '../lib/config.js';
import type { TransferPolicy } from '../types/index.js';

import type { AccessGate } from './access.service.js';

export interface ServiceStatus {
  storageRoot: string;
  allowedCallers: number;
  allowedFileTypes: string[];
  maxFileSizeMB: number;
  remote: {
    enabled: boolean;
    baseUrl: string;
    autoImport: boolean;
  };
}

export interface StatusService {
  getStatus(): ServiceStatus;
}

export function createStatusService(deps: {
  storageRoot: string;
  policy: TransferPolicy;
  accessGate: Pick<AccessGate, 'allowedCount'>;
  remote: Pick<RemoteConfig, 'enabled' | 'baseUrl' | 'autoImport'>;
}): StatusService {
  const { storageRoot, policy, accessGate, remote } = deps;

  return {
    getStatus(): ServiceStatus {
      return {
        storageRoot,
        allowedCallers: accessGate.allowedCount(),
        allowedFileTypes: [...policy.allowedFileTypes],
        maxFileSizeMB: policy.maxFileSizeMB,
        remote: {
          enabled: remote.enabled,
          baseUrl: remote.baseUrl,
          autoImport: remote.enabled && remote.autoImport,
        },
      };
    },
  };
}
