/**
 * TransferValidator
 *
 * File-type and size policy. An empty allow-list means every type passes.
 */

import path from 'node:path';

import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import type { TransferPolicy } from '../types/index.js';

const BYTES_PER_MB = 1024 * 1024;

export interface TransferValidator {
  /** Lower-cased extension including the dot, '' when there is none */
  extensionOf(filename: string): string;
  isTypeAllowed(filename: string): boolean;
  isSizeAllowed(byteCount: number): boolean;
  maxSizeBytes(): number;
  policy(): Readonly<TransferPolicy>;
}

export function createTransferValidator(deps: {
  policy: TransferPolicy;
  logger?: Logger;
}): TransferValidator {
  const allowedFileTypes = deps.policy.allowedFileTypes.map((ext) =>
    ext.toLowerCase()
  );
  const allowedSet = new Set(allowedFileTypes);
  const maxBytes = deps.policy.maxFileSizeMB * BYTES_PER_MB;
  const log = deps.logger ?? createLogger('transfer-validator');

  function extensionOf(filename: string): string {
    return path.extname(filename).toLowerCase();
  }

  return {
    extensionOf,

    isTypeAllowed(filename: string): boolean {
      if (allowedSet.size === 0) {
        return true;
      }

      const extension = extensionOf(filename);
      if (allowedSet.has(extension)) {
        return true;
      }

      log.info('File type not allowed', {
        filename,
        extension,
        allowedExtensions: allowedFileTypes,
      });
      return false;
    },

    isSizeAllowed(byteCount: number): boolean {
      if (byteCount > maxBytes) {
        log.info('File size exceeds limit', {
          fileSize: byteCount,
          maxSize: maxBytes,
        });
        return false;
      }
      return true;
    },

    maxSizeBytes(): number {
      return maxBytes;
    },

    policy(): Readonly<TransferPolicy> {
      return {
        allowedFileTypes: [...allowedFileTypes],
        maxFileSizeMB: deps.policy.maxFileSizeMB,
      };
    },
  };
}
