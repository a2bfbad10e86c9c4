/**
 * TransferService Implementation
 *
 * SCOPE: validate one inbound transfer and stream it into the storage root
 * NOT IN SCOPE: access control, remote import, retries
 *
 * Size policy is enforced twice:
 * - against the declared/advertised size before any byte is written
 *   (skipped when unknown)
 * - against the bytes actually written; an oversize artifact is deleted
 *
 * A transport failure is reported to the caller and never retried here.
 */

import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { Readable, Transform } from 'node:stream';
import type { TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { createDeadline } from '../lib/deadline.js';
import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import type { FetchLike } from '../remote/index.js';
import { describeError } from '../remote/errors.js';
import type {
  CallerContext,
  Result,
  StoredArtifact,
  TransferRequest,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

import type { TransferValidator } from './transfer.validator.js';

/**
 * Storage abstraction interface (local disk in production)
 */
export interface TransferServiceStorage {
  root: string;
  ensureRoot: () => Promise<void>;
  createUnique: (
    fileName: string
  ) => Promise<{ path: string; handle: FileHandle }>;
  remove: (filePath: string) => Promise<void>;
}

export interface TransferOptions {
  signal?: AbortSignal;
}

/**
 * TransferService interface
 */
export interface TransferService {
  download(
    caller: CallerContext,
    request: TransferRequest,
    options?: TransferOptions
  ): Promise<Result<StoredArtifact>>;
}

export const DEFAULT_TRANSFER_TIMEOUT_MS = 5 * 60 * 1000;

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

class SizeLimitExceededError extends Error {
  constructor(readonly bytesSeen: number) {
    super(`Transfer exceeded size limit after ${bytesSeen} bytes`);
    this.name = 'SizeLimitExceededError';
  }
}

class SourceReadError extends Error {
  constructor(cause: unknown) {
    super(`Failed to read source: ${describeError(cause)}`, { cause });
    this.name = 'SourceReadError';
  }
}

/**
 * Counts bytes and fails the pipeline once the limit is passed
 */
function createByteCounter(maxBytes: number): Transform & { bytes: () => number } {
  let total = 0;
  const counter = new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      total += chunk.length;
      if (total > maxBytes) {
        callback(new SizeLimitExceededError(total));
        return;
      }
      callback(null, chunk);
    },
  });
  return Object.assign(counter, { bytes: () => total });
}

/**
 * Reduce a declared name to a bare file name inside the storage root
 */
function toStorageName(declaredName: string): string | null {
  const name = path.basename(declaredName.replace(/\\/g, '/')).trim();
  if (name === '' || name === '.' || name === '..') {
    return null;
  }
  return name;
}

function parseSourceUrl(sourceLocation: string): URL | null {
  try {
    const url = new URL(sourceLocation);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : null;
  } catch {
    return null;
  }
}

function advertisedLength(res: Response): number | null {
  const header = res.headers.get('content-length');
  if (header === null) {
    return null;
  }
  const value = Number.parseInt(header, 10);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

function formatMB(bytes: number): string {
  return `${Math.round(bytes / (1024 * 1024))} MB`;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create TransferService instance
 */
export function createTransferService(deps: {
  validator: TransferValidator;
  storage: TransferServiceStorage;
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: Logger;
}): TransferService {
  const { validator, storage } = deps;
  const doFetch: FetchLike = deps.fetch ?? ((input, init) => fetch(input, init));
  const timeoutMs = deps.timeoutMs ?? DEFAULT_TRANSFER_TIMEOUT_MS;
  const log = deps.logger ?? createLogger('transfer');

  function sizeRejected(actualOrDeclared: number): Result<never> {
    const limit = validator.maxSizeBytes();
    return failure(
      'SIZE_REJECTED',
      `File size ${actualOrDeclared} bytes exceeds maximum allowed size ${formatMB(limit)}`,
      { size: actualOrDeclared, limit }
    );
  }

  /**
   * Drain a web stream body as Node chunks; read errors are tagged
   */
  async function* readBody(
    body: ReadableStream<Uint8Array>
  ): AsyncGenerator<Uint8Array> {
    const reader = body.getReader();
    let finished = false;
    try {
      for (;;) {
        const next = await reader.read().catch((err: unknown) => {
          throw new SourceReadError(err);
        });
        if (next.done) {
          finished = true;
          return;
        }
        yield next.value;
      }
    } finally {
      if (!finished) {
        await reader.cancel().catch((err: unknown) => {
          log.debug('Source cancel failed', { error: err });
        });
      }
      reader.releaseLock();
    }
  }

  async function discard(filePath: string): Promise<void> {
    try {
      await storage.remove(filePath);
    } catch (err) {
      log.error('Failed to remove rejected artifact', { path: filePath, error: err });
    }
  }

  async function cancelBody(res: Response): Promise<void> {
    if (res.body === null) {
      return;
    }
    await res.body.cancel().catch((err: unknown) => {
      log.debug('Response body cancel failed', { error: err });
    });
  }

  return {
    /**
     * Stream the source into a new, uniquely named artifact
     */
    async download(
      caller: CallerContext,
      request: TransferRequest,
      options?: TransferOptions
    ): Promise<Result<StoredArtifact>> {
      const fileName = toStorageName(request.declaredName);
      if (fileName === null) {
        return failure('VALIDATION_ERROR', 'A file name is required');
      }

      // 1. Type policy
      if (!validator.isTypeAllowed(fileName)) {
        const extension = validator.extensionOf(fileName);
        return failure(
          'TYPE_REJECTED',
          `File type not allowed: ${extension === '' ? '(no extension)' : extension}`,
          { extension, allowedFileTypes: validator.policy().allowedFileTypes }
        );
      }

      // Best-effort check against the size the sender declared
      if (
        request.declaredSize !== undefined &&
        !validator.isSizeAllowed(request.declaredSize)
      ) {
        return sizeRejected(request.declaredSize);
      }

      const sourceUrl = parseSourceUrl(request.sourceLocation);
      if (sourceUrl === null) {
        return failure(
          'VALIDATION_ERROR',
          'sourceLocation must be an http(s) URL'
        );
      }

      log.info('Processing transfer', {
        callerId: caller.callerId,
        requestId: caller.requestId,
        fileName,
        declaredSize: request.declaredSize,
      });

      const deadline = createDeadline(timeoutMs, options?.signal);
      try {
        // 2. Open the source
        let res: Response;
        try {
          res = await doFetch(sourceUrl.toString(), {
            method: 'GET',
            signal: deadline.signal,
          });
        } catch (err) {
          log.error('Failed to download file', {
            url: sourceUrl.origin,
            error: err,
          });
          return failure(
            'TRANSPORT_FAILURE',
            `Failed to download file: ${describeError(err)}`
          );
        }

        if (!res.ok) {
          await cancelBody(res);
          return failure(
            'TRANSPORT_FAILURE',
            `Failed to download file: source responded with status ${res.status}`,
            { status: res.status }
          );
        }

        // 3. Advertised size, before anything touches the disk
        const advertised = advertisedLength(res);
        if (
          advertised !== null &&
          advertised > 0 &&
          !validator.isSizeAllowed(advertised)
        ) {
          await cancelBody(res);
          return sizeRejected(advertised);
        }

        // 4. Reserve a unique destination
        let destination: { path: string; handle: FileHandle };
        try {
          await storage.ensureRoot();
          destination = await storage.createUnique(fileName);
        } catch (err) {
          await cancelBody(res);
          log.error('Failed to create file', { fileName, error: err });
          return failure(
            'STORAGE_FAILURE',
            `Failed to create file: ${describeError(err)}`
          );
        }

        // 5. Stream-copy, counting bytes
        const counter = createByteCounter(validator.maxSizeBytes());
        try {
          const source =
            res.body === null ? Readable.from([]) : Readable.from(readBody(res.body));
          await pipeline(
            source,
            counter,
            destination.handle.createWriteStream()
          );
        } catch (err) {
          await discard(destination.path);
          if (err instanceof SizeLimitExceededError) {
            return sizeRejected(err.bytesSeen);
          }
          if (err instanceof SourceReadError || deadline.signal.aborted) {
            log.error('Transfer interrupted', { path: destination.path, error: err });
            return failure(
              'TRANSPORT_FAILURE',
              `Failed to download file: ${describeError(err)}`
            );
          }
          log.error('Failed to save file', { path: destination.path, error: err });
          return failure(
            'STORAGE_FAILURE',
            `Failed to save file: ${describeError(err)}`
          );
        }

        // 6. Re-check what actually landed on disk
        const bytesWritten = counter.bytes();
        if (!validator.isSizeAllowed(bytesWritten)) {
          await discard(destination.path);
          return sizeRejected(bytesWritten);
        }
        if (bytesWritten === 0) {
          await discard(destination.path);
          return failure(
            'TRANSPORT_FAILURE',
            'Failed to download file: source returned no content'
          );
        }

        log.info('File downloaded successfully', {
          fileName,
          path: destination.path,
          size: bytesWritten,
        });

        return success({
          path: destination.path,
          fileName: path.basename(destination.path),
          bytesWritten,
        });
      } finally {
        deadline.dispose();
      }
    },
  };
}
