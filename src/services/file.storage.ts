/**
 * Local Filesystem Storage Adapter
 * Implementation of TransferServiceStorage for a directory on disk
 *
 * Artifacts never overwrite each other: the destination is opened with an
 * exclusive-create flag, and on a name conflict the next suffix is tried
 * (`book.epub`, `book_1.epub`, `book_2.epub`, …). The probe is re-derived
 * from the directory on every call, so it survives restarts and two
 * concurrent transfers of one name can never share a path.
 */

import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';

import type { TransferServiceStorage } from './transfer.service.js';

/**
 * Upper bound on suffix probing for one name
 */
const MAX_SUFFIX = 10000;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Path for the k-th candidate; k = 0 is the declared name itself
 */
export function candidatePath(root: string, fileName: string, k: number): string {
  if (k === 0) {
    return path.join(root, fileName);
  }
  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);
  return path.join(root, `${base}_${k}${ext}`);
}

/**
 * Create local storage adapter rooted at `root`
 */
export function createLocalFileStorage(root: string): TransferServiceStorage {
  return {
    root,

    async ensureRoot(): Promise<void> {
      await fs.mkdir(root, { recursive: true });
    },

    /**
     * Create the first free candidate path exclusively and return its handle
     */
    async createUnique(
      fileName: string
    ): Promise<{ path: string; handle: FileHandle }> {
      for (let k = 0; k <= MAX_SUFFIX; k++) {
        const candidate = candidatePath(root, fileName, k);
        try {
          const handle = await fs.open(candidate, 'wx');
          return { path: candidate, handle };
        } catch (err) {
          if (isErrnoException(err) && err.code === 'EEXIST') {
            continue;
          }
          throw err;
        }
      }
      throw new Error(`No free file name for '${fileName}' after ${MAX_SUFFIX} attempts`);
    },

    /**
     * Delete a stored file; missing files are not an error
     */
    async remove(filePath: string): Promise<void> {
      await fs.rm(filePath, { force: true });
    },
  };
}
