/**
 * JSON File Persistence for PreferenceStore
 *
 * File shape: `{ "<callerId>": { libraryId, pathId, libraryName, pathName } }`
 *
 * Writes go to a sibling temp file which is then renamed over the target,
 * so a reader never sees a half-written table.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import type { PreferenceTable, UserPreference } from '../types/index.js';

import type { PreferenceStoreDb } from './preference.service.js';

const preferenceSchema = z.object({
  libraryId: z.number().int().nonnegative(),
  pathId: z.number().int().nonnegative().default(0),
  libraryName: z.string().default(''),
  pathName: z.string().default(''),
});

const tableSchema = z.record(
  z.string().regex(/^-?\d+$/, 'caller id keys must be integers'),
  preferenceSchema
);

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Decode the persisted JSON into a table; throws on malformed content
 */
export function parsePreferenceTable(raw: string): PreferenceTable {
  const parsed = tableSchema.parse(JSON.parse(raw));
  const table: PreferenceTable = new Map();
  for (const [key, value] of Object.entries(parsed)) {
    const preference: UserPreference = {
      libraryId: value.libraryId,
      pathId: value.pathId,
      libraryName: value.libraryName,
      pathName: value.pathName,
    };
    table.set(Number(key), preference);
  }
  return table;
}

export function serializePreferenceTable(table: PreferenceTable): string {
  const out: Record<string, UserPreference> = {};
  for (const [callerId, preference] of table) {
    out[String(callerId)] = preference;
  }
  return `${JSON.stringify(out, null, 2)}\n`;
}

/**
 * Create file-backed persistence for preferences
 */
export function createPreferenceFileDb(deps: {
  filePath: string;
  logger?: Logger;
}): PreferenceStoreDb {
  const { filePath } = deps;
  const log = deps.logger ?? createLogger('preferences-file');

  return {
    async load(): Promise<PreferenceTable | null> {
      let raw: string;
      try {
        raw = await fs.readFile(filePath, 'utf8');
      } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') {
          return null;
        }
        throw err;
      }
      return parsePreferenceTable(raw);
    },

    async save(table: PreferenceTable): Promise<void> {
      await fs.mkdir(path.dirname(filePath), { recursive: true });

      const tmp = `${filePath}.tmp-${nanoid()}`;
      try {
        await fs.writeFile(tmp, serializePreferenceTable(table), 'utf8');
        await fs.rename(tmp, filePath);
      } catch (err) {
        await fs.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
          log.warn('Failed to remove temp preferences file', {
            path: tmp,
            error: cleanupErr,
          });
        });
        throw err;
      }
    },
  };
}
