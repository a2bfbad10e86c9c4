/**
 * PreferenceStore Implementation
 *
 * SCOPE: per-caller library/path choice, held in memory and mirrored to
 * durable storage
 *
 * Concurrency:
 * - reads share a reader/writer lock, mutations take it exclusively
 * - every mutation schedules a flush of the whole table; the flush copies
 *   the table under the read lock and writes outside it
 * - flushes run one at a time in scheduling order, so the file always ends
 *   at the newest table
 * - flush failures are logged and do not affect the in-memory state
 */

import { ReadWriteLock } from '../lib/rw-lock.js';
import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import type {
  CallerIdentity,
  ImportDestination,
  PreferenceTable,
  UserPreference,
} from '../types/index.js';
import { EMPTY_PREFERENCE, hasLibrary } from '../types/index.js';

/**
 * Persistence port for PreferenceStore
 * Allows mocking in tests
 */
export interface PreferenceStoreDb {
  /** Table as last saved, or null when nothing was saved yet */
  load: () => Promise<PreferenceTable | null>;
  save: (table: PreferenceTable) => Promise<void>;
}

/**
 * PreferenceStore interface
 */
export interface PreferenceStore {
  get(callerId: CallerIdentity): Promise<UserPreference>;
  set(callerId: CallerIdentity, preference: UserPreference): Promise<void>;
  clear(callerId: CallerIdentity): Promise<void>;

  /** Resolves once every flush scheduled so far has settled */
  flushed(): Promise<void>;
}

/**
 * Create PreferenceStore instance, loading the persisted table first.
 * A table that cannot be loaded is logged and the store starts empty.
 */
export async function createPreferenceStore(deps: {
  db: PreferenceStoreDb;
  logger?: Logger;
}): Promise<PreferenceStore> {
  const { db } = deps;
  const log = deps.logger ?? createLogger('preferences');
  const lock = new ReadWriteLock();
  const pending = new Set<Promise<void>>();

  let table: PreferenceTable = new Map();
  try {
    const loaded = await db.load();
    if (loaded !== null) {
      table = loaded;
      log.info('Loaded user preferences', { count: table.size });
    }
  } catch (err) {
    log.error('Failed to load preferences', { error: err });
  }

  async function flush(): Promise<void> {
    const snapshot = await lock.read(() => new Map(table));
    try {
      await db.save(snapshot);
    } catch (err) {
      log.error('Failed to save preferences', { error: err });
    }
  }

  let tail: Promise<void> = Promise.resolve();

  function scheduleFlush(): void {
    const task = tail.then(flush).finally(() => {
      pending.delete(task);
    });
    tail = task;
    pending.add(task);
  }

  return {
    async get(callerId: CallerIdentity): Promise<UserPreference> {
      return lock.read(() => {
        const preference = table.get(callerId);
        return preference !== undefined ? { ...preference } : { ...EMPTY_PREFERENCE };
      });
    },

    async set(callerId: CallerIdentity, preference: UserPreference): Promise<void> {
      await lock.write(() => {
        table.set(callerId, { ...preference });
      });

      log.info('Set user preference', {
        callerId,
        libraryId: preference.libraryId,
        libraryName: preference.libraryName,
        pathId: preference.pathId,
        pathName: preference.pathName,
      });

      scheduleFlush();
    },

    async clear(callerId: CallerIdentity): Promise<void> {
      const removed = await lock.write(() => table.delete(callerId));
      if (removed) {
        log.info('Cleared user preference', { callerId });
      }
      scheduleFlush();
    },

    async flushed(): Promise<void> {
      while (pending.size > 0) {
        await Promise.all([...pending]);
      }
    },
  };
}

// ─────────────────────────────────────────────────────────────
// DESTINATION RESOLUTION
// ─────────────────────────────────────────────────────────────

export interface DestinationDefaults {
  libraryId?: number;
  pathId?: number;
}

/**
 * Caller preference first, then configured defaults, else no destination
 */
export async function resolveImportDestination(
  store: Pick<PreferenceStore, 'get'>,
  callerId: CallerIdentity,
  defaults: DestinationDefaults
): Promise<ImportDestination> {
  const preference = await store.get(callerId);
  if (hasLibrary(preference)) {
    return preference.pathId > 0
      ? { libraryId: preference.libraryId, pathId: preference.pathId }
      : { libraryId: preference.libraryId };
  }

  const destination: ImportDestination = {};
  if (defaults.libraryId !== undefined) {
    destination.libraryId = defaults.libraryId;
    if (defaults.pathId !== undefined) {
      destination.pathId = defaults.pathId;
    }
  }
  return destination;
}
