/**
 * Preference Types
 *
 * One destination choice per caller, last write wins
 */

import type { CallerIdentity } from './caller.js';

export interface UserPreference {
  libraryId: number;
  pathId: number;
  libraryName: string;
  pathName: string;
}

/**
 * Zero value returned when a caller has no preference
 */
export const EMPTY_PREFERENCE: Readonly<UserPreference> = Object.freeze({
  libraryId: 0,
  pathId: 0,
  libraryName: '',
  pathName: '',
});

/**
 * Snapshot of the whole table, as persisted
 */
export type PreferenceTable = Map<CallerIdentity, UserPreference>;

/**
 * Parameters for selecting a destination.
 * Names may be omitted and resolved from the remote library list.
 */
export interface SelectPreferenceParams {
  libraryId: number;
  pathId?: number;
  libraryName?: string;
  pathName?: string;
}

/**
 * True when the caller has picked a library
 */
export function hasLibrary(preference: UserPreference): boolean {
  return preference.libraryId > 0;
}
