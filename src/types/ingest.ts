/**
 * Ingest Types
 *
 * What a caller gets back after handing over one file
 */

import type { ImportTerminal } from './import.js';
import type { StoredArtifact } from './transfer.js';

export type IngestStatus =
  | 'stored'
  | 'imported'
  | 'partially_imported'
  | 'no_new_imports'
  | 'import_failed';

export interface IngestReceipt {
  artifact: StoredArtifact;
  status: IngestStatus;

  /** One line suitable for showing to the caller */
  message: string;

  /** Present when an import run followed the transfer */
  import?: {
    terminal: ImportTerminal;
    finalizeCalls: number;
  };
}
