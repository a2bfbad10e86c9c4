/**
 * Import Orchestration Types
 *
 * SCOPE: the rescan-then-finalize run that follows a stored transfer
 */

import type { CallerIdentity } from './caller.js';
import type { ErrorCode } from './errors.js';
import type { ImportOutcome } from './bookdrop.js';

// ─────────────────────────────────────────────────────────────
// POLICY
// ─────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Total finalize calls allowed in one run */
  maxAttempts: number;

  /** Fixed wait between finalize attempts (ms) */
  retryDelayMs: number;

  /** Deadline for the whole run (ms) */
  runTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  retryDelayMs: 3000,
  runTimeoutMs: 60000,
};

// ─────────────────────────────────────────────────────────────
// STATE MACHINE
// ─────────────────────────────────────────────────────────────

export interface RunError {
  code: ErrorCode;
  message: string;
}

export type FailureReason = 'rescan' | 'finalize' | 'timeout';

export type ImportTerminal =
  | {
      status: 'imported';
      importedCount: number;
      attempts: number;
    }
  | {
      status: 'partially_imported';
      importedCount: number;
      failedCount: number;
      attempts: number;
    }
  | {
      status: 'no_new_imports';
      attempts: number;
    }
  | {
      status: 'failed';
      reason: FailureReason;
      error: RunError;
      attempts: number;
    };

export type ImportRunState =
  | { kind: 'idle' }
  | { kind: 'rescanning' }
  | { kind: 'finalizing'; attempt: number }
  | { kind: 'awaiting_processing'; attempt: number }
  | { kind: 'terminal'; terminal: ImportTerminal };

export type ImportRunEvent =
  | { type: 'start' }
  | { type: 'rescan_succeeded' }
  | { type: 'rescan_failed'; error: RunError }
  | { type: 'finalize_succeeded'; outcome: ImportOutcome }
  | { type: 'finalize_failed'; error: RunError }
  | { type: 'delay_elapsed' }
  | { type: 'deadline_exceeded' };

// ─────────────────────────────────────────────────────────────
// RUN INPUT / OUTPUT
// ─────────────────────────────────────────────────────────────

export interface ImportRunInput {
  callerId: CallerIdentity;

  /** Name of the stored file, used for logging and messages */
  fileName: string;

  /** Outer cancellation; the run also applies its own deadline */
  signal?: AbortSignal;
}

export interface ImportRunResult {
  terminal: ImportTerminal;

  /** Finalize calls actually made */
  finalizeCalls: number;

  /** One human-readable line describing the terminal state */
  message: string;
}
