/**
 * Import Run State Machine
 *
 * Pure transition function for one rescan-then-finalize run:
 *
 *   idle ─start→ rescanning ─ok→ finalizing(1) ─imported→ terminal
 *                    │               │
 *                 failed        nothing new (n < max)
 *                    ↓               ↓
 *                terminal     awaiting_processing(n) ─delay→ finalizing(n+1)
 *
 * Any non-terminal state moves to terminal(failed, timeout) on
 * deadline_exceeded. Effects (remote calls, waiting) live in the driver.
 */

import type {
  ImportOutcome,
  ImportRunEvent,
  ImportRunState,
  ImportTerminal,
  RetryPolicy,
} from '../types/index.js';

export class InvalidTransitionError extends Error {
  constructor(state: ImportRunState, event: ImportRunEvent) {
    super(`Invalid import transition: ${event.type} in state ${state.kind}`);
    this.name = 'InvalidTransitionError';
  }
}

export const INITIAL_STATE: ImportRunState = { kind: 'idle' };

function terminal(result: ImportTerminal): ImportRunState {
  return { kind: 'terminal', terminal: result };
}

/**
 * Finalize calls made so far, as seen from a state
 */
export function attemptsOf(state: ImportRunState): number {
  switch (state.kind) {
    case 'idle':
    case 'rescanning':
      return 0;
    case 'finalizing':
    case 'awaiting_processing':
      return state.attempt;
    case 'terminal':
      return state.terminal.attempts;
  }
}

function afterFinalize(
  attempt: number,
  outcome: ImportOutcome,
  policy: RetryPolicy
): ImportRunState {
  if (outcome.importedCount > 0) {
    if (outcome.failedCount > 0) {
      return terminal({
        status: 'partially_imported',
        importedCount: outcome.importedCount,
        failedCount: outcome.failedCount,
        attempts: attempt,
      });
    }
    return terminal({
      status: 'imported',
      importedCount: outcome.importedCount,
      attempts: attempt,
    });
  }

  // The service may still be processing the rescan; try again later
  if (attempt < policy.maxAttempts) {
    return { kind: 'awaiting_processing', attempt };
  }
  return terminal({ status: 'no_new_imports', attempts: attempt });
}

/**
 * Next state for (state, event). Throws InvalidTransitionError for a
 * combination the run can never produce.
 */
export function transition(
  state: ImportRunState,
  event: ImportRunEvent,
  policy: RetryPolicy
): ImportRunState {
  if (state.kind === 'terminal') {
    throw new InvalidTransitionError(state, event);
  }

  if (event.type === 'deadline_exceeded' && state.kind !== 'idle') {
    return terminal({
      status: 'failed',
      reason: 'timeout',
      error: {
        code: 'ORCHESTRATION_TIMEOUT',
        message: `Import did not finish within ${policy.runTimeoutMs}ms`,
      },
      attempts: attemptsOf(state),
    });
  }

  switch (state.kind) {
    case 'idle':
      if (event.type === 'start') {
        return { kind: 'rescanning' };
      }
      break;

    case 'rescanning':
      if (event.type === 'rescan_succeeded') {
        return { kind: 'finalizing', attempt: 1 };
      }
      if (event.type === 'rescan_failed') {
        return terminal({
          status: 'failed',
          reason: 'rescan',
          error: event.error,
          attempts: 0,
        });
      }
      break;

    case 'finalizing':
      if (event.type === 'finalize_succeeded') {
        return afterFinalize(state.attempt, event.outcome, policy);
      }
      if (event.type === 'finalize_failed') {
        return terminal({
          status: 'failed',
          reason: 'finalize',
          error: event.error,
          attempts: state.attempt,
        });
      }
      break;

    case 'awaiting_processing':
      if (event.type === 'delay_elapsed') {
        return { kind: 'finalizing', attempt: state.attempt + 1 };
      }
      break;
  }

  throw new InvalidTransitionError(state, event);
}
