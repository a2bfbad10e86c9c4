/**
 * Import Orchestrator
 *
 * Drives one import run after a file has been stored in the bookdrop
 * folder: ask the library service to rescan, then finalize staged files,
 * waiting and retrying while the service reports nothing new.
 *
 * GUARDRAILS:
 * - a single run-wide deadline bounds every remote call and every wait
 * - remote errors end the run; only "nothing imported yet" is retried
 * - the run always ends in exactly one terminal state
 */

import { createDeadline, DeadlineExceededError, sleep as defaultSleep } from '../lib/deadline.js';
import type { Logger } from '../lib/logger.js';
import { createLogger } from '../lib/logger.js';
import type { BookdropClient } from '../remote/index.js';
import type { DestinationDefaults, PreferenceStore } from '../services/preference.service.js';
import { resolveImportDestination } from '../services/preference.service.js';
import type {
  ImportDestination,
  ImportRunEvent,
  ImportRunInput,
  ImportRunResult,
  ImportRunState,
  ImportTerminal,
  Result,
  RetryPolicy,
  RunError,
} from '../types/index.js';
import { DEFAULT_RETRY_POLICY } from '../types/index.js';

import { describeTerminal } from './outcome-message.js';
import { INITIAL_STATE, transition } from './state-machine.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Remote operations the orchestrator needs
 */
export type ImportOrchestratorClient = Pick<BookdropClient, 'rescan' | 'finalizeAll'>;

export interface ImportOrchestratorDeps {
  client: ImportOrchestratorClient;
  preferences: Pick<PreferenceStore, 'get'>;
  policy?: RetryPolicy;
  defaults?: DestinationDefaults;
  sleep?: SleepFn;
  logger?: Logger;
}

export interface ImportOrchestrator {
  run(input: ImportRunInput): Promise<ImportRunResult>;
}

/**
 * Create an import orchestrator instance
 */
export function createImportOrchestrator(deps: ImportOrchestratorDeps): ImportOrchestrator {
  const { client, preferences } = deps;
  const policy = deps.policy ?? DEFAULT_RETRY_POLICY;
  const defaults = deps.defaults ?? {};
  const sleep = deps.sleep ?? defaultSleep;
  const log = deps.logger ?? createLogger('import');

  /**
   * Map a remote result to the next event; a call cut short by the run
   * deadline counts as deadline expiry rather than a remote error
   */
  function remoteEvent<T>(
    result: Result<T>,
    signal: AbortSignal,
    onSuccess: (data: T) => ImportRunEvent,
    onFailure: (error: RunError) => ImportRunEvent
  ): ImportRunEvent {
    if (result.success) {
      return onSuccess(result.data);
    }
    if (signal.aborted) {
      return { type: 'deadline_exceeded' };
    }
    return onFailure({ code: result.error.code, message: result.error.message });
  }

  async function step(
    state: ImportRunState,
    destination: ImportDestination,
    signal: AbortSignal,
    countFinalize: () => void
  ): Promise<ImportRunEvent> {
    if (state.kind === 'idle') {
      return { type: 'start' };
    }
    if (signal.aborted) {
      return { type: 'deadline_exceeded' };
    }

    switch (state.kind) {
      case 'rescanning': {
        log.info('Triggering bookdrop rescan');
        const result = await client.rescan({ signal });
        return remoteEvent(
          result,
          signal,
          () => ({ type: 'rescan_succeeded' }),
          (error) => ({ type: 'rescan_failed', error })
        );
      }

      case 'finalizing': {
        log.info('Attempting to finalize import', {
          attempt: state.attempt,
          maxAttempts: policy.maxAttempts,
        });
        countFinalize();
        const result = await client.finalizeAll(destination, { signal });
        return remoteEvent(
          result,
          signal,
          (outcome) => ({ type: 'finalize_succeeded', outcome }),
          (error) => ({ type: 'finalize_failed', error })
        );
      }

      case 'awaiting_processing':
        log.info('No files imported yet, retrying', {
          attempt: state.attempt,
          retryDelayMs: policy.retryDelayMs,
        });
        try {
          await sleep(policy.retryDelayMs, signal);
        } catch (err) {
          if (err instanceof DeadlineExceededError) {
            return { type: 'deadline_exceeded' };
          }
          throw err;
        }
        return { type: 'delay_elapsed' };

      case 'terminal':
        throw new Error('Terminal state has no next step');
    }
  }

  return {
    async run(input: ImportRunInput): Promise<ImportRunResult> {
      const destination = await resolveImportDestination(
        preferences,
        input.callerId,
        defaults
      );

      log.info('Starting import run', {
        callerId: input.callerId,
        fileName: input.fileName,
        libraryId: destination.libraryId,
        pathId: destination.pathId,
      });

      const deadline = createDeadline(policy.runTimeoutMs, input.signal);
      let finalizeCalls = 0;

      const drive = async (): Promise<ImportTerminal> => {
        let state: ImportRunState = INITIAL_STATE;
        for (;;) {
          if (state.kind === 'terminal') {
            return state.terminal;
          }
          const event = await step(state, destination, deadline.signal, () => {
            finalizeCalls++;
          });
          state = transition(state, event, policy);
        }
      };

      let terminal: ImportTerminal;
      try {
        terminal = await drive();
      } finally {
        deadline.dispose();
      }

      const message = describeTerminal(input.fileName, terminal);
      const fields = {
        callerId: input.callerId,
        fileName: input.fileName,
        status: terminal.status,
        attempts: terminal.attempts,
        finalizeCalls,
      };
      if (terminal.status === 'failed') {
        log.error('Import run failed', {
          ...fields,
          reason: terminal.reason,
          code: terminal.error.code,
          error: terminal.error.message,
        });
      } else {
        log.info('Import run finished', fields);
      }

      return { terminal, finalizeCalls, message };
    },
  };
}
