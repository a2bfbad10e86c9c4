/**
 * Import Orchestrator Exports
 *
 * The orchestrator turns a stored file into library entries:
 * - bookdrop rescan
 * - finalize with bounded retries
 * - one run-wide deadline
 */

export { createImportOrchestrator } from './import-orchestrator.js';
export type {
  ImportOrchestrator,
  ImportOrchestratorClient,
  ImportOrchestratorDeps,
  SleepFn,
} from './import-orchestrator.js';
export {
  transition,
  attemptsOf,
  INITIAL_STATE,
  InvalidTransitionError,
} from './state-machine.js';
export { describeTerminal } from './outcome-message.js';
