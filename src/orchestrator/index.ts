/**
 * Orchestrator Module
 *
 * Runs one fetch → classify → log → reply pass over the mailbox.
 */

export { runRelay, buildCombinedPrompt } from './relay.js';
export { routeClassification } from './records.js';
export type {
  ItemOutcome,
  ItemStage,
  RelayDependencies,
  RelayOptions,
  RelayState,
  RelayStore,
  RunReport,
} from './types.js';
