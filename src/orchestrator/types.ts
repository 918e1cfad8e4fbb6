/**
 * Orchestrator Type Definitions
 *
 * Types for one relay pass: fetch texts, classify, log, route, reply.
 */

import type { InboundReader, OutboundSender } from '../services/mail/index.js';
import type { IntentClassifier, RecordKind } from '../services/anthropic/index.js';
import type { MessageLog, RecordStore } from '../services/store/index.js';
import type { NoMessagesReason } from '../utils/errors.js';

// ============================================================================
// Run State
// ============================================================================

/**
 * State of a relay run.
 * FETCHING → (CLASSIFYING → LOGGING → ROUTING → REPLYING)* → DONE
 * FETCHING → ABORTED when the mailbox has nothing for us.
 */
export type RelayState =
  | 'FETCHING'
  | 'CLASSIFYING'
  | 'LOGGING'
  | 'ROUTING'
  | 'REPLYING'
  | 'DONE'
  | 'ABORTED';

/** Where a single message's processing stopped. */
export type ItemStage = 'classify' | 'log' | 'reply';

// ============================================================================
// Outcomes
// ============================================================================

export type ItemOutcome =
  | {
      status: 'succeeded';
      phoneNumber: string;
      carrierId: string;
      logId: number;
      /** False when the classifier call failed and the error payload was logged. */
      classified: boolean;
      record?: { kind: RecordKind; id: number };
      /** Set when the structured record could not be written; the log row still exists. */
      routeError?: string;
      messageId: string;
    }
  | {
      status: 'failed';
      phoneNumber: string;
      carrierId: string;
      stage: ItemStage;
      reason: string;
      logId?: number;
    };

export interface RunReport {
  runId: string;
  mode: RelayOptions['mode'];
  state: 'DONE' | 'ABORTED';
  fetched: number;
  succeeded: number;
  failed: number;
  outcomes: ItemOutcome[];
  abortReason?: NoMessagesReason;
}

// ============================================================================
// Inputs
// ============================================================================

/** Store handle for one run; closed when the run ends. */
export interface RelayStore extends MessageLog, RecordStore {
  close(): void;
}

export interface RelayDependencies {
  reader: InboundReader;
  sender: OutboundSender;
  classifier: IntentClassifier;
  openStore: () => RelayStore;
}

export type RelayOptions =
  | {
      /** Each text from the served number is classified, logged and confirmed on its own. */
      mode: 'individual';
      targetPhone: string;
      confirmation: string;
      routeRecords: boolean;
      subject?: string;
    }
  | {
      /** Recent texts from everyone are answered together with one generated reply. */
      mode: 'combined';
      limit: number;
      subject?: string;
    };
