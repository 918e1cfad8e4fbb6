/**
 * Relay Orchestrator
 *
 * One pass over the mailbox:
 * 1. Fetch candidate texts (mode decides the selection)
 * 2. Classify each text, or generate one combined reply
 * 3. Append a message log row (and route the record, when enabled)
 * 4. Reply through the sender's carrier gateway
 *
 * A failure while handling one text becomes a failed ItemOutcome and the
 * batch carries on. Only a failed fetch aborts the run.
 */

import type { InboundSms, MailSelection } from '../services/mail/index.js';
import { CLASSIFIER_ERROR_PAYLOAD, type ClassificationData, type RecordKind } from '../services/anthropic/index.js';
import { NoMessagesFoundError, errorMessage, type Result } from '../utils/errors.js';
import { createLogger, createRunId, withLogContext } from '../utils/observability/index.js';
import { routeClassification } from './records.js';
import type {
  ItemOutcome,
  RelayDependencies,
  RelayOptions,
  RelayState,
  RelayStore,
  RunReport,
} from './types.js';

const logger = createLogger({ domain: 'relay' });

type IndividualOptions = Extract<RelayOptions, { mode: 'individual' }>;
type CombinedOptions = Extract<RelayOptions, { mode: 'combined' }>;

function enterState(state: RelayState, extra?: Record<string, unknown>): void {
  logger.debug('relay_state', { state, ...extra });
}

function selectionFor(options: RelayOptions): MailSelection {
  return options.mode === 'individual'
    ? { mode: 'unread-matching', targetPhone: options.targetPhone }
    : { mode: 'all', limit: options.limit };
}

function failed(sms: InboundSms, stage: 'classify' | 'log' | 'reply', reason: string, logId?: number): ItemOutcome {
  return {
    status: 'failed',
    phoneNumber: sms.phoneNumber,
    carrierId: sms.carrierId,
    stage,
    reason,
    ...(logId !== undefined ? { logId } : {}),
  };
}

/**
 * Text handed to the model in combined mode: one `phone: body` line per message.
 */
export function buildCombinedPrompt(messages: InboundSms[]): string {
  return messages.map((sms) => `${sms.phoneNumber}: ${sms.body}`).join('\n');
}

async function appendLog(
  store: RelayStore,
  sms: InboundSms,
  parsedIntent: string | null,
  response: string
): Promise<Result<number>> {
  enterState('LOGGING', { phone: sms.phoneNumber });
  try {
    return { success: true, data: await store.append({
      phoneNumber: sms.phoneNumber,
      carrierId: sms.carrierId,
      rawMessage: sms.body,
      parsedIntent,
      response,
    }) };
  } catch (err) {
    logger.error('message_log_failed', { phone: sms.phoneNumber, stage: 'log', error: errorMessage(err) });
    return { success: false, error: errorMessage(err) };
  }
}

async function reply(
  deps: RelayDependencies,
  sms: InboundSms,
  body: string,
  subject: string | undefined
): Promise<Result<string>> {
  enterState('REPLYING', { phone: sms.phoneNumber });
  try {
    const sent = await deps.sender.send({
      phoneNumber: sms.phoneNumber,
      carrierId: sms.carrierId,
      body,
      subject,
    });
    if (!sent.success) {
      logger.warn('reply_failed', { phone: sms.phoneNumber, carrierId: sms.carrierId, stage: 'reply', error: sent.error });
      return sent;
    }
    return { success: true, data: sent.data.messageId };
  } catch (err) {
    logger.error('reply_failed', { phone: sms.phoneNumber, carrierId: sms.carrierId, stage: 'reply', error: errorMessage(err) });
    return { success: false, error: errorMessage(err) };
  }
}

async function handleIndividually(
  deps: RelayDependencies,
  store: RelayStore,
  sms: InboundSms,
  options: IndividualOptions
): Promise<ItemOutcome> {
  enterState('CLASSIFYING', { phone: sms.phoneNumber });
  let classification: Result<ClassificationData>;
  try {
    classification = await deps.classifier.classify(sms.body);
  } catch (err) {
    classification = { success: false, error: errorMessage(err) };
  }
  if (!classification.success) {
    logger.warn('classification_degraded', { phone: sms.phoneNumber, stage: 'classify', error: classification.error });
  }
  const parsedIntent = classification.success ? classification.data.raw : CLASSIFIER_ERROR_PAYLOAD;

  const logged = await appendLog(store, sms, parsedIntent, options.confirmation);
  if (!logged.success) {
    return failed(sms, 'log', logged.error);
  }

  let record: { kind: RecordKind; id: number } | undefined;
  let routeError: string | undefined;
  if (options.routeRecords && classification.success && classification.data.parsed) {
    enterState('ROUTING', { kind: classification.data.parsed.kind });
    try {
      record = await routeClassification(store, classification.data.parsed);
    } catch (err) {
      routeError = errorMessage(err);
      logger.warn('record_route_failed', { logId: logged.data, error: routeError });
    }
  }

  const sent = await reply(deps, sms, options.confirmation, options.subject);
  if (!sent.success) {
    return failed(sms, 'reply', sent.error, logged.data);
  }

  return {
    status: 'succeeded',
    phoneNumber: sms.phoneNumber,
    carrierId: sms.carrierId,
    logId: logged.data,
    classified: classification.success,
    ...(record ? { record } : {}),
    ...(routeError ? { routeError } : {}),
    messageId: sent.data,
  };
}

async function handleCombined(
  deps: RelayDependencies,
  store: RelayStore,
  messages: InboundSms[],
  options: CombinedOptions
): Promise<ItemOutcome[]> {
  enterState('CLASSIFYING', { count: messages.length });
  let generated: Result<string>;
  try {
    generated = await deps.classifier.generateReply(buildCombinedPrompt(messages));
  } catch (err) {
    generated = { success: false, error: errorMessage(err) };
  }
  if (!generated.success) {
    logger.warn('classification_degraded', { count: messages.length, stage: 'classify', error: generated.error });
  }
  // A failed generation degrades to the error payload, which is logged and sent like a reply.
  const replyText = generated.success ? generated.data : CLASSIFIER_ERROR_PAYLOAD;
  const parsedIntent = generated.success ? null : CLASSIFIER_ERROR_PAYLOAD;

  const outcomes: ItemOutcome[] = [];
  for (const sms of messages) {
    const logged = await appendLog(store, sms, parsedIntent, replyText);
    if (!logged.success) {
      outcomes.push(failed(sms, 'log', logged.error));
      continue;
    }

    const sent = await reply(deps, sms, replyText, options.subject);
    outcomes.push(
      sent.success
        ? {
            status: 'succeeded',
            phoneNumber: sms.phoneNumber,
            carrierId: sms.carrierId,
            logId: logged.data,
            classified: generated.success,
            messageId: sent.data,
          }
        : failed(sms, 'reply', sent.error, logged.data)
    );
  }
  return outcomes;
}

function summarize(
  runId: string,
  options: RelayOptions,
  fetched: number,
  outcomes: ItemOutcome[]
): RunReport {
  const succeeded = outcomes.filter((o) => o.status === 'succeeded').length;
  return {
    runId,
    mode: options.mode,
    state: 'DONE',
    fetched,
    succeeded,
    failed: outcomes.length - succeeded,
    outcomes,
  };
}

/**
 * Run one relay pass.
 *
 * Resolves with an ABORTED report when there is nothing to process.
 * Rejects only when the fetch itself fails.
 */
export async function runRelay(deps: RelayDependencies, options: RelayOptions): Promise<RunReport> {
  const runId = createRunId();

  return withLogContext({ runId, mode: options.mode }, async () => {
    enterState('FETCHING');
    let messages: InboundSms[];
    try {
      messages = await deps.reader.fetch(selectionFor(options));
    } catch (err) {
      if (err instanceof NoMessagesFoundError) {
        logger.info('relay_aborted', { state: 'ABORTED', reason: err.reason, inspected: err.inspected });
        return {
          runId,
          mode: options.mode,
          state: 'ABORTED',
          fetched: 0,
          succeeded: 0,
          failed: 0,
          outcomes: [],
          abortReason: err.reason,
        };
      }
      logger.error('relay_fetch_failed', { stage: 'fetch', error: errorMessage(err) });
      throw err;
    }

    let store: RelayStore;
    try {
      store = deps.openStore();
    } catch (err) {
      const reason = errorMessage(err);
      logger.error('message_store_unavailable', { stage: 'log', error: reason });
      return summarize(runId, options, messages.length, messages.map((sms) => failed(sms, 'log', reason)));
    }

    let outcomes: ItemOutcome[];
    try {
      if (options.mode === 'individual') {
        outcomes = [];
        for (const sms of messages) {
          outcomes.push(await handleIndividually(deps, store, sms, options));
        }
      } else {
        outcomes = await handleCombined(deps, store, messages, options);
      }
    } finally {
      store.close();
    }

    const report = summarize(runId, options, messages.length, outcomes);
    enterState('DONE');
    logger.info('relay_completed', {
      fetched: report.fetched,
      succeeded: report.succeeded,
      failed: report.failed,
    });
    return report;
  });
}
