/**
 * @fileoverview Builds the relay from configuration and runs one pass.
 *
 * Kept apart from index.ts so the wiring can be exercised without the
 * process-level side effects of the entry point.
 */

import { loadConfig, type AppConfig } from './config.js';
import { loadCarrierDirectory, type CarrierDirectory } from './services/carriers/index.js';
import { ImapInboundReader, SmtpOutboundSender } from './services/mail/index.js';
import { AnthropicIntentClassifier, createClient } from './services/anthropic/index.js';
import { openAssistantStore } from './services/store/index.js';
import { runRelay, type RelayDependencies, type RelayOptions, type RunReport } from './orchestrator/index.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { createLogger } from './utils/observability/index.js';

const logger = createLogger({ domain: 'bootstrap' });

export function createRelayDependencies(config: AppConfig, carriers: CarrierDirectory): RelayDependencies {
  return {
    reader: new ImapInboundReader(
      {
        user: config.account.address,
        password: config.account.password,
        host: config.imap.host,
        port: config.imap.port,
      },
      carriers
    ),
    sender: new SmtpOutboundSender(
      {
        user: config.account.address,
        password: config.account.password,
        host: config.smtp.host,
        port: config.smtp.port,
      },
      carriers
    ),
    classifier: new AnthropicIntentClassifier(createClient(config.anthropicApiKey), config.classifier),
    openStore: () => openAssistantStore(config.store.sqlitePath),
  };
}

export function relayOptionsFromConfig(config: AppConfig): RelayOptions {
  const subject = config.reply.subject || undefined;
  if (config.mode === 'combined') {
    return { mode: 'combined', limit: config.fetchLimit, subject };
  }
  if (!config.targetPhone) {
    // validateConfig already requires it in this mode
    throw new ConfigError(['TARGET_PHONE_NUMBER is required when RELAY_MODE=individual']);
  }
  return {
    mode: 'individual',
    targetPhone: config.targetPhone,
    confirmation: config.reply.confirmation,
    routeRecords: config.store.routeRecords,
    subject,
  };
}

/**
 * Load configuration, run one relay pass and return the process exit code.
 * Configuration problems are reported before any network I/O.
 */
export async function main(env: Record<string, string | undefined> = process.env): Promise<number> {
  let config: AppConfig;
  let carriers: CarrierDirectory;
  try {
    config = loadConfig(env);
    carriers = loadCarrierDirectory(config.carriersFile);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal('config_invalid', { problems: err.problems });
      return 1;
    }
    throw err;
  }

  logger.info('relay_starting', {
    mode: config.mode,
    env: config.nodeEnv,
    carriers: carriers.carrierIds().length,
    hasTargetPhone: Boolean(config.targetPhone),
  });

  let report: RunReport;
  try {
    report = await runRelay(createRelayDependencies(config, carriers), relayOptionsFromConfig(config));
  } catch (err) {
    logger.fatal('relay_failed', { error: errorMessage(err) });
    return 1;
  }

  if (report.state === 'ABORTED') {
    logger.info('relay_nothing_to_do', { reason: report.abortReason });
  } else {
    logger.info('relay_finished', {
      fetched: report.fetched,
      succeeded: report.succeeded,
      failed: report.failed,
    });
  }
  return 0;
}
