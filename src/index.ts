/**
 * @fileoverview Entry point for the SMS mail relay.
 *
 * Takes no arguments. Performs exactly one fetch → classify → log → reply
 * pass and exits.
 */

import { main } from './bootstrap.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const logger = createLogger({ domain: 'process' });

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal('unhandled_error', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  });
