export type * from './types.js';

export {
  createRunId,
  withLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export {
  redactPhone,
  redactSecrets,
} from './redaction.js';
