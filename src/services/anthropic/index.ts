/**
 * Anthropic service - LLM client, classification, and prompts.
 */

// Client
export { createClient } from './client.js';

// Classification
export {
  AnthropicIntentClassifier,
  CLASSIFIER_ERROR_PAYLOAD,
  classifyToPayload,
  parseClassification,
} from './classification.js';
export type {
  Classification,
  ClassificationData,
  ClassifierSettings,
  IntentClassifier,
  RecordKind,
} from './types.js';

// Prompts
export { CLASSIFICATION_SYSTEM_PROMPT } from './prompts/index.js';
