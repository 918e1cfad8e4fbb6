/**
 * Type definitions for the Anthropic service module.
 */

import type { Result } from '../../utils/errors.js';

export type RecordKind = 'task' | 'habit' | 'note';

/** The record a message was sorted into. */
export type Classification =
  | { kind: 'task'; description: string; dueDate: string | null }
  | { kind: 'habit'; name: string; frequency: string | null }
  | { kind: 'note'; content: string };

/**
 * What the model returned. `raw` is kept verbatim for the message log even
 * when it does not parse into a Classification.
 */
export interface ClassificationData {
  raw: string;
  parsed: Classification | null;
}

export interface ClassifierSettings {
  modelId: string;
  maxTokens: number;
}

export interface IntentClassifier {
  /** Sort one text into a record. Never throws; API failures come back as a failed Result. */
  classify(text: string): Promise<Result<ClassificationData>>;
  /** Free-form reply to a text, single user turn with no system prompt. */
  generateReply(text: string): Promise<Result<string>>;
}
