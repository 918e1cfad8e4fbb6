/**
 * Intent classification for inbound texts.
 *
 * One Messages API call per text: a fixed system prompt plus the text as the
 * only user turn. No retries and no streaming. A failed call is logged with
 * its cause and returned as a failed Result; callers that need the single
 * string contract use classifyToPayload().
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { TextBlock, MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { errorMessage, type Result } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { CLASSIFICATION_SYSTEM_PROMPT } from './prompts/index.js';
import type { Classification, ClassificationData, ClassifierSettings, IntentClassifier } from './types.js';

const logger = createLogger({ domain: 'classifier' });

/** Stored in place of the model output when the call fails. */
export const CLASSIFIER_ERROR_PAYLOAD = '{"error": "Unable to process the message"}';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/** Strip a markdown code fence if the model wrapped its JSON in one. */
function unfence(text: string): string {
  const trimmed = text.trim();
  const codeBlockMatch = trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  return codeBlockMatch ? codeBlockMatch[1].trim() : trimmed;
}

/**
 * Parse the model's JSON into a Classification.
 * Returns null for anything that is not one of the three record shapes.
 */
export function parseClassification(text: string): Classification | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(unfence(text));
  } catch {
    return null;
  }
  // Boundary: validate shape before use
  if (!isRecord(parsed)) return null;

  const kind = nonEmptyString(parsed.category ?? parsed.kind ?? parsed.type)?.toLowerCase();
  switch (kind) {
    case 'task': {
      const description = nonEmptyString(parsed.description);
      if (!description) return null;
      return { kind, description, dueDate: nonEmptyString(parsed.due_date ?? parsed.dueDate) ?? null };
    }
    case 'habit': {
      const name = nonEmptyString(parsed.name ?? parsed.habit_name);
      if (!name) return null;
      return { kind, name, frequency: nonEmptyString(parsed.frequency) ?? null };
    }
    case 'note': {
      const content = nonEmptyString(parsed.content ?? parsed.note);
      if (!content) return null;
      return { kind, content };
    }
    default:
      return null;
  }
}

export class AnthropicIntentClassifier implements IntentClassifier {
  constructor(
    private readonly client: Anthropic,
    private readonly settings: ClassifierSettings
  ) {}

  async classify(text: string): Promise<Result<ClassificationData>> {
    const completion = await this.complete(text, CLASSIFICATION_SYSTEM_PROMPT);
    if (!completion.success) return completion;

    const raw = completion.data;
    const parsed = parseClassification(raw);
    if (!parsed) {
      logger.warn('classification_unparsed', { responseLength: raw.length });
    } else {
      logger.debug('classification_parsed', { kind: parsed.kind });
    }
    return { success: true, data: { raw, parsed } };
  }

  async generateReply(text: string): Promise<Result<string>> {
    return this.complete(text);
  }

  private async complete(text: string, system?: string): Promise<Result<string>> {
    const params: MessageCreateParamsNonStreaming = {
      model: this.settings.modelId,
      max_tokens: this.settings.maxTokens,
      messages: [{ role: 'user', content: text }],
      ...(system ? { system } : {}),
    };

    try {
      const response = await this.client.messages.create(params);
      const textBlock = response.content.find(
        (block): block is TextBlock => block.type === 'text'
      );
      if (!textBlock) {
        throw new Error('No text response from model');
      }
      return { success: true, data: textBlock.text.trim() };
    } catch (err) {
      logger.error('model_call_failed', {
        model: this.settings.modelId,
        hasSystemPrompt: Boolean(system),
        error: errorMessage(err),
      });
      return { success: false, error: errorMessage(err) };
    }
  }
}

/** Model JSON on success, the error payload otherwise. */
export async function classifyToPayload(classifier: IntentClassifier, text: string): Promise<string> {
  const result = await classifier.classify(text);
  return result.success ? result.data.raw : CLASSIFIER_ERROR_PAYLOAD;
}
