/**
 * Anthropic client construction.
 */

import Anthropic from '@anthropic-ai/sdk';

/**
 * Create an Anthropic client for the given key.
 * Built once per run and handed to the classifier.
 */
export function createClient(apiKey: string): Anthropic {
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY not configured');
  }
  return new Anthropic({ apiKey });
}
