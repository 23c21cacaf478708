import type { LlmClient } from '../llm/client.js';
import { buildReasonsMessages } from '../llm/prompts.js';
import { parseReasonLines } from '../llm/parse.js';
import type { FeedSource } from '../source/model.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * "Why you'd like this" for each suggested blog, keyed by blog URL. Empty
 * when no LLM is configured or the call fails.
 */
export async function explainSuggestions(
  client: LlmClient | null,
  candidates: readonly FeedSource[],
  liked: readonly FeedSource[],
  existing: readonly FeedSource[],
): Promise<Record<string, string>> {
  if (!client || !client.isConfigured() || candidates.length === 0) return {};

  try {
    const response = await client.chat(buildReasonsMessages(candidates, liked, existing));
    return parseReasonLines(response.content, candidates);
  } catch (err) {
    logger.warn({ error: errorMessage(err) }, 'Failed to generate suggestion reasons');
    return {};
  }
}
