/**
 * AI digest of recent posts. Yields null when no LLM is configured, there is
 * nothing to summarize, or the call fails.
 */

import type { LlmClient } from '../llm/client.js';
import { buildDigestMessages } from '../llm/prompts.js';
import type { BlogPost } from '../source/model.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export async function summarizePosts(
  client: LlmClient | null,
  posts: readonly BlogPost[],
  lookbackDays = 3,
): Promise<string | null> {
  if (!client || !client.isConfigured()) {
    logger.info('LLM API key not set, digest disabled');
    return null;
  }
  if (posts.length === 0) return null;

  try {
    const response = await client.chat(buildDigestMessages(posts, lookbackDays));
    logger.info({ posts: posts.length, tokens: response.token_count }, 'Digest generated');
    return response.content;
  } catch (err) {
    logger.warn({ error: errorMessage(err) }, 'Failed to generate digest');
    return null;
  }
}
