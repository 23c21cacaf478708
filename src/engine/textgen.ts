import { LlmClient } from '../llm/client.js';
import { summarizePosts } from './digest.js';
import { explainSuggestions } from './reasons.js';
import type { BlogPost, FeedSource } from '../source/model.js';
import type { Config } from '../shared/config.js';

/**
 * Text-generation collaborator. Both operations answer with an absent or
 * empty result instead of throwing.
 */
export interface TextGenerator {
  summarize(posts: readonly BlogPost[], lookbackDays: number): Promise<string | null>;
  explain(
    candidates: readonly FeedSource[],
    liked: readonly FeedSource[],
    existing: readonly FeedSource[],
  ): Promise<Record<string, string>>;
}

export class LlmTextGenerator implements TextGenerator {
  constructor(private readonly client: LlmClient | null) {}

  static fromConfig(config: Config['llm']): LlmTextGenerator {
    return new LlmTextGenerator(new LlmClient(config));
  }

  get available(): boolean {
    return this.client?.isConfigured() ?? false;
  }

  summarize(posts: readonly BlogPost[], lookbackDays: number): Promise<string | null> {
    return summarizePosts(this.client, posts, lookbackDays);
  }

  explain(
    candidates: readonly FeedSource[],
    liked: readonly FeedSource[],
    existing: readonly FeedSource[],
  ): Promise<Record<string, string>> {
    return explainSuggestions(this.client, candidates, liked, existing);
  }
}
