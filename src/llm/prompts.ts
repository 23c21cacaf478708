import type { BlogPost, FeedSource } from '../source/model.js';
import type { LlmMessage } from './client.js';

export const DIGEST_MAX_POSTS = 50;
export const DIGEST_SUMMARY_CHARS = 200;
export const REASONS_MAX_CANDIDATES = 15;
export const REASONS_MAX_EXISTING = 10;

function describeSource(source: FeedSource): string {
  return `- ${source.name} (tags: ${source.tags.join(', ')})`;
}

export function formatDigestLine(post: BlogPost): string {
  let line = `- "${post.title}" by ${post.author} (${post.source_name})`;
  if (post.summary) line += `: ${post.summary.slice(0, DIGEST_SUMMARY_CHARS)}`;
  if (post.comments) line += ` [${post.comments} comments]`;
  return line;
}

export function buildDigestMessages(posts: readonly BlogPost[], lookbackDays: number): LlmMessage[] {
  const lines = posts.slice(0, DIGEST_MAX_POSTS).map(formatDigestLine);

  const prompt = `You are a knowledgeable blog curator. Here are the blog posts published in the last ${lookbackDays} days from blogs the user follows:

${lines.join('\n')}

Write a concise, engaging digest (3-5 short paragraphs) that:
1. Highlights the most interesting or important posts
2. Groups related themes across different blogs
3. Notes any debates or contrasting perspectives
4. Suggests which posts are must-reads and why

Write in a warm, intelligent tone. Be specific about the content; don't just list titles.`;

  return [{ role: 'user', content: prompt }];
}

export function buildReasonsMessages(
  candidates: readonly FeedSource[],
  liked: readonly FeedSource[],
  existing: readonly FeedSource[],
): LlmMessage[] {
  const likedDesc = liked.length > 0 ? liked.map(describeSource).join('\n') : 'No blogs liked yet.';
  const existingDesc = existing.slice(0, REASONS_MAX_EXISTING).map(describeSource).join('\n');
  const candidateLines = candidates
    .slice(0, REASONS_MAX_CANDIDATES)
    .map((s) => `- ${s.name} (${s.url}) [tags: ${s.tags.join(', ')}]`)
    .join('\n');

  const prompt = `You are a blog recommendation engine. The user currently follows these blogs:
${existingDesc}

They've liked these suggested blogs:
${likedDesc}

For each blog below, write a one-sentence reason why this user would enjoy it. Be specific: reference the overlap with their interests and what makes this blog unique.

Blogs to explain:
${candidateLines}

Respond with exactly one line per blog in the format:
BLOG_NAME: reason

Keep each reason to 1-2 sentences, max 150 characters.`;

  return [{ role: 'user', content: prompt }];
}
