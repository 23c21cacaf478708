import { ageInDays, shortSummary, type BlogPost, type FeedSource } from '../source/model.js';

export function formatAge(post: Pick<BlogPost, 'published'>, now: Date = new Date()): string {
  const days = ageInDays(post, now);
  if (days === null) return 'undated';
  if (days <= 0) return 'today';
  return days === 1 ? '1 day ago' : `${days} days ago`;
}

function engagement(post: Pick<BlogPost, 'comments' | 'likes'>): string {
  const parts: string[] = [];
  if (post.comments !== null) parts.push(`${post.comments} comments`);
  if (post.likes !== null && post.likes !== post.comments) parts.push(`${post.likes} likes`);
  return parts.join(', ');
}

/**
 * Three lines per post: read marker and title, provenance, link.
 */
export function formatPost(post: BlogPost, now: Date = new Date()): string[] {
  const marker = post.is_read ? '✓' : '•';
  const meta = [post.source_name, post.author, formatAge(post, now), engagement(post)]
    .filter((part, i) => part && !(i === 1 && part === post.source_name))
    .join(' | ');

  const lines = [`${marker} ${post.title}`, `    ${meta}`];
  if (post.summary) lines.push(`    ${shortSummary(post)}`);
  if (post.url) lines.push(`    ${post.url}`);
  return lines;
}

export function formatSource(source: FeedSource, reason?: string): string[] {
  const tags = source.tags.length > 0 ? ` [${source.tags.join(', ')}]` : '';
  const lines = [`${source.name}${tags}`, `    ${source.url}`];
  if (reason) lines.push(`    ${reason}`);
  return lines;
}
