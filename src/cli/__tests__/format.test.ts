import { describe, it, expect } from 'vitest';
import { formatAge, formatPost, formatSource } from '../format.js';
import { defineSource, type BlogPost } from '../../source/model.js';

const NOW = new Date('2024-01-10T12:00:00Z');

function makePost(overrides: Partial<BlogPost> = {}): BlogPost {
  return {
    title: 'On Tariffs',
    author: 'Tyler',
    url: 'https://example.com/tariffs',
    published: new Date('2024-01-08T10:00:00Z'),
    summary: 'Trade policy.',
    likes: null,
    comments: 42,
    source_name: 'Marginal Revolution',
    is_read: false,
    ...overrides,
  };
}

describe('formatAge', () => {
  it('describes the age in days', () => {
    expect(formatAge({ published: new Date('2024-01-10T08:00:00Z') }, NOW)).toBe('today');
    expect(formatAge({ published: new Date('2024-01-09T08:00:00Z') }, NOW)).toBe('1 day ago');
    expect(formatAge({ published: new Date('2024-01-08T10:00:00Z') }, NOW)).toBe('2 days ago');
    expect(formatAge({ published: null }, NOW)).toBe('undated');
  });
});

describe('formatPost', () => {
  it('renders marker, metadata, summary and link', () => {
    expect(formatPost(makePost(), NOW)).toEqual([
      '• On Tariffs',
      '    Marginal Revolution | Tyler | 2 days ago | 42 comments',
      '    Trade policy.',
      '    https://example.com/tariffs',
    ]);
  });

  it('marks read posts and skips an author equal to the source name', () => {
    const lines = formatPost(
      makePost({ is_read: true, author: 'Marginal Revolution', comments: null, summary: '', published: null }),
      NOW,
    );
    expect(lines).toEqual(['✓ On Tariffs', '    Marginal Revolution | undated', '    https://example.com/tariffs']);
  });
});

describe('formatSource', () => {
  it('renders name, tags, URL and reason', () => {
    const source = defineSource({ name: 'Noahpinion', url: 'https://www.noahpinion.blog', tags: ['economics'] });
    expect(formatSource(source, 'Econ you already like.')).toEqual([
      'Noahpinion [economics]',
      '    https://www.noahpinion.blog',
      '    Econ you already like.',
    ]);
  });
});
