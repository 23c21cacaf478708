import { describe, it, expect, vi, afterEach } from 'vitest';
import { LlmClient } from '../../llm/client.js';
import { LlmTextGenerator } from '../textgen.js';
import { summarizePosts } from '../digest.js';
import { explainSuggestions } from '../reasons.js';
import { defineSource, type BlogPost } from '../../source/model.js';
import type { Config } from '../../shared/config.js';

const LLM_CONFIG: Config['llm'] = {
  base_url: 'https://llm.example.com/v1/',
  api_key: 'test-secret',
  model: 'test-model',
  max_tokens: 256,
  temperature: 0,
  timeout_ms: 1000,
  max_concurrent: 2,
};

function completion(content: string): Response {
  return new Response(
    JSON.stringify({ choices: [{ message: { content } }], model: 'test-model', usage: { total_tokens: 10 } }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

const POSTS: BlogPost[] = [
  {
    title: 'On Tariffs',
    author: 'Tyler',
    url: 'https://example.com/tariffs',
    published: new Date('2024-01-09T10:00:00Z'),
    summary: 'Trade policy.',
    likes: null,
    comments: 42,
    source_name: 'Marginal Revolution',
    is_read: false,
  },
];

const CANDIDATES = [
  defineSource({ name: 'Construction Physics', url: 'https://www.construction-physics.com', tags: ['engineering'] }),
  defineSource({ name: 'Noahpinion', url: 'https://www.noahpinion.blog', tags: ['economics'] }),
];

describe('summarizePosts', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('returns the completion text and calls the chat endpoint', async () => {
    const mockFetch = vi.fn().mockResolvedValue(completion('This week in blogs.'));
    globalThis.fetch = mockFetch;

    const digest = await summarizePosts(new LlmClient(LLM_CONFIG), POSTS, 3);

    expect(digest).toBe('This week in blogs.');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe('https://llm.example.com/v1/chat/completions');
    const init = mockFetch.mock.calls[0][1];
    expect(init.headers.Authorization).toBe('Bearer test-secret');
    const body = JSON.parse(init.body);
    expect(body.model).toBe('test-model');
    expect(body.messages[0].content).toContain('"On Tariffs" by Tyler (Marginal Revolution)');
  });

  it('returns null without an API key, without calling out', async () => {
    const mockFetch = vi.fn();
    globalThis.fetch = mockFetch;

    expect(await summarizePosts(new LlmClient({ ...LLM_CONFIG, api_key: '' }), POSTS)).toBeNull();
    expect(await summarizePosts(null, POSTS)).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('returns null for no posts', async () => {
    const mockFetch = vi.fn();
    globalThis.fetch = mockFetch;

    expect(await summarizePosts(new LlmClient(LLM_CONFIG), [])).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('returns null when the API fails', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('overloaded', { status: 503 }));

    expect(await summarizePosts(new LlmClient(LLM_CONFIG), POSTS)).toBeNull();
  });
});

describe('explainSuggestions', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('maps reasons to candidate URLs', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValue(completion('Construction Physics: How things get built.\nNoahpinion: Econ you already like.'));

    const reasons = await explainSuggestions(new LlmClient(LLM_CONFIG), CANDIDATES, [], []);

    expect(reasons).toEqual({
      'https://www.construction-physics.com': 'How things get built.',
      'https://www.noahpinion.blog': 'Econ you already like.',
    });
  });

  it('returns {} on failure or without candidates', async () => {
    const mockFetch = vi.fn().mockRejectedValue(new Error('ECONNRESET'));
    globalThis.fetch = mockFetch;

    expect(await explainSuggestions(new LlmClient(LLM_CONFIG), CANDIDATES, [], [])).toEqual({});
    expect(await explainSuggestions(new LlmClient(LLM_CONFIG), [], [], [])).toEqual({});
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});

describe('LlmTextGenerator', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('reports availability from the API key', () => {
    expect(LlmTextGenerator.fromConfig(LLM_CONFIG).available).toBe(true);
    expect(LlmTextGenerator.fromConfig({ ...LLM_CONFIG, api_key: '' }).available).toBe(false);
    expect(new LlmTextGenerator(null).available).toBe(false);
  });

  it('delegates summarize and explain', async () => {
    globalThis.fetch = vi.fn().mockImplementation(async () => completion('Noahpinion: Good fit.'));
    const generator = LlmTextGenerator.fromConfig(LLM_CONFIG);

    expect(await generator.summarize(POSTS, 3)).toBe('Noahpinion: Good fit.');
    expect(await generator.explain(CANDIDATES, [], [])).toEqual({ 'https://www.noahpinion.blog': 'Good fit.' });
  });
});
