import { describe, it, expect, vi } from 'vitest';
import {
  ArticleSummarizer,
  truncateContent,
  MAX_CONTENT_CHARS,
  type ChatCompletionFn,
} from '../../src/summarizer/index.js';
import { SUMMARY_SYSTEM_PROMPT } from '../../src/summarizer/prompts.js';
import { SummarizationError } from '../../src/errors.js';

const ARTICLE_TEXT =
  'The city council voted on Tuesday to expand the tram network by twelve kilometres. ' +
  'Construction is expected to start next year and finish within four years.';

describe('truncateContent', () => {
  it('returns short text unchanged', () => {
    expect(truncateContent('alpha beta', 20)).toBe('alpha beta');
  });

  it('cuts at the last word boundary and appends an ellipsis', () => {
    expect(truncateContent('alpha beta gamma', 12)).toBe('alpha beta…');
  });

  it('bounds long articles to the maximum input size', () => {
    const text = 'word '.repeat(4000);

    const truncated = truncateContent(text);

    expect(truncated.length).toBeLessThanOrEqual(MAX_CONTENT_CHARS + 1);
    expect(truncated.endsWith('word…')).toBe(true);
  });
});

describe('ArticleSummarizer', () => {
  it('sends the system prompt and the titled article text', async () => {
    const complete = vi.fn<ChatCompletionFn>(async () => '  - The tram network grows by 12 km.  ');
    const summarizer = new ArticleSummarizer(complete);

    const summary = await summarizer.summarize('Tram expansion approved', ARTICLE_TEXT);

    expect(summary).toBe('- The tram network grows by 12 km.');
    expect(complete).toHaveBeenCalledOnce();
    const [messages] = complete.mock.calls[0] ?? [];
    expect(messages?.[0]).toEqual({ role: 'system', content: SUMMARY_SYSTEM_PROMPT });
    expect(messages?.[1]?.content).toContain('Title: Tram expansion approved');
    expect(messages?.[1]?.content).toContain(ARTICLE_TEXT);
  });

  it('does not call the model for very short text', async () => {
    const complete = vi.fn<ChatCompletionFn>(async () => 'unused');
    const summarizer = new ArticleSummarizer(complete);

    await expect(summarizer.summarize('Brief', 'Only a sentence.')).resolves.toBeNull();
    expect(complete).not.toHaveBeenCalled();
  });

  it('wraps service failures in a SummarizationError', async () => {
    const summarizer = new ArticleSummarizer(async () => {
      throw new Error('429 Rate limit reached');
    });

    const error = await summarizer.summarize('Tram', ARTICLE_TEXT).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SummarizationError);
    expect(error).toHaveProperty('message', 'Summary request failed: 429 Rate limit reached');
  });

  it('rejects an empty completion', async () => {
    const summarizer = new ArticleSummarizer(async () => '   ');

    await expect(summarizer.summarize('Tram', ARTICLE_TEXT)).rejects.toThrow(
      'Summary request returned no text',
    );
  });
});
