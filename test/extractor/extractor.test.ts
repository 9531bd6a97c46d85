import { describe, it, expect, vi } from 'vitest';
import { extractArticle, extractFromHtml, MIN_TEXT_LENGTH } from '../../src/extractor/index.js';
import type { ExtractionStrategy } from '../../src/extractor/index.js';
import { ExtractionError } from '../../src/errors.js';
import { loadFixture } from '../helpers/fixture-loader.js';
import { StubHttpClient } from '../helpers/stub-http.js';

const BBC_URL = 'https://www.bbc.com/news/articles/c1abc2def3go';

describe('extractFromHtml', () => {
  it('joins BBC text blocks and skips captions and short blocks', () => {
    const content = extractFromHtml(loadFixture('bbc', 'article.html'), BBC_URL);

    expect(content?.strategy).toBe('bbc-text-blocks');
    expect(content?.fullText).toBe(
      'Semiconductor companies are investing billions in new factories to shrink transistors further. ' +
        'Engineers say the next generation of chips will use less power while running faster. ' +
        'Analysts expect the first products next year.',
    );
  });

  it('reads og:image and the byline timestamp', () => {
    const content = extractFromHtml(loadFixture('bbc', 'article.html'), BBC_URL);

    expect(content?.imageUrl).toBe('https://ichef.bbci.co.uk/news/1024/branded_news/chip-large.jpg');
    expect(content?.publishedAt?.toISOString()).toBe('2026-10-18T07:30:00.000Z');
  });

  it('falls back to the longest paragraph group on old layouts', () => {
    const content = extractFromHtml(loadFixture('bbc', 'article-legacy.html'), BBC_URL);

    expect(content).toEqual({
      fullText:
        'The council approved the new cycling lanes after a long public consultation period. ' +
        'Work on the first stretch begins in the spring and should take about six months.',
      imageUrl: null,
      publishedAt: null,
      strategy: 'longest-text-block',
    });
  });

  it('uses a content container on non-BBC pages', () => {
    const content = extractFromHtml(
      loadFixture('generic', 'blog-post.html'),
      'https://example.com/blog/post-1',
    );

    expect(content?.strategy).toBe('content-container');
    expect(content?.fullText).toBe(
      'Harbour redevelopment ' +
        'The harbour redevelopment plan includes new housing and a ferry terminal. ' +
        'Residents can comment on the proposal until the end of the month.',
    );
    expect(content?.imageUrl).toBe('https://example.com/images/cover.png');
    expect(content?.publishedAt?.toISOString()).toBe('2026-10-17T12:00:00.000Z');
  });

  it('runs the next strategy when one finds too little text', () => {
    const short = 'x'.repeat(MIN_TEXT_LENGTH - 1);
    const long = 'y'.repeat(MIN_TEXT_LENGTH);
    const first: ExtractionStrategy = { name: 'first', extract: vi.fn(() => short) };
    const second: ExtractionStrategy = { name: 'second', extract: vi.fn(() => long) };
    const third: ExtractionStrategy = { name: 'third', extract: vi.fn(() => 'unused') };

    const content = extractFromHtml('<html></html>', 'https://example.com/a', [first, second, third]);

    expect(content?.strategy).toBe('second');
    expect(content?.fullText).toBe(long);
    expect(first.extract).toHaveBeenCalledOnce();
    expect(third.extract).not.toHaveBeenCalled();
  });

  it('skips strategies that do not apply to the URL', () => {
    const bbcOnly: ExtractionStrategy = {
      name: 'bbc-only',
      appliesTo: () => false,
      extract: vi.fn(() => 'z'.repeat(MIN_TEXT_LENGTH)),
    };

    expect(extractFromHtml('<html></html>', 'https://example.com/a', [bbcOnly])).toBeNull();
    expect(bbcOnly.extract).not.toHaveBeenCalled();
  });

  it('reads the lazy-load source of a content image behind a placeholder', () => {
    const text = 'Paragraph text long enough to count as the article body for this page.';
    const html = `<html><body><main>
      <img src="data:image/png;base64,iVBORw0KGgo=" data-src="/media/photo.jpg">
      <p>${text}</p>
    </main></body></html>`;

    const content = extractFromHtml(html, 'https://example.com/story');

    expect(content?.imageUrl).toBe('https://example.com/media/photo.jpg');
  });

  it('returns null when no strategy finds text', () => {
    expect(extractFromHtml('<html><body><p>Too short</p></body></html>', BBC_URL)).toBeNull();
  });
});

describe('extractArticle', () => {
  it('fetches the page and extracts it', async () => {
    const http = new StubHttpClient().on(BBC_URL, loadFixture('bbc', 'article.html'));

    const content = await extractArticle(BBC_URL, http);

    expect(content.strategy).toBe('bbc-text-blocks');
    expect(http.requested).toEqual([BBC_URL]);
  });

  it('throws an ExtractionError when the page cannot be fetched', async () => {
    const http = new StubHttpClient().on(BBC_URL, 'Not Found', 404);

    await expect(extractArticle(BBC_URL, http)).rejects.toThrow(
      `Article fetch failed: GET ${BBC_URL} responded 404`,
    );
  });

  it('throws an ExtractionError when no text is found', async () => {
    const http = new StubHttpClient().on(BBC_URL, '<html><body></body></html>');

    const error = await extractArticle(BBC_URL, http).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toHaveProperty('url', BBC_URL);
  });
});
