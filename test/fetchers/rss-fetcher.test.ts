import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { parseFeed, fetchCandidates } from '../../src/fetchers/index.js';
import { escapeBareAmpersands } from '../../src/fetchers/rss-fetcher.js';
import { resolveSource } from '../../src/sources/registry.js';
import type { ArticleCandidate } from '../../src/types/article.js';
import type { Source } from '../../src/types/source.js';
import { loadFixture } from '../helpers/fixture-loader.js';
import { sourceRow } from '../helpers/sources.js';
import { StubHttpClient } from '../helpers/stub-http.js';

const FEED_URL = 'https://pharma.example.com/feed.xml';
const silent = pino({ level: 'silent' });

function pharmaSource(): Source {
  return resolveSource(sourceRow({ name: 'Pharma Wire', category: 'Pharma', feed_url: FEED_URL }));
}

async function collect(gen: AsyncGenerator<ArticleCandidate>): Promise<ArticleCandidate[]> {
  const items: ArticleCandidate[] = [];
  for await (const item of gen) items.push(item);
  return items;
}

describe('parseFeed', () => {
  const xml = loadFixture('rss', 'pharma-feed.xml');

  it('yields one candidate per item with a link', async () => {
    const candidates = await parseFeed(xml, pharmaSource());

    expect(candidates.map((c) => c.articleUrl)).toEqual([
      'https://pharma.example.com/news/trial-results',
      'https://pharma.example.com/news/vaccine-approval',
      'https://pharma.example.com/news/untitled',
    ]);
  });

  it('reads title, date and media thumbnail', async () => {
    const [first] = await parseFeed(xml, pharmaSource());

    expect(first?.title).toBe('Drug maker reports trial results');
    expect(first?.source).toBe('Pharma Wire');
    expect(first?.imageUrl).toBe('https://pharma.example.com/img/trial.jpg');
    expect(first?.publishedAt?.toISOString()).toBe('2026-10-17T09:15:00.000Z');
  });

  it('takes an image enclosure and trims the title', async () => {
    const candidates = await parseFeed(xml, pharmaSource());

    expect(candidates[1]?.title).toBe('Regulator approves new vaccine');
    expect(candidates[1]?.imageUrl).toBe('https://pharma.example.com/img/vaccine.png');
  });

  it('defaults a missing title and leaves date and image empty', async () => {
    const candidates = await parseFeed(xml, pharmaSource());

    expect(candidates[2]).toEqual({
      title: '(No title)',
      articleUrl: 'https://pharma.example.com/news/untitled',
      imageUrl: null,
      source: 'Pharma Wire',
      publishedAt: null,
    });
  });
});

describe('parseFeed with bare ampersands', () => {
  const xml = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Pharma & Biotech</title>
    <item>
      <title>Merck & Co wins approval &amp; expands trial</title>
      <link>https://pharma.example.com/news?id=42&ref=rss</link>
    </item>
  </channel>
</rss>`;

  it('escapes them instead of losing the feed', async () => {
    const candidates = await parseFeed(xml, pharmaSource());

    expect(candidates).toHaveLength(1);
    expect(candidates[0]?.title).toBe('Merck & Co wins approval & expands trial');
    expect(candidates[0]?.articleUrl).toBe('https://pharma.example.com/news?id=42&ref=rss');
  });

  it('leaves entity and character references alone', () => {
    expect(escapeBareAmpersands('A & B &amp; C &#38; D &#x26; E')).toBe(
      'A &amp; B &amp; C &#38; D &#x26; E',
    );
  });
});

describe('fetchCandidates', () => {
  it('fetches the feed URL of an RSS source', async () => {
    const http = new StubHttpClient().on(FEED_URL, loadFixture('rss', 'pharma-feed.xml'));

    const candidates = await collect(fetchCandidates(pharmaSource(), http, silent));

    expect(candidates).toHaveLength(3);
    expect(http.requested).toEqual([FEED_URL]);
  });

  it('fetches the listing page, not the feed, of a section source', async () => {
    const source = resolveSource(
      sourceRow({
        name: 'BBC Technology',
        category: 'Technology',
        feed_url: 'https://feeds.bbci.co.uk/news/technology/rss.xml',
      }),
    );
    const http = new StubHttpClient().on(
      'https://www.bbc.com/news/technology',
      loadFixture('bbc', 'section-technology.html'),
    );

    const candidates = await collect(fetchCandidates(source, http, silent));

    expect(candidates).toHaveLength(3);
    expect(http.requested).toEqual(['https://www.bbc.com/news/technology']);
  });

  it('yields nothing when the feed is malformed', async () => {
    const http = new StubHttpClient().on(FEED_URL, 'this is not xml at all');

    await expect(collect(fetchCandidates(pharmaSource(), http, silent))).resolves.toEqual([]);
  });

  it('yields nothing when the feed cannot be fetched', async () => {
    const http = new StubHttpClient().on(FEED_URL, 'Service Unavailable', 503);

    await expect(collect(fetchCandidates(pharmaSource(), http, silent))).resolves.toEqual([]);
  });

  it('does not fetch until the sequence is pulled', () => {
    const http = new StubHttpClient().on(FEED_URL, loadFixture('rss', 'pharma-feed.xml'));

    fetchCandidates(pharmaSource(), http, silent);

    expect(http.requested).toEqual([]);
  });
});
