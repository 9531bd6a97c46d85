import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { isBbcUrl } from '../utils/url.js';

export interface ExtractionStrategy {
  readonly name: string;
  /** Strategies without a predicate apply to every page */
  appliesTo?(url: string): boolean;
  extract(html: string, url: string): string | null;
}

const BLOCK_SELECTOR = 'p, h1, h2, h3, h4, h5, h6, li, blockquote, pre';
const NOISE_SELECTOR = 'script, style, noscript, template, svg, iframe';

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Text of the first element matching `rootSelector`, one block element at a
 * time so adjacent paragraphs do not run together.
 */
function readableText($: CheerioAPI, rootSelector: string): string {
  const root = $<Element, string>(rootSelector).first();
  if (!root.length) return '';

  const blocks = root
    .find(BLOCK_SELECTOR)
    .filter((_i, el) => $(el).parentsUntil(root).filter(BLOCK_SELECTOR).length === 0)
    .map((_i, el) => collapse($(el).text()))
    .get()
    .filter((text) => text.length > 0);

  return blocks.length > 0 ? blocks.join(' ') : collapse(root.text());
}

/** BBC article pages keep body copy in `data-component="text-block"` containers. */
export const bbcTextBlocks: ExtractionStrategy = {
  name: 'bbc-text-blocks',
  appliesTo: isBbcUrl,
  extract(html) {
    const $ = cheerio.load(html);
    const rootSelector = $('article').length ? 'article' : 'main';
    const root = $(rootSelector).first();
    if (!root.length) return null;

    root
      .find(
        `${NOISE_SELECTOR}, time, .visually-hidden, figcaption, ` +
          '[data-component="image-block"], [data-component="video-block"]',
      )
      .remove();

    let parts = root
      .find('div[data-component="text-block"]')
      .map((_i, el) => {
        const paragraphs = $(el)
          .find('p')
          .map((_j, p) => collapse($(p).text()))
          .get();
        return paragraphs.length > 0 ? paragraphs.join(' ') : collapse($(el).text());
      })
      .get()
      .filter((text) => text.length > 20);

    if (parts.length === 0) {
      parts = root
        .find('p')
        .map((_i, p) => collapse($(p).text()))
        .get()
        .filter((text) => text.length > 20);
    }

    return parts.length > 0 ? parts.join(' ') : null;
  },
};

const CONTAINER_SELECTORS = [
  'article',
  'main',
  '[role="main"]',
  '.post-content',
  '.article-body',
  '.content',
];

/** First well-known content container holding more than 100 characters. */
export const contentContainer: ExtractionStrategy = {
  name: 'content-container',
  extract(html) {
    const $ = cheerio.load(html);
    $(NOISE_SELECTOR).remove();

    for (const selector of CONTAINER_SELECTORS) {
      const text = readableText($, selector);
      if (text.length > 100) return text;
    }
    return null;
  },
};

/**
 * Best-effort fallback for unknown markup: the element whose direct `<p>`
 * children carry the most text.
 */
export const longestTextBlock: ExtractionStrategy = {
  name: 'longest-text-block',
  extract(html) {
    const $ = cheerio.load(html);
    $(`${NOISE_SELECTOR}, nav, header, footer, aside, form`).remove();

    let best = '';
    $('body, article, main, section, div, td').each((_i, el) => {
      const text = $(el)
        .children('p')
        .map((_j, p) => collapse($(p).text()))
        .get()
        .filter((t) => t.length > 0)
        .join(' ');
      if (text.length > best.length) best = text;
    });

    return best || null;
  },
};

/** Tried in order; the first result long enough wins. */
export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  bbcTextBlocks,
  contentContainer,
  longestTextBlock,
];
