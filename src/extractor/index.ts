import * as cheerio from 'cheerio';
import type { ExtractedContent } from '../types/article.js';
import type { HttpClient } from '../workers/http-client.js';
import { ExtractionError, errorMessage } from '../errors.js';
import { DEFAULT_STRATEGIES, type ExtractionStrategy } from './strategies.js';
import { extractImageUrl, extractPublishedAt } from './metadata.js';

export { DEFAULT_STRATEGIES, type ExtractionStrategy } from './strategies.js';

/** Text shorter than this is treated as "nothing found". */
export const MIN_TEXT_LENGTH = 50;

/**
 * Runs the applicable strategies in order and returns the first text of at
 * least MIN_TEXT_LENGTH characters, or null when none produces one.
 */
export function extractFromHtml(
  html: string,
  url: string,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): ExtractedContent | null {
  for (const strategy of strategies) {
    if (strategy.appliesTo && !strategy.appliesTo(url)) continue;

    const text = strategy.extract(html, url);
    if (!text || text.length < MIN_TEXT_LENGTH) continue;

    const $ = cheerio.load(html);
    return {
      fullText: text,
      imageUrl: extractImageUrl($, url),
      publishedAt: extractPublishedAt($),
      strategy: strategy.name,
    };
  }
  return null;
}

export async function extractArticle(
  url: string,
  http: HttpClient,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): Promise<ExtractedContent> {
  let html: string;
  try {
    ({ body: html } = await http.get(url));
  } catch (err) {
    throw new ExtractionError(url, `Article fetch failed: ${errorMessage(err)}`, { cause: err });
  }

  const content = extractFromHtml(html, url, strategies);
  if (!content) {
    throw new ExtractionError(url, 'No article text found by any extraction strategy');
  }
  return content;
}
