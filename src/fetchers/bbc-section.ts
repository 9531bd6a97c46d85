import * as cheerio from 'cheerio';
import type { ArticleCandidate } from '../types/article.js';
import type { SectionScrapeSource } from '../types/source.js';
import { absolutizeUrl, isBbcUrl, resolveImageSrc } from '../utils/url.js';

/** Upper bound on candidates taken from one listing page. */
export const MAX_SECTION_CANDIDATES = 100;

const MIN_TITLE_LENGTH = 10;
const MAX_TITLE_LENGTH = 200;

const EXCLUDED_PATH_SEGMENTS = ['/live/', '/av/', '/weather/', '/travel/', '/help/'];

/**
 * BBC article URLs look like:
 * - /news/articles/c5e74z5j8e1o
 * - /news/world-us-canada-12345678
 * - /sport/football/12345678
 * Section and navigation pages (/news/technology, /sport/football) are not articles.
 */
export function isBbcArticleUrl(url: string): boolean {
  if (!isBbcUrl(url)) return false;

  const path = new URL(url).pathname.toLowerCase();
  if (!path.includes('/news/') && !path.includes('/sport/')) return false;
  if (EXCLUDED_PATH_SEGMENTS.some((segment) => path.includes(segment))) return false;
  if (path.includes('/articles/')) return true;

  const lastSegment = path.replace(/\/+$/, '').split('/').pop() ?? '';
  if (/\d{5,}$/.test(lastSegment)) return true;

  return path.includes('/sport/') && /\d{5,}/.test(path);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

interface ListingEntry {
  title: string | null;
  imageUrl: string | null;
}

/**
 * Extract article candidates from a section listing page.
 *
 * Story cards often link the same article twice (image and headline), so
 * title and thumbnail are merged across every anchor pointing to a URL.
 * Candidates keep the order in which their URL first appears.
 */
export function parseSectionPage(html: string, source: SectionScrapeSource): ArticleCandidate[] {
  const $ = cheerio.load(html);
  const origin = new URL(source.sectionUrl).origin;
  const entries = new Map<string, ListingEntry>();

  $('a[href*="/news/"], a[href*="/sport/"]').each((_i, el) => {
    const link = $(el);
    const href = link.attr('href');
    if (!href) return;

    const absolute = absolutizeUrl(href, origin);
    if (!absolute) return;
    const url = absolute.split('#')[0] ?? absolute;
    if (!isBbcArticleUrl(url)) return;

    const entry = entries.get(url) ?? { title: null, imageUrl: null };

    if (!entry.title) {
      const heading = link
        .find('h2, h3, span')
        .filter((_j, node) => {
          const marker = `${$(node).attr('class') ?? ''} ${$(node).attr('data-testid') ?? ''}`;
          return /title|headline/i.test(marker);
        })
        .first();
      const text = collapse(heading.length ? heading.text() : link.text()).slice(0, MAX_TITLE_LENGTH);
      if (text.length >= MIN_TITLE_LENGTH) entry.title = text;
    }

    if (!entry.imageUrl) {
      const img = link.find('img').first();
      entry.imageUrl = resolveImageSrc([img.attr('src'), img.attr('data-src')], origin);
    }

    entries.set(url, entry);
  });

  const candidates: ArticleCandidate[] = [];
  for (const [articleUrl, entry] of entries) {
    if (candidates.length >= MAX_SECTION_CANDIDATES) break;
    if (!entry.title) continue;
    candidates.push({
      title: entry.title,
      articleUrl,
      imageUrl: entry.imageUrl,
      source: source.name,
      publishedAt: null,
    });
  }

  return candidates;
}
