import type { BbcSection, Source, SourceRow } from '../types/source.js';

/** BBC listing pages scraped instead of the section's RSS feed. */
export const BBC_SECTION_URLS: Record<BbcSection, string> = {
  Business: 'https://www.bbc.com/news/business',
  Technology: 'https://www.bbc.com/news/technology',
  Health: 'https://www.bbc.com/news/health',
  Sport: 'https://www.bbc.com/sport',
  News: 'https://www.bbc.com/news',
};

export const DEFAULT_CATEGORY = 'General';

function isBbcSection(category: string): category is BbcSection {
  return Object.hasOwn(BBC_SECTION_URLS, category);
}

/**
 * Turns a `sources` row into a Source variant. BBC-named rows in one of the
 * scraped sections become section sources; every other row is read as RSS.
 */
export function resolveSource(row: SourceRow): Source {
  const name = row.name.trim();
  const category = row.category.trim() || DEFAULT_CATEGORY;
  const base = {
    id: row.id,
    name,
    feedUrl: row.feed_url.trim(),
    baseUrl: row.base_url?.trim() || null,
    category,
  };

  if (name.startsWith('BBC') && isBbcSection(category)) {
    return {
      ...base,
      kind: 'section',
      section: category,
      sectionUrl: BBC_SECTION_URLS[category],
    };
  }

  return { ...base, kind: 'rss' };
}

export function resolveSources(rows: SourceRow[]): Source[] {
  return rows.filter((row) => row.is_active).map(resolveSource);
}
