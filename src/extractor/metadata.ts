import type { CheerioAPI } from 'cheerio';
import { parseDate } from '../utils/date.js';
import { absolutizeUrl, resolveImageSrc } from '../utils/url.js';

const PHOTO_SRC = /ichef|\.jpe?g|\.png/i;

/** og:image, then a BBC ichef image, then the first photo inside the content. */
export function extractImageUrl($: CheerioAPI, pageUrl: string): string | null {
  const ogImage = $('meta[property="og:image"]').attr('content');
  if (ogImage) {
    const url = absolutizeUrl(ogImage, pageUrl);
    if (url) return url;
  }

  const ichef = $('img[data-src*="ichef"]').first();
  const ichefUrl = resolveImageSrc([ichef.attr('data-src'), ichef.attr('src')], pageUrl);
  if (ichefUrl) return ichefUrl;

  const container = $('main').length ? $('main').first() : $('article').first();
  for (const el of container.find('img').toArray()) {
    const photos = [$(el).attr('src'), $(el).attr('data-src')].filter(
      (src) => src !== undefined && PHOTO_SRC.test(src),
    );
    const url = resolveImageSrc(photos, pageUrl);
    if (url) return url;
  }
  return null;
}

/** `<time>` element first (BBC marks the byline one), then the OpenGraph meta tag. */
export function extractPublishedAt($: CheerioAPI): Date | null {
  const stamped = $('time[data-testid="timestamp"]').first();
  const time = stamped.length ? stamped : $('time').first();
  if (time.length) {
    const parsed = parseDate(time.attr('datetime') || time.attr('data-datetime'));
    if (parsed) return parsed;
  }

  return parseDate($('meta[property="article:published_time"]').attr('content'));
}
