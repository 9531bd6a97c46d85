import Parser from 'rss-parser';
import type { ArticleCandidate } from '../types/article.js';
import type { Source } from '../types/source.js';
import { parseDate } from '../utils/date.js';
import { absolutizeUrl } from '../utils/url.js';

/** xml2js shape of `<media:thumbnail url="…"/>` and `<media:content url="…"/>` */
type MediaElement = string | { $?: { url?: string; medium?: string; type?: string } };

interface FeedItemFields {
  mediaThumbnail?: MediaElement;
  mediaContent?: MediaElement;
}

const parser: Parser<Record<string, unknown>, FeedItemFields> = new Parser({
  customFields: {
    item: [
      ['media:thumbnail', 'mediaThumbnail'],
      ['media:content', 'mediaContent'],
    ],
  },
});

type FeedItem = FeedItemFields & Parser.Item;

function mediaUrl(media: MediaElement | undefined, requireImage: boolean): string | null {
  if (!media || typeof media === 'string') return null;
  const attrs = media.$;
  if (!attrs?.url) return null;
  if (requireImage) {
    const medium = attrs.medium ?? '';
    const type = attrs.type ?? '';
    if (medium && medium !== 'image') return null;
    if (type && !type.startsWith('image/')) return null;
  }
  return attrs.url;
}

function enclosureImage(item: FeedItem): string | null {
  const enclosure = item.enclosure;
  if (!enclosure?.url || !enclosure.type?.startsWith('image/')) return null;
  return enclosure.url;
}

/** Feeds only carry an image when they say so; no page is fetched for one. */
function feedImage(item: FeedItem, feedUrl: string): string | null {
  const raw =
    mediaUrl(item.mediaThumbnail, false) ??
    mediaUrl(item.mediaContent, true) ??
    enclosureImage(item);
  return raw ? absolutizeUrl(raw, feedUrl) : null;
}

/** `&` not starting an entity reference, as in `Merck & Co` or `?a=1&b=2`. */
const BARE_AMPERSAND = /&(?!(?:[a-zA-Z][\w.-]*|#\d+|#x[0-9a-fA-F]+);)/g;

/** The XML parser rejects `&` outside an entity reference. */
export function escapeBareAmpersands(xml: string): string {
  return xml.replace(BARE_AMPERSAND, '&amp;');
}

export async function parseFeed(xml: string, source: Source): Promise<ArticleCandidate[]> {
  const feed = await parser.parseString(escapeBareAmpersands(xml));
  const candidates: ArticleCandidate[] = [];

  for (const item of feed.items) {
    const link = item.link?.trim();
    if (!link) continue;
    const articleUrl = absolutizeUrl(link, source.feedUrl);
    if (!articleUrl) continue;

    candidates.push({
      title: item.title?.trim() || '(No title)',
      articleUrl,
      imageUrl: feedImage(item, source.feedUrl),
      source: source.name,
      publishedAt: parseDate(item.isoDate ?? item.pubDate),
    });
  }

  return candidates;
}
