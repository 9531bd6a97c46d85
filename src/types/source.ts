/** A row of the `sources` table. */
export interface SourceRow {
  id: number;
  name: string;
  feed_url: string;
  base_url: string | null;
  category: string;
  is_active: boolean;
}

export type BbcSection = 'Business' | 'Technology' | 'Health' | 'Sport' | 'News';

interface SourceBase {
  id: number;
  name: string;
  feedUrl: string;
  baseUrl: string | null;
  category: string;
}

export interface RssSource extends SourceBase {
  kind: 'rss';
}

export interface SectionScrapeSource extends SourceBase {
  kind: 'section';
  section: BbcSection;
  /** Listing page scraped for article links */
  sectionUrl: string;
}

/** Resolved once at registry-load time; `kind` selects the fetch path. */
export type Source = RssSource | SectionScrapeSource;
