import type { ArticleCandidate } from '../types/article.js';
import type { Source } from '../types/source.js';
import type { HttpClient } from '../workers/http-client.js';
import { SourceFetchError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { parseFeed } from './rss-fetcher.js';
import { parseSectionPage } from './bbc-section.js';

export { parseFeed } from './rss-fetcher.js';
export { parseSectionPage, isBbcArticleUrl, MAX_SECTION_CANDIDATES } from './bbc-section.js';

function fetchUrl(source: Source): string {
  return source.kind === 'section' ? source.sectionUrl : source.feedUrl;
}

async function loadCandidates(source: Source, http: HttpClient): Promise<ArticleCandidate[]> {
  const url = fetchUrl(source);
  try {
    const { body } = await http.get(url);
    if (source.kind === 'section') return parseSectionPage(body, source);
    return await parseFeed(body, source);
  } catch (err) {
    throw new SourceFetchError(source.name, url, errorMessage(err), { cause: err });
  }
}

/**
 * Candidates of one source, fetched on first pull. A source that cannot be
 * fetched or parsed is logged and yields nothing.
 */
export async function* fetchCandidates(
  source: Source,
  http: HttpClient,
  logger: Logger = rootLogger,
): AsyncGenerator<ArticleCandidate, void, undefined> {
  let candidates: ArticleCandidate[];
  try {
    candidates = await loadCandidates(source, http);
  } catch (err) {
    logger.error({ err, source: source.name, url: fetchUrl(source) }, 'Source fetch failed');
    return;
  }

  logger.info(
    { source: source.name, kind: source.kind, count: candidates.length },
    'Fetched article candidates',
  );
  yield* candidates;
}
