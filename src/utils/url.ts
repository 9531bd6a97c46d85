/**
 * Resolves protocol-relative (`//host/x`) and root-relative (`/x`) links
 * against the page they were found on. Absolute URLs pass through.
 */
export function absolutizeUrl(href: string, pageUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith('data:')) return null;
  try {
    return new URL(trimmed, pageUrl).toString();
  } catch {
    return null;
  }
}

/** First of an image's `src` / `data-src` values that resolves; lazy-load placeholders are skipped. */
export function resolveImageSrc(
  sources: ReadonlyArray<string | undefined>,
  pageUrl: string,
): string | null {
  for (const src of sources) {
    if (!src) continue;
    const url = absolutizeUrl(src, pageUrl);
    if (url) return url;
  }
  return null;
}

export function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

export function isBbcUrl(url: string): boolean {
  const host = hostnameOf(url);
  return (
    host === 'bbc.com' ||
    host === 'bbc.co.uk' ||
    host.endsWith('.bbc.com') ||
    host.endsWith('.bbc.co.uk')
  );
}
