/**
 * Parses a feed or page timestamp. Returns null for missing or unparseable
 * input instead of an Invalid Date.
 */
export function parseDate(raw: string | null | undefined): Date | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
