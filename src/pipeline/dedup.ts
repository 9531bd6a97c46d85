import crypto from 'node:crypto';

/**
 * SHA-256 of the trimmed article text. Articles whose text could not be read
 * are hashed by URL so the column is never empty.
 */
export function computeContentHash(text: string | null | undefined, fallbackUrl: string): string {
  const normalized = text?.trim() || fallbackUrl;
  return crypto.createHash('sha256').update(normalized, 'utf-8').digest('hex');
}
