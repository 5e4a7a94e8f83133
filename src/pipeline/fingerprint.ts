/**
 * DealRelay — Content Fingerprint
 *
 * Cross-posted deals usually differ only in spacing and case.
 */

import { createHash } from 'crypto';

export function normalizeForFingerprint(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * SHA-256 hex of the normalized text, or undefined when there is no text.
 */
export function contentFingerprint(text: string): string | undefined {
  const normalized = normalizeForFingerprint(text);
  if (!normalized) return undefined;
  return createHash('sha256').update(normalized).digest('hex');
}
