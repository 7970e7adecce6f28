import { createHash } from 'node:crypto';
import { normalizeForMatching } from './text.util';

/**
 * SHA-256 of the normalized title and description. Entries whose text
 * normalizes to nothing (emoji-only, bare URLs) are keyed by their link.
 */
export function computeFingerprint(
  title: string,
  description: string,
  link: string,
): string {
  const normalized = normalizeForMatching(`${title} ${description}`);
  const key = normalized ? normalized : `link:${link.trim()}`;
  return createHash('sha256').update(key, 'utf8').digest('hex');
}
