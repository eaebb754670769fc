/**
 * SHA-256 content hashing used as the staleness authority of the cache.
 */
import { createHash } from 'node:crypto';

/**
 * Compute a SHA-256 checksum of the given content.
 * Returns the first 16 characters of the hex digest for brevity.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}
