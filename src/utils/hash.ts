import { createHash } from 'crypto';

/**
 * Content fingerprint used for deduplication.
 * Same title and plain text always give the same hex digest.
 */
export function computeFingerprint(title: string, plainText: string): string {
  return createHash('sha256').update(title + plainText).digest('hex');
}
