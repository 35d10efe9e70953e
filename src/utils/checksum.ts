/**
 * @arch fmtkit.util
 *
 * Content digests used for change detection.
 */
import { createHash } from 'node:crypto';

/**
 * Compute the SHA-512 digest of `content` encoded with `encoding`.
 * Returns the full lowercase hex digest (128 characters).
 */
export function computeDigest(content: string, encoding: BufferEncoding = 'utf8'): string {
  return createHash('sha512').update(Buffer.from(content, encoding)).digest('hex');
}

/**
 * Short SHA-256 checksum for configuration fingerprints.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}
