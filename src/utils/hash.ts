import { createHash } from 'crypto';

/**
 * Generate MD5 hash of a string
 */
export function hashString(content: string): string {
  return createHash('md5').update(content).digest('hex');
}
