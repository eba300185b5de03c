import { createHash, randomBytes } from 'crypto';

function sha256Hex(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Generates a wanted item ID (e.g., 'w-3f9a0c11b2').
 * Title, time and random bytes feed the hash so equal titles never collide.
 */
export function generateWantedId(title: string, now: Date = new Date()): string {
  const input = `${title}:${now.getTime()}:${randomBytes(8).toString('hex')}`;
  return `w-${sha256Hex(input).slice(0, 10)}`;
}

/**
 * Generates a prefixed ID from its inputs plus a second-resolution timestamp
 * (e.g., 'c-1a2b3c4d5e6f7a8b').
 */
export function generatePrefixedId(prefix: string, inputs: string[], now: Date = new Date()): string {
  const timestamp = now.toISOString().replace(/\.\d{3}Z$/, 'Z');
  return `${prefix}-${sha256Hex([...inputs, timestamp].join('|')).slice(0, 16)}`;
}
