import { randomBytes } from 'node:crypto';

const MAX_PREFIX_LENGTH = 50;

/**
 * Only alphanumeric characters and hyphens.
 */
const SAFE_PREFIX_PATTERN = /^[a-z0-9-]+$/i;

/**
 * Session IDs end up in SQLite keys, file names and resource URIs.
 */
const SAFE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Generate a cryptographically secure unique ID with a prefix.
 *
 * Format: `{prefix}-{timestamp}-{random}`
 * - timestamp: Base36 encoded milliseconds since epoch
 * - random: 12 characters of base64url encoded random bytes
 *
 * @throws {Error} If prefix is empty, too long, or contains unsafe characters
 *
 * @example
 * generateId('session') // => 'session-m5x8z7k-A3bC9dE2fG1h'
 */
export function generateId(prefix: string): string {
  if (!prefix) {
    throw new Error('Prefix must be a non-empty string');
  }

  if (prefix.length > MAX_PREFIX_LENGTH) {
    throw new Error(`Prefix must be ${MAX_PREFIX_LENGTH} characters or less`);
  }

  if (!SAFE_PREFIX_PATTERN.test(prefix)) {
    throw new Error('Prefix must contain only alphanumeric characters and hyphens');
  }

  const timestamp = Date.now().toString(36);
  const random = randomBytes(9).toString('base64url').slice(0, 12);

  return `${prefix}-${timestamp}-${random}`;
}

/**
 * Check that a caller-supplied session ID is safe to use as a key.
 *
 * @example
 * isSafeId('session-m5x8z7k-A3bC9dE2fG1h') // => true
 * isSafeId('../session') // => false
 */
export function isSafeId(id: string): boolean {
  return id.length > 0 && id.length <= 128 && SAFE_ID_PATTERN.test(id);
}
