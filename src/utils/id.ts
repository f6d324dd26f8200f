import { randomBytes } from 'node:crypto';

const MAX_PREFIX_LENGTH = 50;
const SAFE_PREFIX_PATTERN = /^[a-z0-9-]+$/i;

/** Characters of the task title that take part in the idempotency key */
export const IDEMPOTENCY_TITLE_LENGTH = 50;

/**
 * Generate a unique ID with a prefix.
 *
 * Format: `{prefix}-{base36 timestamp}-{12 random base64url chars}`
 *
 * @throws {Error} If the prefix is empty, too long, or has characters outside [a-z0-9-]
 *
 * @example
 * generateId('task') // => 'task-m5x8z7k-A3bC9dE2fG1h'
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
 * Short random ID (11 base64url chars) for values that need no prefix.
 */
export function shortId(): string {
  return randomBytes(8).toString('base64url').slice(0, 11);
}

/**
 * Persistence key for a scheduled task. Two tasks for the same user on the
 * same day whose titles share their first 50 characters collapse to one row.
 *
 * @example
 * idempotencyKey('user-1', '2025-03-01', 'Email Prof. Lee') // => 'user-1_2025-03-01_Email Prof. Lee'
 */
export function idempotencyKey(userId: string, scheduledDate: string, title: string): string {
  return `${userId}_${scheduledDate}_${title.slice(0, IDEMPOTENCY_TITLE_LENGTH)}`;
}
