import { createHash } from 'node:crypto';

/**
 * Lower-case hex SHA-256 of the UTF-8 encoded password.
 * Stored hashes depend on this exact encoding.
 */
export function hashPassword(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}
