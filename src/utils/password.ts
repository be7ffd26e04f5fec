/**
 * Password Hashing Utilities
 * PBKDF2-SHA256 via node:crypto (runs on the libuv thread pool)
 *
 * Stored format: pbkdf2_sha256$<iterations>$<salt b64>$<hash b64>
 */

import { pbkdf2, randomBytes, timingSafeEqual } from 'node:crypto';
import { promisify } from 'node:util';
import { PASSWORD_POLICY } from '@/config/businessRules';

const pbkdf2Async = promisify(pbkdf2);

const ALGORITHM = 'pbkdf2_sha256';
const SALT_LENGTH = 16;
const KEY_LENGTH = 32;

export interface ParsedPasswordHash {
  iterations: number;
  salt: Buffer;
  hash: Buffer;
}

/**
 * Hash a password with a fresh random salt
 */
export async function hashPassword(
  password: string,
  iterations: number = PASSWORD_POLICY.ITERATIONS
): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const hash = await pbkdf2Async(password, salt, iterations, KEY_LENGTH, 'sha256');
  return [ALGORITHM, String(iterations), salt.toString('base64'), hash.toString('base64')].join('$');
}

/**
 * Split a stored hash into its parts
 * @returns null when the value is not in the expected format
 */
export function parsePasswordHash(stored: string): ParsedPasswordHash | null {
  const [algorithm, iterationsText, saltText, hashText, ...rest] = stored.split('$');
  if (algorithm !== ALGORITHM || !iterationsText || !saltText || !hashText || rest.length > 0) {
    return null;
  }

  const iterations = Number(iterationsText);
  if (!Number.isInteger(iterations) || iterations <= 0) {
    return null;
  }

  const salt = Buffer.from(saltText, 'base64');
  const hash = Buffer.from(hashText, 'base64');
  if (salt.length === 0 || hash.length !== KEY_LENGTH) {
    return null;
  }

  return { iterations, salt, hash };
}

/**
 * Verify a password against a stored hash
 * Malformed hashes never match.
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const parsed = parsePasswordHash(stored);
  if (!parsed) {
    return false;
  }

  const derived = await pbkdf2Async(password, parsed.salt, parsed.iterations, KEY_LENGTH, 'sha256');
  // Constant-time comparison
  return timingSafeEqual(derived, parsed.hash);
}

/**
 * True when the stored hash was produced with fewer iterations than configured
 */
export function needsRehash(stored: string, iterations: number = PASSWORD_POLICY.ITERATIONS): boolean {
  const parsed = parsePasswordHash(stored);
  return !parsed || parsed.iterations < iterations;
}

/**
 * Check a candidate password against the password policy
 * @returns human-readable list of unmet rules (empty when the password is acceptable)
 */
export function checkPasswordPolicy(password: string): string[] {
  const unmet: string[] = [];

  if (password.length < PASSWORD_POLICY.MIN_LENGTH) {
    unmet.push(`Password must be at least ${PASSWORD_POLICY.MIN_LENGTH} characters long`);
  }
  if (password.length > PASSWORD_POLICY.MAX_LENGTH) {
    unmet.push(`Password must be at most ${PASSWORD_POLICY.MAX_LENGTH} characters long`);
  }
  if (!/[A-Z]/.test(password)) {
    unmet.push('Password must contain at least one uppercase letter');
  }
  if (!/[a-z]/.test(password)) {
    unmet.push('Password must contain at least one lowercase letter');
  }
  if (!/\d/.test(password)) {
    unmet.push('Password must contain at least one number');
  }
  // Any character that is not a letter, digit or whitespace counts as a symbol
  if (!/[^A-Za-z0-9\s]/.test(password)) {
    unmet.push('Password must contain at least one special character');
  }

  return unmet;
}
