import { TRANSFER_LIMITS } from '@/config/businessRules';

/**
 * Normalize a free-text description before encryption
 * Strips control characters, trims and caps the length in code points, so a
 * surrogate pair is never split. Empty → null.
 */
export function sanitizeDescription(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;

  const cleaned = value.replace(/[\u0000-\u001f\u007f]/g, ' ').trim();
  if (cleaned.length === 0) return null;

  return Array.from(cleaned).slice(0, TRANSFER_LIMITS.MAX_DESCRIPTION_LENGTH).join('');
}
