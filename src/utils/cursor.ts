import { ValidationError } from '@/errors';

/**
 * Keyset pagination position: created_at with id as tie-breaker
 */
export interface HistoryCursor {
  createdAt: Date;
  id: number;
}

export function encodeCursor(position: HistoryCursor): string {
  return Buffer.from(`${position.createdAt.toISOString()}|${position.id}`, 'utf8').toString('base64url');
}

/**
 * @throws ValidationError for anything encodeCursor did not produce
 */
export function decodeCursor(cursor: string): HistoryCursor {
  const [timestamp, idText, ...rest] = Buffer.from(cursor, 'base64url').toString('utf8').split('|');
  const createdAt = new Date(timestamp ?? '');
  const id = Number(idText);

  if (rest.length > 0 || Number.isNaN(createdAt.getTime()) || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('Invalid pagination cursor');
  }
  return { createdAt, id };
}
