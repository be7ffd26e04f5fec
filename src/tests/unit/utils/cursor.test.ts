import { decodeCursor, encodeCursor } from '@/utils/cursor';
import { ValidationError } from '@/errors';

describe('history cursor', () => {
  it('should decode what it encodes', () => {
    const position = { createdAt: new Date('2024-03-01T10:00:00.000Z'), id: 42 };

    expect(decodeCursor(encodeCursor(position))).toEqual(position);
  });

  it('should reject cursors it did not produce', () => {
    expect(() => decodeCursor('not-a-cursor')).toThrow(ValidationError);
    expect(() => decodeCursor(Buffer.from('2024-03-01T10:00:00.000Z|0').toString('base64url'))).toThrow(
      'Invalid pagination cursor'
    );
    expect(() => decodeCursor(Buffer.from('yesterday|5').toString('base64url'))).toThrow('Invalid pagination cursor');
  });
});
