import { checkPasswordPolicy, hashPassword, needsRehash, parsePasswordHash, verifyPassword } from '@/utils/password';

describe('password utilities', () => {
  describe('hashPassword / verifyPassword', () => {
    it('should produce a salted pbkdf2 hash that verifies', async () => {
      const hash = await hashPassword('Secret#123', 1000);

      expect(hash.startsWith('pbkdf2_sha256$1000$')).toBe(true);
      expect(await verifyPassword('Secret#123', hash)).toBe(true);
      expect(await verifyPassword('Secret#124', hash)).toBe(false);
    });

    it('should salt every hash differently', async () => {
      const first = await hashPassword('Secret#123', 1000);
      const second = await hashPassword('Secret#123', 1000);

      expect(first).not.toBe(second);
    });

    it('should never match a malformed stored hash', async () => {
      expect(await verifyPassword('Secret#123', 'Secret#123')).toBe(false);
      expect(await verifyPassword('Secret#123', 'pbkdf2_sha256$abc$c2FsdA$aGFzaA')).toBe(false);
    });
  });

  describe('parsePasswordHash', () => {
    it('should reject hashes of the wrong length or algorithm', () => {
      expect(parsePasswordHash('pbkdf2_sha256$1000$c2FsdA$aGFzaA')).toBeNull();
      expect(parsePasswordHash('bcrypt$10$c2FsdA$aGFzaA')).toBeNull();
    });
  });

  describe('needsRehash', () => {
    it('should flag hashes below the configured iteration count', async () => {
      const hash = await hashPassword('Secret#123', 1000);

      expect(needsRehash(hash, 2000)).toBe(true);
      expect(needsRehash(hash, 1000)).toBe(false);
      expect(needsRehash('garbage', 1000)).toBe(true);
    });
  });

  describe('checkPasswordPolicy', () => {
    it('should accept a password meeting every rule', () => {
      expect(checkPasswordPolicy('Str0ng!Pass')).toEqual([]);
    });

    it('should list every unmet rule', () => {
      expect(checkPasswordPolicy('weak')).toEqual([
        'Password must be at least 8 characters long',
        'Password must contain at least one uppercase letter',
        'Password must contain at least one number',
        'Password must contain at least one special character',
      ]);
    });

    it('should not count whitespace as a special character', () => {
      expect(checkPasswordPolicy('Abcdefg1 ')).toEqual(['Password must contain at least one special character']);
    });

    it('should count punctuation outside the usual symbol set', () => {
      expect(checkPasswordPolicy('Abcdefg1~')).toEqual([]);
    });
  });
});
