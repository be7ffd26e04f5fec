import { CredentialService } from '@/services/credential.service';
import { EncryptionService } from '@/services/encryption.service';
import { IUserRepository } from '@/repositories/interfaces';
import { CreateUserInput } from '@/models';
import { ROLES } from '@/constants/banking';
import { DuplicateIdentityError, WeakPasswordError } from '@/errors';
import { hashPassword, verifyPassword } from '@/utils/password';
import { buildUser, createMockUserRepository } from '@/tests/utils/mockRepositories';

const encryption = new EncryptionService('test-encryption-key-not-for-production');

describe('CredentialService', () => {
  let credentialService: CredentialService;
  let mockUserRepo: jest.Mocked<IUserRepository>;

  const input = {
    username: 'alice',
    email: 'alice@example.com',
    password: 'Str0ng!Pass',
    fullName: 'Alice Example',
    phone: '555-0100',
  };

  beforeEach(() => {
    mockUserRepo = createMockUserRepository();
    mockUserRepo.findByUsername.mockResolvedValue(null);
    mockUserRepo.findByEmail.mockResolvedValue(null);
    mockUserRepo.create.mockImplementation(async (data: CreateUserInput) => buildUser({ ...data, id: 7 }));

    credentialService = new CredentialService(mockUserRepo, encryption, 1000);
  });

  describe('register', () => {
    it('should store a hash and an encrypted phone, never the raw values', async () => {
      const user = await credentialService.register(input);

      const stored = mockUserRepo.create.mock.calls[0]?.[0];
      expect(stored?.role).toBe(ROLES.STANDARD);
      expect(stored?.passwordHash).not.toContain('Str0ng!Pass');
      expect(await verifyPassword('Str0ng!Pass', stored?.passwordHash ?? '')).toBe(true);
      expect(encryption.decryptOptional(stored?.phoneEncrypted ?? null)).toBe('555-0100');
      expect(user.id).toBe(7);
    });

    it('should store no phone when none is given', async () => {
      await credentialService.register({ ...input, phone: undefined });

      expect(mockUserRepo.create.mock.calls[0]?.[0].phoneEncrypted).toBeNull();
    });

    it('should reject weak passwords with every unmet rule', async () => {
      const attempt = credentialService.register({ ...input, password: 'password' });

      await expect(attempt).rejects.toThrow(WeakPasswordError);
      await expect(attempt).rejects.toMatchObject({
        rules: [
          'Password must contain at least one uppercase letter',
          'Password must contain at least one number',
          'Password must contain at least one special character',
        ],
      });
      expect(mockUserRepo.create).not.toHaveBeenCalled();
    });

    it('should reject a taken username', async () => {
      mockUserRepo.findByUsername.mockResolvedValue(buildUser());

      await expect(credentialService.register(input)).rejects.toMatchObject({ field: 'username' });
    });

    it('should reject a taken email', async () => {
      mockUserRepo.findByEmail.mockResolvedValue(buildUser());

      await expect(credentialService.register(input)).rejects.toThrow(DuplicateIdentityError);
      await expect(credentialService.register(input)).rejects.toThrow('An account with this email already exists');
    });
  });

  describe('ensureAdmin', () => {
    it('should create an administrator when the username is free', async () => {
      const admin = await credentialService.ensureAdmin({ ...input, username: 'admin' });

      expect(admin?.role).toBe(ROLES.ADMIN);
      expect(mockUserRepo.create.mock.calls[0]?.[0].role).toBe(ROLES.ADMIN);
    });

    it('should leave an existing user alone', async () => {
      mockUserRepo.findByUsername.mockResolvedValue(buildUser({ username: 'admin' }));

      expect(await credentialService.ensureAdmin({ ...input, username: 'admin' })).toBeNull();
      expect(mockUserRepo.create).not.toHaveBeenCalled();
    });
  });

  describe('verify', () => {
    it('should match the right password', async () => {
      const user = buildUser({ passwordHash: await hashPassword('Str0ng!Pass', 1000) });
      mockUserRepo.findByUsername.mockResolvedValue(user);

      expect(await credentialService.verify('alice', 'Str0ng!Pass')).toEqual({ ok: true, userId: 1, user });
    });

    it('should give the same negative result for unknown users and wrong passwords', async () => {
      const user = buildUser({ passwordHash: await hashPassword('Str0ng!Pass', 1000) });
      mockUserRepo.findByUsername.mockResolvedValueOnce(user).mockResolvedValueOnce(null);

      const wrongPassword = await credentialService.verify('alice', 'Wr0ng!Pass');
      const unknownUser = await credentialService.verify('mallory', 'Wr0ng!Pass');

      expect(wrongPassword.ok).toBe(false);
      expect(unknownUser).toEqual({ ok: false, userId: null, user: null });
    });

    it('should refuse deactivated users even with the right password', async () => {
      mockUserRepo.findByUsername.mockResolvedValue(
        buildUser({ isActive: false, passwordHash: await hashPassword('Str0ng!Pass', 1000) })
      );

      expect((await credentialService.verify('alice', 'Str0ng!Pass')).ok).toBe(false);
    });
  });

  describe('rehash', () => {
    it('should replace the hash for a policy-compliant password', async () => {
      await credentialService.rehash(1, 'N3w!Password');

      const [userId, hash] = mockUserRepo.updatePasswordHash.mock.calls[0] ?? [];
      expect(userId).toBe(1);
      expect(await verifyPassword('N3w!Password', hash ?? '')).toBe(true);
    });

    it('should refuse a weak replacement', async () => {
      await expect(credentialService.rehash(1, 'short')).rejects.toThrow(WeakPasswordError);
      expect(mockUserRepo.updatePasswordHash).not.toHaveBeenCalled();
    });
  });

  describe('upgradeHashIfNeeded', () => {
    it('should rewrite hashes made with fewer iterations', async () => {
      const user = buildUser({ passwordHash: await hashPassword('Str0ng!Pass', 500) });

      expect(await credentialService.upgradeHashIfNeeded(user, 'Str0ng!Pass')).toBe(true);
      expect(mockUserRepo.updatePasswordHash.mock.calls[0]?.[1]).toMatch(/^pbkdf2_sha256\$1000\$/);
    });

    it('should leave current hashes alone', async () => {
      const user = buildUser({ passwordHash: await hashPassword('Str0ng!Pass', 1000) });

      expect(await credentialService.upgradeHashIfNeeded(user, 'Str0ng!Pass')).toBe(false);
      expect(mockUserRepo.updatePasswordHash).not.toHaveBeenCalled();
    });
  });
});
