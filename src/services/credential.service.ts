import { PASSWORD_POLICY } from '@/config/businessRules';
import { ROLES, Role } from '@/constants/banking';
import { User } from '@/models';
import { DuplicateIdentityError, WeakPasswordError } from '@/errors';
import { IUserRepository } from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { checkPasswordPolicy, hashPassword, needsRehash, verifyPassword } from '@/utils/password';
import { EncryptionService } from './encryption.service';

const log = createLogger('CredentialService');

export interface RegistrationInput {
  username: string;
  email: string;
  password: string;
  fullName: string;
  phone?: string | null;
}

export interface MatchResult {
  ok: boolean;
  userId: number | null;
  user: User | null;
}

/**
 * Credential Store
 *
 * Owns password hashes: registration, verification and re-hash.
 * Raw passwords only ever exist in memory for the length of a call.
 */
export class CredentialService {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private userRepo: IUserRepository,
    private encryption: EncryptionService,
    private iterations: number = PASSWORD_POLICY.ITERATIONS
  ) {}

  /**
   * Register a new standard user
   *
   * @throws WeakPasswordError listing every unmet password rule
   * @throws DuplicateIdentityError when username or email is taken
   */
  async register(input: RegistrationInput): Promise<User> {
    const user = await this.createUser(input, ROLES.STANDARD);
    log.info({ userId: user.id, username: user.username }, 'User registered');
    return user;
  }

  /**
   * Create the bootstrap administrator unless the username already exists
   * @returns the created user, or null when nothing was created
   */
  async ensureAdmin(input: RegistrationInput): Promise<User | null> {
    if (await this.userRepo.findByUsername(input.username)) {
      return null;
    }

    const user = await this.createUser(input, ROLES.ADMIN);
    log.warn({ userId: user.id, username: user.username }, 'Bootstrap administrator created');
    return user;
  }

  private async createUser(input: RegistrationInput, role: Role): Promise<User> {
    const unmet = checkPasswordPolicy(input.password);
    if (unmet.length > 0) {
      throw new WeakPasswordError(unmet);
    }

    if (await this.userRepo.findByUsername(input.username)) {
      throw new DuplicateIdentityError('username');
    }
    if (await this.userRepo.findByEmail(input.email)) {
      throw new DuplicateIdentityError('email');
    }

    const passwordHash = await hashPassword(input.password, this.iterations);

    // The unique indexes still decide a race between two registrations
    return this.userRepo.create({
      username: input.username,
      email: input.email,
      fullName: input.fullName,
      phoneEncrypted: this.encryption.encryptOptional(input.phone),
      passwordHash,
      role,
    });
  }

  /**
   * Verify a username/password pair
   *
   * Unknown usernames, deactivated users and wrong passwords all produce
   * { ok: false }. A hash is computed in every case so response time does not
   * reveal whether the username exists.
   */
  async verify(username: string, rawPassword: string, users: IUserRepository = this.userRepo): Promise<MatchResult> {
    const user = await users.findByUsername(username);

    if (!user) {
      await verifyPassword(rawPassword, await this.getDummyHash());
      return { ok: false, userId: null, user: null };
    }

    const matches = await verifyPassword(rawPassword, user.passwordHash);
    if (!matches || !user.isActive) {
      return { ok: false, userId: user.id, user };
    }

    return { ok: true, userId: user.id, user };
  }

  /**
   * Replace a user's password after checking it against the policy
   * The only path that changes a password hash for a new password.
   */
  async rehash(userId: number, rawPassword: string, users: IUserRepository = this.userRepo): Promise<void> {
    const unmet = checkPasswordPolicy(rawPassword);
    if (unmet.length > 0) {
      throw new WeakPasswordError(unmet);
    }

    await users.updatePasswordHash(userId, await hashPassword(rawPassword, this.iterations));
    log.info({ userId }, 'Password hash replaced');
  }

  /**
   * Upgrade a verified password stored with fewer iterations than configured
   * @returns true when the hash was rewritten
   */
  async upgradeHashIfNeeded(user: User, rawPassword: string, users: IUserRepository = this.userRepo): Promise<boolean> {
    if (!needsRehash(user.passwordHash, this.iterations)) {
      return false;
    }

    await users.updatePasswordHash(user.id, await hashPassword(rawPassword, this.iterations));
    log.info({ userId: user.id, iterations: this.iterations }, 'Password hash upgraded');
    return true;
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = hashPassword('dummy-password-for-timing', this.iterations);
    }
    return this.dummyHash;
  }
}
