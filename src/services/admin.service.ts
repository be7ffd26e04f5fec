import { AccountStatus } from '@/constants/banking';
import { Account, ClientContext, LoginAttempt, PublicUser, User } from '@/models';
import { BusinessRuleError, NotFoundError } from '@/errors';
import { IAccountRepository, ILoginAttemptRepository, IUnitOfWork, IUserRepository } from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { AuthContext } from './authorization.service';
import { CredentialService } from './credential.service';
import { EncryptionService } from './encryption.service';
import { LockoutService, LockState } from './lockout.service';
import { SessionService } from './session.service';
import { toPublicUser } from './user.presenter';

const log = createLogger('AdminService');

export interface AdminUserView extends PublicUser {
  failedLoginAttempts: number;
  lockedUntil: Date | null;
}

/**
 * Administrative operations on users and accounts
 * Callers are already authorized as admin; every action is logged with the admin id.
 */
export class AdminService {
  constructor(
    private unitOfWork: IUnitOfWork,
    private userRepo: IUserRepository,
    private accountRepo: IAccountRepository,
    private loginAttemptRepo: ILoginAttemptRepository,
    private credentials: CredentialService,
    private lockout: LockoutService,
    private sessions: SessionService,
    private encryption: EncryptionService
  ) {}

  async listUsers(options: { search?: string; limit: number; offset: number }): Promise<{ users: AdminUserView[]; total: number }> {
    const { users, total } = await this.userRepo.list(options);
    return {
      users: users.map((u) => ({
        ...toPublicUser(u, this.encryption),
        failedLoginAttempts: u.failedLoginAttempts,
        lockedUntil: u.lockedUntil,
      })),
      total,
    };
  }

  /**
   * Recent login attempts with the lock state derived from them
   */
  async getLoginAttempts(userId: number, limit: number): Promise<{ user: PublicUser; lockState: LockState; attempts: LoginAttempt[] }> {
    const user = await this.findUser(userId);
    const [lockState, attempts] = await Promise.all([
      this.lockout.status(user.username),
      this.loginAttemptRepo.findRecentByUsername(user.username, limit),
    ]);
    return { user: toPublicUser(user, this.encryption), lockState, attempts };
  }

  async unlockUser(userId: number, admin: AuthContext, context: ClientContext): Promise<LockState> {
    const state = await this.unitOfWork.run(async (scope) => {
      const user = await scope.users.findById(userId);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      return this.lockout.reset(scope, user.username, user.id, context);
    });

    log.info({ userId, adminId: admin.userId }, 'User unlocked by admin');
    return state;
  }

  /**
   * Activate or deactivate a user. Deactivation revokes every session.
   * Administrators cannot change their own status.
   */
  async setUserActive(userId: number, isActive: boolean, admin: AuthContext): Promise<PublicUser> {
    if (userId === admin.userId) {
      throw new BusinessRuleError('You cannot change your own account status', 'SELF_STATUS_CHANGE');
    }

    await this.findUser(userId);
    const user = await this.userRepo.setActive(userId, isActive);
    if (!isActive) {
      await this.sessions.revokeAll(userId);
    }

    log.info({ userId, isActive, adminId: admin.userId }, 'User status changed by admin');
    return toPublicUser(user, this.encryption);
  }

  /**
   * Set a new password for a user, clear any lock and end their sessions
   */
  async resetPassword(userId: number, newPassword: string, admin: AuthContext, context: ClientContext): Promise<void> {
    await this.unitOfWork.run(async (scope) => {
      const user = await scope.users.findById(userId);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      await this.credentials.rehash(user.id, newPassword, scope.users);
      await this.lockout.reset(scope, user.username, user.id, context);
    });

    await this.sessions.revokeAll(userId);
    log.info({ userId, adminId: admin.userId }, 'Password reset by admin');
  }

  async setAccountStatus(accountId: number, status: AccountStatus, admin: AuthContext): Promise<Account> {
    const account = await this.accountRepo.setStatus(accountId, status);
    log.info({ accountId, status, adminId: admin.userId }, 'Account status changed by admin');
    return account;
  }

  private async findUser(userId: number): Promise<User> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }
}
