import { CreateUserInput, User } from '@/models';
import { DuplicateIdentityError, NotFoundError } from '@/errors';
import { IUserRepository } from './interfaces/IUserRepository';
import { BaseRepository } from './base.repository';
import { isUniqueViolation } from './pgErrors';

const USER_COLUMNS = `
  id,
  username,
  email,
  full_name AS "fullName",
  phone_encrypted AS "phoneEncrypted",
  password_hash AS "passwordHash",
  role,
  is_active AS "isActive",
  failed_login_attempts AS "failedLoginAttempts",
  locked_until AS "lockedUntil",
  last_login AS "lastLogin",
  created_at AS "createdAt"
`;

/**
 * User Repository
 * Handles all database operations for users
 */
export class UserRepository extends BaseRepository implements IUserRepository {
  async findById(userId: number): Promise<User | null> {
    const result = await this.run<User>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [userId]);
    return result.rows[0] || null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.run<User>(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, [username]);
    return result.rows[0] || null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.run<User>(
      `SELECT ${USER_COLUMNS} FROM users WHERE LOWER(email) = LOWER($1)`,
      [email]
    );
    return result.rows[0] || null;
  }

  /**
   * @throws DuplicateIdentityError when a unique index on username or email rejects the row
   */
  async create(input: CreateUserInput): Promise<User> {
    try {
      const result = await this.run<User>(
        `
        INSERT INTO users (username, email, full_name, phone_encrypted, password_hash, role)
        VALUES ($1, $2, $3, $4, $5, $6)
        RETURNING ${USER_COLUMNS}
        `,
        [input.username, input.email, input.fullName, input.phoneEncrypted, input.passwordHash, input.role]
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error('User insert returned no row');
      }
      return row;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateIdentityError(error.constraint?.includes('email') ? 'email' : 'username');
      }
      throw error;
    }
  }

  async updatePasswordHash(userId: number, passwordHash: string): Promise<void> {
    await this.run('UPDATE users SET password_hash = $2 WHERE id = $1', [userId, passwordHash]);
  }

  async updateLockState(userId: number, failedLoginAttempts: number, lockedUntil: Date | null): Promise<void> {
    await this.run(
      'UPDATE users SET failed_login_attempts = $2, locked_until = $3 WHERE id = $1',
      [userId, failedLoginAttempts, lockedUntil]
    );
  }

  async updateLastLogin(userId: number, at: Date): Promise<void> {
    await this.run('UPDATE users SET last_login = $2 WHERE id = $1', [userId, at]);
  }

  async setActive(userId: number, isActive: boolean): Promise<User> {
    const result = await this.run<User>(
      `UPDATE users SET is_active = $2 WHERE id = $1 RETURNING ${USER_COLUMNS}`,
      [userId, isActive]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return row;
  }

  async list(options: { search?: string; limit: number; offset: number }): Promise<{ users: User[]; total: number }> {
    const params: unknown[] = [];
    let where = '';

    if (options.search) {
      // Escape LIKE wildcards so the search term is matched literally
      const term = options.search.replace(/[\\%_]/g, (c) => `\\${c}`);
      params.push(`%${term}%`);
      where = 'WHERE username ILIKE $1 OR email ILIKE $1 OR full_name ILIKE $1';
    }

    const countResult = await this.run<{ total: string }>(`SELECT COUNT(*) AS total FROM users ${where}`, params);

    params.push(options.limit, options.offset);
    const result = await this.run<User>(
      `
      SELECT ${USER_COLUMNS}
      FROM users
      ${where}
      ORDER BY id ASC
      LIMIT $${params.length - 1} OFFSET $${params.length}
      `,
      params
    );

    return {
      users: result.rows,
      total: Number(countResult.rows[0]?.total ?? 0),
    };
  }
}
