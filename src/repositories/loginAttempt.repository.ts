import { CreateLoginAttemptInput, LoginAttempt } from '@/models';
import { ILoginAttemptRepository } from './interfaces/ILoginAttemptRepository';
import { BaseRepository } from './base.repository';

const ATTEMPT_COLUMNS = `
  id,
  username,
  user_id AS "userId",
  outcome,
  ip_address AS "ipAddress",
  user_agent AS "userAgent",
  attempted_at AS "attemptedAt"
`;

/**
 * Login Attempt Repository
 */
export class LoginAttemptRepository extends BaseRepository implements ILoginAttemptRepository {
  async create(input: CreateLoginAttemptInput): Promise<LoginAttempt> {
    const result = await this.run<LoginAttempt>(
      `
      INSERT INTO login_attempts (username, user_id, outcome, ip_address, user_agent, attempted_at)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${ATTEMPT_COLUMNS}
      `,
      [input.username, input.userId, input.outcome, input.ipAddress, input.userAgent, input.attemptedAt]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Login attempt insert returned no row');
    }
    return row;
  }

  async findByUsernameSince(username: string, since: Date): Promise<LoginAttempt[]> {
    const result = await this.run<LoginAttempt>(
      `
      SELECT ${ATTEMPT_COLUMNS}
      FROM login_attempts
      WHERE username = $1 AND attempted_at >= $2
      ORDER BY attempted_at ASC, id ASC
      `,
      [username, since]
    );
    return result.rows;
  }

  async findRecentByUsername(username: string, limit: number): Promise<LoginAttempt[]> {
    const result = await this.run<LoginAttempt>(
      `
      SELECT ${ATTEMPT_COLUMNS}
      FROM login_attempts
      WHERE username = $1
      ORDER BY attempted_at DESC, id DESC
      LIMIT $2
      `,
      [username, limit]
    );
    return result.rows;
  }
}
