import { CreateSessionInput, Session } from '@/models';
import { ISessionRepository } from './interfaces/ISessionRepository';
import { BaseRepository } from './base.repository';

const SESSION_COLUMNS = `
  id,
  token_hash AS "tokenHash",
  user_id AS "userId",
  csrf_token AS "csrfToken",
  created_at AS "createdAt",
  last_activity_at AS "lastActivityAt",
  expires_at AS "expiresAt",
  absolute_expires_at AS "absoluteExpiresAt",
  ip_address AS "ipAddress",
  user_agent AS "userAgent"
`;

/**
 * Session Repository
 */
export class SessionRepository extends BaseRepository implements ISessionRepository {
  async create(input: CreateSessionInput): Promise<Session> {
    const result = await this.run<Session>(
      `
      INSERT INTO sessions (
        token_hash,
        user_id,
        csrf_token,
        created_at,
        last_activity_at,
        expires_at,
        absolute_expires_at,
        ip_address,
        user_agent
      ) VALUES ($1, $2, $3, $4, $4, $5, $6, $7, $8)
      RETURNING ${SESSION_COLUMNS}
      `,
      [
        input.tokenHash,
        input.userId,
        input.csrfToken,
        input.createdAt,
        input.expiresAt,
        input.absoluteExpiresAt,
        input.ipAddress,
        input.userAgent,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Session insert returned no row');
    }
    return row;
  }

  async findByTokenHash(tokenHash: string): Promise<Session | null> {
    const result = await this.run<Session>(
      `SELECT ${SESSION_COLUMNS} FROM sessions WHERE token_hash = $1`,
      [tokenHash]
    );
    return result.rows[0] || null;
  }

  async touch(sessionId: number, lastActivityAt: Date, expiresAt: Date): Promise<void> {
    await this.run(
      'UPDATE sessions SET last_activity_at = $2, expires_at = $3 WHERE id = $1',
      [sessionId, lastActivityAt, expiresAt]
    );
  }

  async updateCsrfToken(sessionId: number, csrfToken: string): Promise<void> {
    await this.run('UPDATE sessions SET csrf_token = $2 WHERE id = $1', [sessionId, csrfToken]);
  }

  async deleteById(sessionId: number): Promise<void> {
    await this.run('DELETE FROM sessions WHERE id = $1', [sessionId]);
  }

  async deleteByUserId(userId: number, exceptSessionId?: number): Promise<number> {
    const result = exceptSessionId === undefined
      ? await this.run('DELETE FROM sessions WHERE user_id = $1', [userId])
      : await this.run('DELETE FROM sessions WHERE user_id = $1 AND id <> $2', [userId, exceptSessionId]);
    return result.rowCount ?? 0;
  }

  async deleteExpired(now: Date): Promise<number> {
    const result = await this.run('DELETE FROM sessions WHERE expires_at <= $1', [now]);
    return result.rowCount ?? 0;
  }
}
