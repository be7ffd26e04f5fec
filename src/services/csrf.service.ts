import { createHash, randomBytes, timingSafeEqual } from 'node:crypto';
import { Session } from '@/models';
import { ISessionRepository } from '@/repositories/interfaces';

const TOKEN_BYTES = 32;

/**
 * CSRF Token Manager
 *
 * One token per session, stored on the session row. Clients read it from the
 * login / session response body and echo it in the X-CSRFToken header; a
 * cross-site page can make the browser send the cookie but cannot read the token.
 */
export class CsrfService {
  constructor(private sessionRepo: ISessionRepository) {}

  /**
   * Generate an unguessable token (64 hex chars)
   */
  generateToken(): string {
    return randomBytes(TOKEN_BYTES).toString('hex');
  }

  /**
   * Issue a fresh token for an existing session, replacing the previous one
   */
  async issue(session: Session): Promise<string> {
    const token = this.generateToken();
    await this.sessionRepo.updateCsrfToken(session.id, token);
    session.csrfToken = token;
    return token;
  }

  /**
   * Constant-time comparison of the supplied token with the session's token
   * Both sides are hashed first so lengths always match.
   */
  validate(session: Pick<Session, 'csrfToken'> | null | undefined, suppliedToken: unknown): boolean {
    if (!session || !session.csrfToken || typeof suppliedToken !== 'string' || suppliedToken.length === 0) {
      return false;
    }

    const expected = createHash('sha256').update(session.csrfToken).digest();
    const supplied = createHash('sha256').update(suppliedToken).digest();
    return timingSafeEqual(expected, supplied);
  }
}
