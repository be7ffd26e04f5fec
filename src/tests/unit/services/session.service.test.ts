import { SessionService, hashSessionToken } from '@/services/session.service';
import { CsrfService } from '@/services/csrf.service';
import { ROLES } from '@/constants/banking';
import { User } from '@/models';
import { SessionExpiredError, SessionNotFoundError } from '@/errors';
import {
  InMemoryDatabase,
  InMemorySessionRepository,
  InMemoryUserRepository,
} from '@/tests/utils/inMemoryDatabase';

const T0 = new Date('2024-01-01T00:00:00Z').getTime();
const MINUTE = 60_000;
const CONTEXT = { ipAddress: '203.0.113.10', userAgent: 'jest' };

describe('SessionService', () => {
  let db: InMemoryDatabase;
  let now: Date;
  let users: InMemoryUserRepository;
  let sessionService: SessionService;
  let alice: User;

  beforeEach(async () => {
    now = new Date(T0);
    db = new InMemoryDatabase(() => now);
    users = new InMemoryUserRepository(db);
    const sessions = new InMemorySessionRepository(db);
    sessionService = new SessionService(
      sessions,
      users,
      new CsrfService(sessions),
      { idleTimeoutMs: 30 * MINUTE, absoluteTimeoutMs: 120 * MINUTE },
      () => now
    );

    alice = await users.create({
      username: 'alice',
      email: 'alice@example.com',
      fullName: 'Alice Example',
      phoneEncrypted: null,
      passwordHash: 'unused',
      role: ROLES.STANDARD,
    });
  });

  describe('create', () => {
    it('should store only the token hash with idle and absolute expiry', async () => {
      const { session, token } = await sessionService.create(alice.id, CONTEXT);

      expect(session.tokenHash).toBe(hashSessionToken(token));
      expect(session.tokenHash).not.toBe(token);
      expect(session.csrfToken).toMatch(/^[0-9a-f]{64}$/);
      expect(session.expiresAt).toEqual(new Date(T0 + 30 * MINUTE));
      expect(session.absoluteExpiresAt).toEqual(new Date(T0 + 120 * MINUTE));
      expect(session.ipAddress).toBe('203.0.113.10');
    });

    it('should issue distinct tokens per session', async () => {
      const first = await sessionService.create(alice.id, CONTEXT);
      const second = await sessionService.create(alice.id, CONTEXT);

      expect(first.token).not.toBe(second.token);
      expect(first.session.csrfToken).not.toBe(second.session.csrfToken);
    });
  });

  describe('validate', () => {
    it('should return the session and user and slide the expiry', async () => {
      const { token } = await sessionService.create(alice.id, CONTEXT);

      now = new Date(T0 + 20 * MINUTE);
      const validated = await sessionService.validate(token);

      expect(validated.user.username).toBe('alice');
      expect(validated.session.expiresAt).toEqual(new Date(T0 + 50 * MINUTE));
      expect(validated.session.lastActivityAt).toEqual(now);
    });

    it('should never slide past the absolute expiry', async () => {
      const { token } = await sessionService.create(alice.id, CONTEXT);

      for (const minute of [25, 50, 75, 100]) {
        now = new Date(T0 + minute * MINUTE);
        await sessionService.validate(token);
      }

      now = new Date(T0 + 110 * MINUTE);
      const validated = await sessionService.validate(token);
      expect(validated.session.expiresAt).toEqual(new Date(T0 + 120 * MINUTE));

      now = new Date(T0 + 120 * MINUTE);
      await expect(sessionService.validate(token)).rejects.toThrow(SessionExpiredError);
    });

    it('should expire an idle session and delete it', async () => {
      const { token } = await sessionService.create(alice.id, CONTEXT);

      now = new Date(T0 + 30 * MINUTE);
      await expect(sessionService.validate(token)).rejects.toThrow(SessionExpiredError);
      expect(db.sessions.size).toBe(0);
      await expect(sessionService.validate(token)).rejects.toThrow(SessionNotFoundError);
    });

    it('should reject unknown tokens', async () => {
      await expect(sessionService.validate('not-a-token')).rejects.toThrow(SessionNotFoundError);
    });

    it('should drop every session of a deactivated user', async () => {
      const { token } = await sessionService.create(alice.id, CONTEXT);
      await sessionService.create(alice.id, CONTEXT);
      await users.setActive(alice.id, false);

      await expect(sessionService.validate(token)).rejects.toThrow(SessionNotFoundError);
      expect(db.sessions.size).toBe(0);
    });
  });

  describe('revoke', () => {
    it('should end the session behind a token', async () => {
      const { token } = await sessionService.create(alice.id, CONTEXT);

      await sessionService.revoke(token);

      await expect(sessionService.validate(token)).rejects.toThrow(SessionNotFoundError);
    });

    it('should ignore unknown tokens', async () => {
      await expect(sessionService.revoke('not-a-token')).resolves.toBeUndefined();
    });
  });

  describe('revokeAll', () => {
    it('should remove every session except the one kept', async () => {
      const kept = await sessionService.create(alice.id, CONTEXT);
      await sessionService.create(alice.id, CONTEXT);
      await sessionService.create(alice.id, CONTEXT);

      expect(await sessionService.revokeAll(alice.id, kept.session.id)).toBe(2);
      expect([...db.sessions.keys()]).toEqual([kept.session.id]);
    });
  });

  describe('purgeExpired', () => {
    it('should delete sessions past their idle expiry', async () => {
      await sessionService.create(alice.id, CONTEXT);
      now = new Date(T0 + 10 * MINUTE);
      await sessionService.create(alice.id, CONTEXT);

      now = new Date(T0 + 35 * MINUTE);
      expect(await sessionService.purgeExpired()).toBe(1);
      expect(db.sessions.size).toBe(1);
    });
  });
});
