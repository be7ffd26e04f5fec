import request from 'supertest';
import app from '@/app';
import type { TestContainer } from '@/tests/utils/testContainer';
import { login } from '@/tests/utils/http';

jest.mock('@/config/dependencies', () =>
  jest.requireActual<typeof import('@/tests/utils/testContainer')>('@/tests/utils/testContainer').createTestContainer()
);

const container = jest.requireMock<TestContainer>('@/config/dependencies');

const PASSWORD = 'Str0ng!Pass';

describe('Auth API', () => {
  beforeEach(async () => {
    await container.resetState();
  });

  describe('POST /api/v1/auth/register', () => {
    const body = {
      username: 'alice',
      email: 'Alice@Example.com',
      password: PASSWORD,
      fullName: 'Alice Example',
      phone: '+1 555 0100',
    };

    it('should register a user and never return the hash', async () => {
      const response = await request(app).post('/api/v1/auth/register').send(body).expect(201);

      expect(response.body.success).toBe(true);
      expect(response.body.user).toMatchObject({
        id: 1,
        username: 'alice',
        email: 'alice@example.com',
        phone: '+1 555 0100',
        role: 'standard',
      });
      expect(response.body.user.passwordHash).toBeUndefined();
    });

    it('should reject a duplicate username with 409', async () => {
      await request(app).post('/api/v1/auth/register').send(body).expect(201);

      const response = await request(app)
        .post('/api/v1/auth/register')
        .send({ ...body, email: 'other@example.com' })
        .expect(409);

      expect(response.body.error).toEqual({
        code: 'DUPLICATE_IDENTITY',
        message: 'An account with this username already exists',
        field: 'username',
      });
    });

    it('should list every unmet password rule', async () => {
      const response = await request(app)
        .post('/api/v1/auth/register')
        .send({ ...body, password: 'lowercase1' })
        .expect(400);

      expect(response.body.error.code).toBe('WEAK_PASSWORD');
      expect(response.body.error.rules).toEqual([
        'Password must contain at least one uppercase letter',
        'Password must contain at least one special character',
      ]);
      expect(container.db.users.size).toBe(0);
    });

    it('should reject malformed payloads', async () => {
      const response = await request(app)
        .post('/api/v1/auth/register')
        .send({ ...body, email: 'not-an-email' })
        .expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toBe('Invalid registration data');
    });
  });

  describe('POST /api/v1/auth/login', () => {
    beforeEach(async () => {
      await container.seedUser('alice', PASSWORD);
    });

    it('should set an HttpOnly session cookie and return the CSRF token', async () => {
      const response = await request(app)
        .post('/api/v1/auth/login')
        .send({ username: 'alice', password: PASSWORD })
        .expect(200);

      const cookie = String(response.headers['set-cookie']);
      expect(cookie).toMatch(/^sid=/);
      expect(cookie).toContain('HttpOnly');
      expect(cookie).toContain('SameSite=Lax');
      expect(response.body.csrfToken).toMatch(/^[0-9a-f]{64}$/);
      expect(response.body.user.username).toBe('alice');
    });

    it('should answer wrong passwords and unknown users identically', async () => {
      const wrongPassword = await request(app)
        .post('/api/v1/auth/login')
        .send({ username: 'alice', password: 'Wr0ng!Pass' })
        .expect(401);
      const unknownUser = await request(app)
        .post('/api/v1/auth/login')
        .send({ username: 'mallory', password: 'Wr0ng!Pass' })
        .expect(401);

      expect(wrongPassword.body).toEqual(unknownUser.body);
      expect(wrongPassword.body.error).toEqual({
        code: 'AUTHENTICATION_FAILURE',
        message: 'Invalid username or password',
      });
    });

    it('should lock the account after three failures', async () => {
      for (let i = 0; i < 3; i++) {
        await request(app).post('/api/v1/auth/login').send({ username: 'alice', password: 'Wr0ng!Pass' }).expect(401);
      }

      const response = await request(app)
        .post('/api/v1/auth/login')
        .send({ username: 'alice', password: PASSWORD })
        .expect(423);

      expect(response.body.error.code).toBe('ACCOUNT_LOCKED');
      expect(response.body.error.remainingLockSeconds).toBeGreaterThan(1790);
      expect(Number(response.headers['retry-after'])).toBe(response.body.error.remainingLockSeconds);
      expect(response.headers['set-cookie']).toBeUndefined();
    });
  });

  describe('session lifecycle', () => {
    beforeEach(async () => {
      await container.seedUser('alice', PASSWORD);
    });

    it('should describe the current session', async () => {
      const client = await login('alice', PASSWORD, '198.51.100.1');

      const response = await client.agent.get('/api/v1/auth/session').expect(200);

      expect(response.body.user.username).toBe('alice');
      expect(response.body.csrfToken).toBe(client.csrfToken);
    });

    it('should require a session', async () => {
      const response = await request(app).get('/api/v1/auth/session').expect(401);

      expect(response.body.error.code).toBe('SESSION_NOT_FOUND');
    });

    it('should expire an idle session and clear the cookie', async () => {
      const client = await login('alice', PASSWORD, '198.51.100.1');
      container.clock.advance(31 * 60 * 1000);

      const response = await client.agent.get('/api/v1/auth/session').expect(401);

      expect(response.body.error.code).toBe('SESSION_EXPIRED');
      expect(String(response.headers['set-cookie'])).toMatch(/^sid=;/);
    });

    it('should log out with a valid CSRF token', async () => {
      const client = await login('alice', PASSWORD, '198.51.100.1');

      await client.agent.post('/api/v1/auth/logout').set('X-CSRFToken', client.csrfToken).expect(200);

      await client.agent.get('/api/v1/auth/session').expect(401);
      expect(container.db.sessions.size).toBe(0);
    });

    it('should refuse logout without the CSRF token', async () => {
      const client = await login('alice', PASSWORD, '198.51.100.1');

      const response = await client.agent.post('/api/v1/auth/logout').expect(403);

      expect(response.body.error.code).toBe('CSRF_VALIDATION_FAILURE');
      expect(container.db.sessions.size).toBe(1);
    });
  });

  describe('POST /api/v1/auth/password', () => {
    beforeEach(async () => {
      await container.seedUser('alice', PASSWORD);
    });

    it('should change the password and rotate the CSRF token', async () => {
      const client = await login('alice', PASSWORD, '198.51.100.1');

      const response = await client.agent
        .post('/api/v1/auth/password')
        .set('X-CSRFToken', client.csrfToken)
        .send({ currentPassword: PASSWORD, newPassword: 'N3w!Password' })
        .expect(200);

      expect(response.body.csrfToken).toMatch(/^[0-9a-f]{64}$/);
      expect(response.body.csrfToken).not.toBe(client.csrfToken);

      // The old token is no longer accepted
      await client.agent.post('/api/v1/auth/logout').set('X-CSRFToken', client.csrfToken).expect(403);
      await login('alice', 'N3w!Password', '198.51.100.2');
    });

    it('should not change the password without the CSRF token', async () => {
      const client = await login('alice', PASSWORD, '198.51.100.1');
      const hashBefore = container.db.users.get(1)?.passwordHash;

      await client.agent
        .post('/api/v1/auth/password')
        .send({ currentPassword: PASSWORD, newPassword: 'N3w!Password' })
        .expect(403);

      expect(container.db.users.get(1)?.passwordHash).toBe(hashBefore);
    });

    it('should lock the account after three wrong current passwords', async () => {
      const client = await login('alice', PASSWORD, '198.51.100.1');
      const change = (currentPassword: string) =>
        client.agent
          .post('/api/v1/auth/password')
          .set('X-CSRFToken', client.csrfToken)
          .send({ currentPassword, newPassword: 'N3w!Password' });

      for (let i = 0; i < 3; i++) {
        await change('Wr0ng!Pass').expect(401);
      }
      const hashBefore = container.db.users.get(1)?.passwordHash;

      const locked = await change(PASSWORD).expect(423);

      expect(locked.body.error.code).toBe('ACCOUNT_LOCKED');
      expect(Number(locked.headers['retry-after'])).toBe(locked.body.error.remainingLockSeconds);
      expect(container.db.users.get(1)?.passwordHash).toBe(hashBefore);
      await request(app)
        .post('/api/v1/auth/login')
        .set('X-Forwarded-For', '198.51.100.9')
        .send({ username: 'alice', password: PASSWORD })
        .expect(423);
    });
  });
});
