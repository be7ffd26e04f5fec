import request from 'supertest';
import app from '@/app';
import type { TestContainer } from '@/tests/utils/testContainer';

jest.mock('@/config/dependencies', () =>
  jest.requireActual<typeof import('@/tests/utils/testContainer')>('@/tests/utils/testContainer').createTestContainer()
);

const container = jest.requireMock<TestContainer>('@/config/dependencies');

describe('Service endpoints', () => {
  beforeEach(async () => {
    await container.resetState();
  });

  it('GET /api/health should report the service', async () => {
    const response = await request(app).get('/api/health').expect(200);

    expect(response.body).toMatchObject({ status: 'ok', service: 'secure-bank-core', version: 'v1' });
    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  it('GET /api/metrics should expose request counters with normalized paths', async () => {
    await request(app).get('/api/v1/accounts/17/transactions').expect(401);

    const response = await request(app).get('/api/metrics').expect(200);

    expect(response.headers['content-type']).toMatch(/^text\/plain/);
    expect(response.text).toContain(
      'bank_http_requests_total{method="GET",path="/api/v1/accounts/:id/transactions",status="401"} 1'
    );
    expect(response.text).not.toContain('path="/api/health"');
  });

  it('should answer unknown routes with 404', async () => {
    const response = await request(app).get('/api/v1/loans').expect(404);

    expect(response.body).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route GET /api/v1/loans not found' },
    });
  });

  it('should reject malformed JSON bodies', async () => {
    const response = await request(app)
      .post('/api/v1/auth/login')
      .set('Content-Type', 'application/json')
      .send('{"username": ')
      .expect(400);

    expect(response.body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
  });
});
