import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { buildTestApp } from './testApp.js';

describe('Application shell', () => {
  it('GET /api/v1/health returns a static status payload', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/api/v1/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', version: '1.0.0' });
  });

  it('keeps health and welcome outside the API rate limit', async () => {
    const { app } = buildTestApp({ apiMax: 2 });

    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      statuses.push((await request(app).get('/api/v1/health')).status);
      statuses.push((await request(app).get('/')).status);
    }

    expect(statuses).toEqual([200, 200, 200, 200, 200, 200]);
  });

  it('still rate-limits the rest of the API', async () => {
    const { app } = buildTestApp({ apiMax: 2 });

    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      statuses.push((await request(app).get('/docs.json')).status);
    }

    expect(statuses).toEqual([200, 200, 429]);
  });

  it('GET / returns the welcome payload', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      message: 'Welcome to the Users API',
      version: '1.0.0',
      docs: '/docs',
    });
  });

  it('answers unmatched routes with a generic 404', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/api/v1/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Route not found', path: '/api/v1/nothing-here' });
  });

  it('does not demand a token for unmatched routes under the API prefix', async () => {
    const { app } = buildTestApp();

    const response = await request(app).post('/api/v1/users/1/avatar');

    expect(response.status).toBe(404);
    expect(response.body.error).toBe('Route not found');
  });

  it('serves the OpenAPI document', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(200);
    expect(response.body.info.title).toBe('Users API');
    expect(Object.keys(response.body.paths)).toContain('/api/v1/auth/register');
  });

  it('rejects a malformed JSON body with 400', async () => {
    const { app } = buildTestApp();

    const response = await request(app)
      .post('/api/v1/auth/register')
      .set('Content-Type', 'application/json')
      .send('{"email": ');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Malformed JSON body' });
  });

  it('turns unexpected store failures into a generic 500', async () => {
    const { app, store } = buildTestApp();
    vi.spyOn(store, 'findByEmail').mockRejectedValue(new Error('connection refused'));

    const response = await request(app)
      .post('/api/v1/auth/login')
      .send({ email: 'a@b.com', password: 'secret1' });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'Internal server error' });
  });

  it('echoes an inbound x-request-id', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/').set('X-Request-Id', 'req-123');

    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('mints a request id when none is sent', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/');

    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('allows any origin when no allow-list is configured', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/').set('Origin', 'https://anywhere.test');

    expect(response.headers['access-control-allow-origin']).toBe('*');
  });

  it('only reflects allow-listed origins', async () => {
    const { app } = buildTestApp({ corsOrigins: ['https://app.test'] });

    const allowed = await request(app).get('/').set('Origin', 'https://app.test');
    const denied = await request(app).get('/').set('Origin', 'https://evil.test');

    expect(allowed.headers['access-control-allow-origin']).toBe('https://app.test');
    expect(allowed.headers['access-control-allow-credentials']).toBe('true');
    expect(denied.headers['access-control-allow-origin']).toBeUndefined();
  });
});
