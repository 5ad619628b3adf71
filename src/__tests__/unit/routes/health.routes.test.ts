import request from 'supertest';
import { createTestApp } from '../../test-utils/app-setup';

describe('GET /api/v1/health', () => {
  it('reports a reachable database without authentication', async () => {
    const t = createTestApp();

    const res = await request(t.app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({ status: 'healthy', database: 'up' });
    expect(t.db.queries).toEqual(['SELECT 1 AS health_check']);
    expect(res.headers['x-trace-id']).toBe(res.body.requestId);
  });

  it('degrades to 503 when the database is down', async () => {
    const t = createTestApp();
    t.db.healthy = false;

    const res = await request(t.app).get('/api/v1/health');

    expect(res.status).toBe(503);
    expect(res.body.data).toMatchObject({ status: 'degraded', database: 'down' });
  });
});

describe('GET /metrics', () => {
  it('exposes prometheus metrics', async () => {
    const t = createTestApp();
    await request(t.app).get('/api/v1/health');

    const res = await request(t.app).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.text).toContain('krs_http_requests_total');
  });
});
