import request from 'supertest';
import { PORTAL_URLS, buildAccount, loginRoutes } from '../../test-utils/factories';
import { authHeader, createTestApp, type TestApp } from '../../test-utils/app-setup';

describe('Account routes', () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
    t.accounts.seed(buildAccount(t.vault));
    t.accounts.seed(buildAccount(t.vault, { id: 'acc-other', userId: 'operator-2', username: 'student99' }));
  });

  it('requires an operator token', async () => {
    const res = await request(t.app).get('/api/v1/accounts');
    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe('AUTH_REQUIRED');
  });

  it('lists only the operator accounts without ciphertext', async () => {
    const res = await request(t.app).get('/api/v1/accounts').set('Authorization', authHeader());

    expect(res.status).toBe(200);
    expect(res.body.data.count).toBe(1);
    expect(res.body.data.accounts).toEqual([
      {
        id: 'acc-1',
        userId: 'operator-1',
        username: 'student01',
        displayName: 'Student One',
        status: 'active',
        createdAt: '2026-01-05T08:00:00.000Z',
        updatedAt: '2026-01-05T08:00:00.000Z',
      },
    ]);
  });

  it('creates an account with an encrypted password', async () => {
    const res = await request(t.app)
      .post('/api/v1/accounts')
      .set('Authorization', authHeader())
      .send({ username: ' student02 ', password: 'test-password-2', displayName: 'Student Two' });

    expect(res.status).toBe(201);
    expect(res.body.data.account).toMatchObject({ id: 'acc-new-1', userId: 'operator-1', username: 'student02', status: 'active' });
    expect(res.body.data.account).not.toHaveProperty('passwordEncrypted');

    const stored = t.accounts.rows.get('acc-new-1');
    expect(stored?.passwordEncrypted).not.toBe('test-password-2');
    expect(t.vault.decrypt(stored?.passwordEncrypted ?? '')).toBe('test-password-2');
  });

  it('rejects a create without a password', async () => {
    const res = await request(t.app).post('/api/v1/accounts').set('Authorization', authHeader()).send({ username: 'student02' });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.details.source).toBe('body');
    expect(res.body.error.details.issues[0].path).toBe('password');
  });

  it("hides another operator's account", async () => {
    const res = await request(t.app).get('/api/v1/accounts/acc-other').set('Authorization', authHeader());
    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Account not found' });
  });

  it('updates the display name', async () => {
    const res = await request(t.app)
      .patch('/api/v1/accounts/acc-1')
      .set('Authorization', authHeader())
      .send({ displayName: 'Renamed' });

    expect(res.status).toBe(200);
    expect(res.body.data.account.displayName).toBe('Renamed');
    expect(t.accounts.rows.get('acc-1')?.displayName).toBe('Renamed');
  });

  it('rejects an empty update', async () => {
    const res = await request(t.app).patch('/api/v1/accounts/acc-1').set('Authorization', authHeader()).send({});
    expect(res.status).toBe(400);
    expect(res.body.error.details.issues[0].message).toBe('At least one field must be provided');
  });

  it('toggles the status back and forth', async () => {
    const first = await request(t.app).post('/api/v1/accounts/acc-1/toggle-status').set('Authorization', authHeader());
    const second = await request(t.app).post('/api/v1/accounts/acc-1/toggle-status').set('Authorization', authHeader());

    expect(first.body.data.account.status).toBe('inactive');
    expect(second.body.data.account.status).toBe('active');
  });

  it('deletes an account', async () => {
    const res = await request(t.app).delete('/api/v1/accounts/acc-1').set('Authorization', authHeader());

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ deleted: true });
    expect(t.accounts.rows.has('acc-1')).toBe(false);
  });

  describe('POST /:id/test-connection', () => {
    it('reports the resolved identity', async () => {
      loginRoutes(t.portal);

      const res = await request(t.app).post('/api/v1/accounts/acc-1/test-connection').set('Authorization', authHeader());

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({
        success: true,
        message: 'Connection successful',
        studentId: '1301200001',
        fullName: 'Student One',
      });
    });

    it('reports the portal rejection without failing the request', async () => {
      loginRoutes(t.portal);
      t.accounts.seed(buildAccount(t.vault, { id: 'acc-2', username: 'student02', password: 'wrong-password' }));

      const res = await request(t.app).post('/api/v1/accounts/acc-2/test-connection').set('Authorization', authHeader());

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ success: false, message: 'Username atau password salah' });
      expect(t.portal.callsTo('GET', PORTAL_URLS.profile)).toHaveLength(0);
    });

    it('leaves the live session untouched', async () => {
      loginRoutes(t.portal);

      await request(t.app).post('/api/v1/accounts/acc-1/test-connection').set('Authorization', authHeader());
      const res = await request(t.app).get('/api/v1/accounts/acc-1/portal/session').set('Authorization', authHeader());

      expect(res.body.data.session.state).toBe('unauthenticated');
    });
  });

  it('answers unknown routes with the error envelope', async () => {
    const res = await request(t.app).get('/api/v1/nope');
    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /api/v1/nope not found' });
  });
});
