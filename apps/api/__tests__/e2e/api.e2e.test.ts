import type { NestExpressApplication } from '@nestjs/platform-express';
import { MAX_BLOB_DATA_LENGTH } from '@shellsync/sync-engine';
import request from 'supertest';
import { blobIdValue } from '../support/blobs';
import { createTestApp } from '../support/test-app';

const ALICE = {
  email: 'alice@example.com',
  username: 'alice',
  password: 'test-password',
};

const BLOB = {
  id: blobIdValue(1),
  timestamp: '2024-01-01T00:00:01.000Z',
  data: '{"v":1,"nonce":"bm9uY2U","ciphertext":"Y2lwaGVy"}',
  hostname: 'laptop',
};

const EPOCH_ISO = '1970-01-01T00:00:00.000Z';

describe('HTTP API (in-memory repositories)', () => {
  let app: NestExpressApplication;
  let session: string;

  const auth = () => ({ Authorization: `Token ${session}` });
  const syncQuery = (host: string) => ({
    sync_ts: new Date().toISOString(),
    history_ts: EPOCH_ISO,
    host,
  });

  beforeAll(async () => {
    ({ app } = await createTestApp());
    await app.init();

    const registered = await request(app.getHttpServer())
      .post('/register')
      .send(ALICE)
      .expect(201);
    session = registered.body.session;
  });

  afterAll(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const response = await request(app.getHttpServer())
      .get('/health')
      .expect(200);

    expect(response.body).toEqual({ status: 'ok', db: true });
  });

  it('rejects a second registration of the same username', async () => {
    const response = await request(app.getHttpServer())
      .post('/register')
      .send({ ...ALICE, email: 'alice2@example.com' })
      .expect(409);

    expect(response.body).toEqual({ reason: 'username already taken' });
  });

  it('validates registration input', async () => {
    const response = await request(app.getHttpServer())
      .post('/register')
      .send({ ...ALICE, username: 'bob', password: 'short' })
      .expect(400);

    expect(response.body.reason).toContain(
      'password must be longer than or equal to 8 characters'
    );
  });

  it('logs in and rejects bad credentials', async () => {
    const ok = await request(app.getHttpServer())
      .post('/login')
      .send({ username: 'alice', password: 'test-password' })
      .expect(200);
    const bad = await request(app.getHttpServer())
      .post('/login')
      .send({ username: 'alice', password: 'wrong-password' })
      .expect(401);

    expect(typeof ok.body.session).toBe('string');
    expect(bad.body).toEqual({ reason: 'invalid username or password' });
  });

  it('looks up users', async () => {
    const found = await request(app.getHttpServer())
      .get('/user/alice')
      .expect(200);
    const missing = await request(app.getHttpServer())
      .get('/user/nobody')
      .expect(404);

    expect(found.body).toEqual({ username: 'alice' });
    expect(missing.body).toEqual({ reason: 'user not found' });
  });

  it('requires a session token on sync routes', async () => {
    const missing = await request(app.getHttpServer())
      .get('/sync/count')
      .expect(401);
    const invalid = await request(app.getHttpServer())
      .get('/sync/count')
      .set('Authorization', 'Token not-a-session')
      .expect(401);

    expect(missing.body).toEqual({ reason: 'Session token is required' });
    expect(invalid.body).toEqual({ reason: 'Invalid or expired session' });
  });

  it('stores uploads idempotently and serves them to other hosts', async () => {
    const first = await request(app.getHttpServer())
      .post('/history')
      .set(auth())
      .send([BLOB])
      .expect(201);
    const again = await request(app.getHttpServer())
      .post('/history')
      .set(auth())
      .send([BLOB])
      .expect(201);
    const count = await request(app.getHttpServer())
      .get('/sync/count')
      .set(auth())
      .expect(200);
    const forDesktop = await request(app.getHttpServer())
      .get('/sync/history')
      .query(syncQuery('desktop'))
      .set(auth())
      .expect(200);
    const forLaptop = await request(app.getHttpServer())
      .get('/sync/history')
      .query(syncQuery('laptop'))
      .set(auth())
      .expect(200);

    expect(first.body).toEqual({ stored: 1 });
    expect(again.body).toEqual({ stored: 0 });
    expect(count.body).toEqual({ count: 1, server_time: expect.any(String) });
    expect(Number.isNaN(Date.parse(count.body.server_time))).toBe(false);
    expect(forDesktop.body).toEqual({ history: [BLOB] });
    expect(forLaptop.body).toEqual({ history: [] });
  });

  it('rejects malformed uploads', async () => {
    const badId = await request(app.getHttpServer())
      .post('/history')
      .set(auth())
      .send([{ ...BLOB, id: 'NOT-A-UUID' }])
      .expect(400);
    await request(app.getHttpServer())
      .post('/history')
      .set(auth())
      .send({ not: 'an array' })
      .expect(400);

    expect(badId.body.reason).toContain('id must be a lowercase UUIDv4');
  });

  it('rejects blob data above the shared size limit', async () => {
    const response = await request(app.getHttpServer())
      .post('/history')
      .set(auth())
      .send([
        {
          ...BLOB,
          id: blobIdValue(2),
          data: 'x'.repeat(MAX_BLOB_DATA_LENGTH + 1),
        },
      ])
      .expect(400);
    const atLimit = await request(app.getHttpServer())
      .post('/history')
      .set(auth())
      .send([
        { ...BLOB, id: blobIdValue(3), data: 'x'.repeat(MAX_BLOB_DATA_LENGTH) },
      ])
      .expect(201);

    expect(response.body.reason).toContain('data must be shorter than or equal to');
    expect(atLimit.body).toEqual({ stored: 1 });
  });

  it('validates the sync query', async () => {
    const response = await request(app.getHttpServer())
      .get('/sync/history')
      .query({ sync_ts: 'yesterday', history_ts: EPOCH_ISO })
      .set(auth())
      .expect(400);

    expect(response.body.reason).toContain('sync_ts');
  });

  it('keeps each user to their own blobs', async () => {
    const bob = await request(app.getHttpServer())
      .post('/register')
      .send({
        email: 'bob@example.com',
        username: 'bob',
        password: 'test-password',
      })
      .expect(201);

    const count = await request(app.getHttpServer())
      .get('/sync/count')
      .set('Authorization', `Token ${bob.body.session}`)
      .expect(200);

    expect(count.body.count).toBe(0);
  });

  it('revokes the session on logout', async () => {
    const login = await request(app.getHttpServer())
      .post('/login')
      .send({ username: 'alice', password: 'test-password' })
      .expect(200);
    const token = `Token ${login.body.session}`;
    await request(app.getHttpServer())
      .get('/sync/count')
      .set('Authorization', token)
      .expect(200);

    const logout = await request(app.getHttpServer())
      .post('/logout')
      .set('Authorization', token)
      .expect(200);
    await request(app.getHttpServer())
      .get('/sync/count')
      .set('Authorization', token)
      .expect(401);

    expect(logout.body).toEqual({ revoked: true });
  });
});
