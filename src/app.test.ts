import request from 'supertest';
import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { createApp } from './app';
import { Services, createServices } from './services';
import { createDefaultProcessorRegistry } from './services/processors';
import { createInMemoryRepositories } from './repositories/memory';
import { SP_ENTITY_ID, stubHttp, stubStorage } from './testing/fixtures';

const TOKEN = 'test-admin-token';

describe('admin API', () => {
  let services: Services;
  let hasServiceProvider: Mock<(entityId: string) => Promise<boolean>>;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    hasServiceProvider = vi.fn<(entityId: string) => Promise<boolean>>().mockResolvedValue(true);
    services = createServices({
      repositories: createInMemoryRepositories(),
      processors: createDefaultProcessorRegistry(),
      http: stubHttp(),
      storage: stubStorage(),
      agreementValidForHours: 24,
      persistentIdMaxAttempts: 5,
      metadataIndex: { hasServiceProvider }
    });
    app = createApp(services, { adminToken: TOKEN, accessLog: false });
  });

  const admin = () => ({ 'x-admin-token': TOKEN });

  async function createSp() {
    const res = await request(app)
      .post('/admin/service-providers')
      .set(admin())
      .send({ entity_id: SP_ENTITY_ID, display_name: 'Example SP', is_active: true });
    expect(res.status).toBe(201);
    return res.body.id;
  }

  it('reports health without a token', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  it('rejects requests without the admin token', async () => {
    const res = await request(app).get('/admin/service-providers');
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'unauthorized' });
  });

  it('accepts the token as a bearer credential', async () => {
    const res = await request(app).get('/admin/service-providers').set('Authorization', `Bearer ${TOKEN}`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual([]);
  });

  it('stores new SPs as neither valid nor active', async () => {
    const res = await request(app)
      .post('/admin/service-providers')
      .set(admin())
      .send({ entity_id: SP_ENTITY_ID, display_name: 'Example SP', is_active: true });

    expect(res.status).toBe(201);
    expect(res.body.is_valid).toBe(false);
    expect(res.body.is_active).toBe(false);
    expect(res.body.disable_encrypted_assertions).toBe(true);
  });

  it('answers 400 when required fields are missing', async () => {
    const res = await request(app).post('/admin/service-providers').set(admin()).send({ display_name: 'Nameless' });
    expect(res.status).toBe(400);
    expect(res.body.errors[0].path).toBe('entity_id');
  });

  it('validates on update and publishes active SPs', async () => {
    const id = await createSp();

    const updated = await request(app).put(`/admin/service-providers/${id}`).set(admin()).send({ is_active: true });
    expect(updated.status).toBe(200);
    expect(updated.body.validation).toEqual({ is_valid: true, is_active: true });
    expect(updated.body.is_active).toBe(true);

    const snapshot = await request(app).get('/admin/snapshots/service-providers').set(admin());
    expect(Object.keys(snapshot.body)).toEqual([SP_ENTITY_ID]);
    expect(snapshot.body[SP_ENTITY_ID].processor).toBe('base');
  });

  it('answers 422 when the SP is missing from metadata', async () => {
    const id = await createSp();
    hasServiceProvider.mockResolvedValue(false);

    const res = await request(app).post(`/admin/service-providers/${id}/validate`).set(admin());

    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      error: `${SP_ENTITY_ID} is not present in any Metadata`,
      kind: 'EntityNotInMetadata',
      is_valid: false,
      is_active: false
    });
  });

  it('answers 404 for unknown SPs', async () => {
    const res = await request(app).get('/admin/service-providers/sp-99').set(admin());
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'sp_not_found' });
  });

  it('deletes SPs', async () => {
    const id = await createSp();
    expect((await request(app).delete(`/admin/service-providers/${id}`).set(admin())).status).toBe(204);
    expect((await request(app).get(`/admin/service-providers/${id}`).set(admin())).status).toBe(404);
  });

  it('rejects local metadata stores with nothing to read', async () => {
    const created = await request(app)
      .post('/admin/metadata-stores')
      .set(admin())
      .send({ name: 'empty', type: 'local' });
    expect(created.status).toBe(201);

    const res = await request(app).post(`/admin/metadata-stores/${created.body.id}/validate`).set(admin());

    expect(res.status).toBe(422);
    expect(res.body.kind).toBe('EmptySource');
  });

  it('publishes valid remote metadata stores', async () => {
    const created = await request(app)
      .post('/admin/metadata-stores')
      .set(admin())
      .send({ name: 'federation', type: 'remote', url: 'https://fed.example.org/metadata.xml' });

    const updated = await request(app)
      .put(`/admin/metadata-stores/${created.body.id}`)
      .set(admin())
      .send({ is_active: true });
    expect(updated.body.validation).toEqual({ is_valid: true, is_active: true });

    const snapshot = await request(app).get('/admin/snapshots/metadata-sources').set(admin());
    expect(snapshot.body).toEqual({ remote: [{ url: 'https://fed.example.org/metadata.xml' }] });
  });

  it('rejects unknown metadata store kinds', async () => {
    const res = await request(app).post('/admin/metadata-stores').set(admin()).send({ name: 'x', type: 'ftp' });
    expect(res.status).toBe(400);
  });

  it('forgets a user', async () => {
    const res = await request(app).delete('/admin/users/u1/federation').set(admin());
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ persistentIds: 0, agreements: 0 });
  });
});
