import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { Services, createServices } from '.';
import { createDefaultProcessorRegistry } from './processors';
import { createInMemoryRepositories } from '../repositories/memory';
import { Repositories } from '../repositories/interfaces';
import { HttpProbe } from '../lib/http';
import { MetadataIndex } from './metadataIndex';
import { stubHttp, stubStorage } from '../testing/fixtures';

const ENTITY_ID = 'https://unlisted.example.org/metadata';

describe('admin updates', () => {
  let repositories: Repositories;
  let services: Services;
  let hasServiceProvider: Mock<MetadataIndex['hasServiceProvider']>;
  let http: { get: Mock<HttpProbe['get']>; head: Mock<HttpProbe['head']> };

  beforeEach(() => {
    repositories = createInMemoryRepositories();
    hasServiceProvider = vi.fn<MetadataIndex['hasServiceProvider']>().mockResolvedValue(false);
    http = stubHttp(503);
    services = createServices({
      repositories,
      processors: createDefaultProcessorRegistry(),
      http,
      storage: stubStorage(),
      agreementValidForHours: 24,
      persistentIdMaxAttempts: 5,
      metadataIndex: { hasServiceProvider }
    });
  });

  it('never publishes an SP while its activation is being validated', async () => {
    const sp = await services.serviceProviders.create({ entity_id: ENTITY_ID, display_name: 'Unlisted SP' });
    const seen: string[][] = [];
    hasServiceProvider.mockImplementation(async () => {
      seen.push(Object.keys(await services.trustRegistry.activeConfiguration()));
      const stored = await repositories.serviceProviders.findById(sp.id);
      seen.push([String(stored?.is_active)]);
      return false;
    });

    const saved = await services.serviceProviders.update(sp.id, { is_active: true, description: 'edited' });

    expect(seen).toEqual([[], ['false']]);
    expect(saved.validation.ok).toBe(false);
    expect(saved.entry).toMatchObject({ description: 'edited', is_valid: false, is_active: false });
    expect(await services.trustRegistry.activeConfiguration()).toEqual({});
  });

  it('activates an SP together with its validity', async () => {
    const sp = await services.serviceProviders.create({ entity_id: ENTITY_ID, display_name: 'Listed SP' });
    hasServiceProvider.mockResolvedValue(true);

    const saved = await services.serviceProviders.update(sp.id, { is_active: true });

    expect(saved.entry).toMatchObject({ is_valid: true, is_active: true });
    expect(Object.keys(await services.trustRegistry.activeConfiguration())).toEqual([ENTITY_ID]);
  });

  it('leaves a metadata store inactive while its endpoint is probed', async () => {
    const store = await services.metadataStores.create({
      name: 'federation',
      type: 'remote',
      url: 'https://fed.example.org/metadata.xml'
    });
    const during: Array<boolean | undefined> = [];
    http.get.mockImplementation(async () => {
      during.push((await repositories.metadataSources.findById(store.id))?.is_active);
      return { status: 503, body: '' };
    });

    const saved = await services.metadataStores.update(store.id, { is_active: true });

    expect(during).toEqual([false]);
    expect(saved.validation.ok).toBe(false);
    expect(saved.entry).toMatchObject({ is_valid: false, is_active: false });
  });

  it('creates entries neither valid nor active and cascades on delete', async () => {
    const sp = await services.serviceProviders.create({ entity_id: ENTITY_ID, display_name: 'Unlisted SP' });
    expect(sp).toMatchObject({ is_valid: false, is_active: false });

    await repositories.persistentIds.insert(sp.id, 'u1', 'pid-value');
    await repositories.agreements.append('u1', ENTITY_ID, 'email');
    await services.serviceProviders.remove(sp.id);

    expect(await repositories.persistentIds.find(sp.id, 'u1')).toBeNull();
    expect(await repositories.agreements.findLatest('u1', ENTITY_ID)).toBeNull();
  });
});
