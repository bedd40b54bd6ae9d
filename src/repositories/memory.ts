import { AllocationConflictError } from '../lib/errors';
import {
  AgreementRecord,
  MetadataSourceEntry,
  PersistentIdentifier,
  ServiceProviderEntry
} from '../types';
import { DEFAULT_ATTRIBUTE_MAPPING, DEFAULT_DIGEST_ALGORITHM, DEFAULT_PROCESSOR, DEFAULT_SIGNING_ALGORITHM } from '../lib/constants';
import { serializeAttributeMapping } from '../lib/mapping';
import {
  AgreementRecordRepository,
  MetadataSourceRepository,
  PersistentIdRepository,
  Repositories,
  ServiceProviderRepository
} from './interfaces';

type Clock = () => Date;

/**
 * In-process stand-ins for the Mongo repositories. They enforce the same
 * uniqueness rules as the collection indexes.
 */
export class InMemoryServiceProviderRepository implements ServiceProviderRepository {
  private readonly rows = new Map<string, ServiceProviderEntry>();
  private seq = 0;

  constructor(private readonly now: Clock = () => new Date()) {}

  async list() {
    return [...this.rows.values()].sort((a, b) => a.entity_id.localeCompare(b.entity_id)).map((r) => ({ ...r }));
  }

  async listActive() {
    return (await this.list()).filter((r) => r.is_active);
  }

  async findById(id: string) {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findByEntityId(entityId: string) {
    const row = [...this.rows.values()].find((r) => r.entity_id === entityId);
    return row ? { ...row } : null;
  }

  async create(input: Parameters<ServiceProviderRepository['create']>[0]) {
    if ([...this.rows.values()].some((r) => r.entity_id === input.entity_id)) {
      throw new Error(`duplicate entity_id ${input.entity_id}`);
    }
    const created = this.now();
    const row: ServiceProviderEntry = {
      metadata_url: '',
      description: '',
      agreement_screen: false,
      agreement_consent_form: false,
      agreement_message: '',
      signing_algorithm: DEFAULT_SIGNING_ALGORITHM,
      digest_algorithm: DEFAULT_DIGEST_ALGORITHM,
      disable_encrypted_assertions: true,
      attribute_processor: DEFAULT_PROCESSOR,
      attribute_mapping: serializeAttributeMapping(DEFAULT_ATTRIBUTE_MAPPING),
      force_attribute_release: false,
      ...input,
      id: `sp-${++this.seq}`,
      is_valid: false,
      is_active: false,
      created,
      updated: created,
      last_seen: null
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async update(id: string, patch: Parameters<ServiceProviderRepository['update']>[1]) {
    const row = this.rows.get(id);
    if (!row) return null;
    const next = { ...row, ...patch, updated: this.now() };
    this.rows.set(id, next);
    return { ...next };
  }

  async saveValidity(id: string, state: { is_valid: boolean; is_active: boolean }) {
    const row = this.rows.get(id);
    if (row) this.rows.set(id, { ...row, ...state, updated: this.now() });
  }

  async touchLastSeen(id: string, at: Date) {
    const row = this.rows.get(id);
    if (row) this.rows.set(id, { ...row, last_seen: at });
  }

  async delete(id: string) {
    const row = this.rows.get(id);
    this.rows.delete(id);
    return row ?? null;
  }
}

export class InMemoryMetadataSourceRepository implements MetadataSourceRepository {
  private readonly rows = new Map<string, MetadataSourceEntry>();
  private seq = 0;

  constructor(private readonly now: Clock = () => new Date()) {}

  async list() {
    return [...this.rows.values()].sort((a, b) => a.name.localeCompare(b.name)).map((r) => ({ ...r }));
  }

  async listActive() {
    return (await this.list()).filter((r) => r.is_active && r.is_valid);
  }

  async findById(id: string) {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async create(input: Parameters<MetadataSourceRepository['create']>[0]) {
    const created = this.now();
    const row: MetadataSourceEntry = {
      url: null,
      file: null,
      kwargs: '{}',
      ...input,
      id: `md-${++this.seq}`,
      is_valid: false,
      is_active: false,
      created,
      updated: created
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async update(id: string, patch: Parameters<MetadataSourceRepository['update']>[1]) {
    const row = this.rows.get(id);
    if (!row) return null;
    const next = { ...row, ...patch, updated: this.now() };
    this.rows.set(id, next);
    return { ...next };
  }

  async saveValidity(id: string, state: { is_valid: boolean; is_active: boolean }) {
    const row = this.rows.get(id);
    if (row) this.rows.set(id, { ...row, ...state, updated: this.now() });
  }

  async delete(id: string) {
    const row = this.rows.get(id);
    this.rows.delete(id);
    return row ?? null;
  }
}

export class InMemoryAgreementRecordRepository implements AgreementRecordRepository {
  private rows: AgreementRecord[] = [];
  private seq = 0;

  constructor(private readonly now: Clock = () => new Date()) {}

  async findLatest(userId: string, spEntityId: string) {
    let latest: AgreementRecord | null = null;
    for (const row of this.rows) {
      if (row.user_id !== userId || row.sp_entity_id !== spEntityId) continue;
      if (!latest || row.created.getTime() >= latest.created.getTime()) latest = row;
    }
    return latest ? { ...latest } : null;
  }

  async append(userId: string, spEntityId: string, attrs: string) {
    const row: AgreementRecord = {
      id: `ag-${++this.seq}`,
      user_id: userId,
      sp_entity_id: spEntityId,
      attrs,
      created: this.now()
    };
    this.rows.push(row);
    return { ...row };
  }

  async deleteByUser(userId: string) {
    const before = this.rows.length;
    this.rows = this.rows.filter((r) => r.user_id !== userId);
    return before - this.rows.length;
  }

  async deleteBySpEntityId(spEntityId: string) {
    const before = this.rows.length;
    this.rows = this.rows.filter((r) => r.sp_entity_id !== spEntityId);
    return before - this.rows.length;
  }
}

export class InMemoryPersistentIdRepository implements PersistentIdRepository {
  private rows: PersistentIdentifier[] = [];
  private seq = 0;

  constructor(private readonly now: Clock = () => new Date()) {}

  async find(spId: string, userId: string) {
    const row = this.rows.find((r) => r.sp_id === spId && r.user_id === userId);
    return row ? { ...row } : null;
  }

  async insert(spId: string, userId: string, persistentId: string) {
    const clash = this.rows.some(
      (r) => r.sp_id === spId && (r.user_id === userId || r.persistent_id === persistentId)
    );
    if (clash) {
      throw new AllocationConflictError();
    }
    const row: PersistentIdentifier = {
      id: `pid-${++this.seq}`,
      sp_id: spId,
      user_id: userId,
      persistent_id: persistentId,
      created: this.now()
    };
    this.rows.push(row);
    return { ...row };
  }

  async deleteByUser(userId: string) {
    const before = this.rows.length;
    this.rows = this.rows.filter((r) => r.user_id !== userId);
    return before - this.rows.length;
  }

  async deleteBySp(spId: string) {
    const before = this.rows.length;
    this.rows = this.rows.filter((r) => r.sp_id !== spId);
    return before - this.rows.length;
  }
}

export function createInMemoryRepositories(now?: Clock): Repositories {
  return {
    serviceProviders: new InMemoryServiceProviderRepository(now),
    metadataSources: new InMemoryMetadataSourceRepository(now),
    agreements: new InMemoryAgreementRecordRepository(now),
    persistentIds: new InMemoryPersistentIdRepository(now)
  };
}
