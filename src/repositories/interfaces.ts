import {
  AgreementRecord,
  MetadataSourceEntry,
  MetadataSourceChanges,
  MetadataSourceInput,
  PersistentIdentifier,
  ServiceProviderEntry,
  ServiceProviderChanges,
  ServiceProviderInput,
  ValidityState
} from '../types';

export interface ServiceProviderRepository {
  list(): Promise<ServiceProviderEntry[]>;
  listActive(): Promise<ServiceProviderEntry[]>;
  findById(id: string): Promise<ServiceProviderEntry | null>;
  findByEntityId(entityId: string): Promise<ServiceProviderEntry | null>;
  create(input: ServiceProviderInput): Promise<ServiceProviderEntry>;
  update(id: string, patch: ServiceProviderChanges): Promise<ServiceProviderEntry | null>;
  saveValidity(id: string, state: ValidityState): Promise<void>;
  touchLastSeen(id: string, at: Date): Promise<void>;
  delete(id: string): Promise<ServiceProviderEntry | null>;
}

export interface MetadataSourceRepository {
  list(): Promise<MetadataSourceEntry[]>;
  /** Entries both active and valid. */
  listActive(): Promise<MetadataSourceEntry[]>;
  findById(id: string): Promise<MetadataSourceEntry | null>;
  create(input: MetadataSourceInput): Promise<MetadataSourceEntry>;
  update(id: string, patch: MetadataSourceChanges): Promise<MetadataSourceEntry | null>;
  saveValidity(id: string, state: ValidityState): Promise<void>;
  delete(id: string): Promise<MetadataSourceEntry | null>;
}

export interface AgreementRecordRepository {
  findLatest(userId: string, spEntityId: string): Promise<AgreementRecord | null>;
  append(userId: string, spEntityId: string, attrs: string): Promise<AgreementRecord>;
  deleteByUser(userId: string): Promise<number>;
  deleteBySpEntityId(spEntityId: string): Promise<number>;
}

export interface PersistentIdRepository {
  find(spId: string, userId: string): Promise<PersistentIdentifier | null>;
  /** Rejects with AllocationConflictError when a unique index is hit. */
  insert(spId: string, userId: string, persistentId: string): Promise<PersistentIdentifier>;
  deleteByUser(userId: string): Promise<number>;
  deleteBySp(spId: string): Promise<number>;
}

export interface Repositories {
  serviceProviders: ServiceProviderRepository;
  metadataSources: MetadataSourceRepository;
  agreements: AgreementRecordRepository;
  persistentIds: PersistentIdRepository;
}
