import { MetadataSourceRepository } from '../repositories/interfaces';
import { MetadataSourceEntry, MetadataSourceInput } from '../types';
import { NotFoundError } from '../lib/errors';
import logger from '../lib/logger';
import { ValidationEngine, ValidationOutcome } from './validationEngine';
import { SavedEntry } from './serviceProviderService';

export class MetadataStoreService {
  constructor(
    private readonly sources: MetadataSourceRepository,
    private readonly engine: ValidationEngine
  ) {}

  list(): Promise<MetadataSourceEntry[]> {
    return this.sources.list();
  }

  async get(id: string): Promise<MetadataSourceEntry> {
    const entry = await this.sources.findById(id);
    if (!entry) throw new NotFoundError('metadata_store_not_found');
    return entry;
  }

  async create(input: MetadataSourceInput): Promise<MetadataSourceEntry> {
    const entry = await this.sources.create(input);
    logger.audit('Metadata store created', { name: entry.name, type: entry.type });
    return entry;
  }

  async update(id: string, patch: Partial<MetadataSourceInput>): Promise<SavedEntry<MetadataSourceEntry>> {
    const { is_active: requested, ...changes } = patch;
    const updated = await this.sources.update(id, changes);
    if (!updated) throw new NotFoundError('metadata_store_not_found');
    const validation = await this.engine.validateMetadataSource(updated, requested);
    return { entry: await this.get(id), validation };
  }

  async validate(id: string): Promise<ValidationOutcome> {
    return this.engine.validateMetadataSource(await this.get(id));
  }

  async remove(id: string): Promise<void> {
    const removed = await this.sources.delete(id);
    if (!removed) throw new NotFoundError('metadata_store_not_found');
    logger.audit('Metadata store deleted', { name: removed.name });
  }
}
