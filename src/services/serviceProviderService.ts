import { Repositories } from '../repositories/interfaces';
import { ServiceProviderEntry, ServiceProviderInput } from '../types';
import { NotFoundError } from '../lib/errors';
import logger from '../lib/logger';
import { ValidationEngine, ValidationOutcome } from './validationEngine';

export interface SavedEntry<T> {
  entry: T;
  validation: ValidationOutcome;
}

export class ServiceProviderService {
  constructor(
    private readonly repositories: Repositories,
    private readonly engine: ValidationEngine
  ) {}

  list(): Promise<ServiceProviderEntry[]> {
    return this.repositories.serviceProviders.list();
  }

  async get(id: string): Promise<ServiceProviderEntry> {
    const entry = await this.repositories.serviceProviders.findById(id);
    if (!entry) throw new NotFoundError('sp_not_found');
    return entry;
  }

  async create(input: ServiceProviderInput): Promise<ServiceProviderEntry> {
    const entry = await this.repositories.serviceProviders.create(input);
    logger.audit('Service provider created', { entityId: entry.entity_id });
    return entry;
  }

  /**
   * Saves the edited fields, then re-validates. A requested `is_active` only
   * reaches the store through validation, together with `is_valid`.
   */
  async update(id: string, patch: Partial<ServiceProviderInput>): Promise<SavedEntry<ServiceProviderEntry>> {
    const { is_active: requested, ...changes } = patch;
    const updated = await this.repositories.serviceProviders.update(id, changes);
    if (!updated) throw new NotFoundError('sp_not_found');
    const validation = await this.engine.validateServiceProvider(updated, requested);
    return { entry: await this.get(id), validation };
  }

  async validate(id: string): Promise<ValidationOutcome> {
    return this.engine.validateServiceProvider(await this.get(id));
  }

  async remove(id: string): Promise<void> {
    const removed = await this.repositories.serviceProviders.delete(id);
    if (!removed) throw new NotFoundError('sp_not_found');
    const ids = await this.repositories.persistentIds.deleteBySp(removed.id);
    const agreements = await this.repositories.agreements.deleteBySpEntityId(removed.entity_id);
    logger.audit('Service provider deleted', {
      entityId: removed.entity_id,
      persistentIds: ids,
      agreements
    });
  }
}
