import { ServiceProviderRepository } from '../repositories/interfaces';
import { SPConfig, SPConfigSnapshot, ServiceProviderEntry } from '../types';
import { parseAttributeMapping } from '../lib/mapping';
import logger from '../lib/logger';

export function toSPConfig(entry: ServiceProviderEntry): SPConfig | null {
  const mapping = parseAttributeMapping(entry.attribute_mapping);
  if (!mapping.ok) {
    return null;
  }
  return {
    processor: entry.attribute_processor,
    attribute_mapping: mapping.value,
    force_attribute_release: entry.force_attribute_release,
    display_name: entry.display_name,
    display_description: entry.description,
    display_agreement_message: entry.agreement_message,
    signing_algorithm: entry.signing_algorithm,
    digest_algorithm: entry.digest_algorithm,
    disable_encrypted_assertions: entry.disable_encrypted_assertions,
    show_user_agreement_screen: entry.agreement_screen,
    display_agreement_consent_form: entry.agreement_consent_form
  };
}

/** SP configuration keyed by entity id, for every active entry. */
export function buildActiveConfiguration(entries: readonly ServiceProviderEntry[]): SPConfigSnapshot {
  const snapshot: SPConfigSnapshot = {};
  for (const entry of entries) {
    if (!entry.is_active) continue;
    const spConfig = toSPConfig(entry);
    if (!spConfig) {
      logger.warn('Skipping active service provider with unreadable attribute mapping', {
        entityId: entry.entity_id
      });
      continue;
    }
    snapshot[entry.entity_id] = spConfig;
  }
  return snapshot;
}

export class TrustRegistry {
  constructor(private readonly serviceProviders: ServiceProviderRepository) {}

  async activeConfiguration(): Promise<SPConfigSnapshot> {
    return buildActiveConfiguration(await this.serviceProviders.listActive());
  }

  async findActive(entityId: string): Promise<ServiceProviderEntry | null> {
    const entry = await this.serviceProviders.findByEntityId(entityId);
    return entry && entry.is_active ? entry : null;
  }

  async touchLastSeen(entityId: string, at: Date = new Date()): Promise<void> {
    const entry = await this.serviceProviders.findByEntityId(entityId);
    if (entry) {
      await this.serviceProviders.touchLastSeen(entry.id, at);
    }
  }
}
