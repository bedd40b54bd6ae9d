import { Repositories } from '../repositories/interfaces';
import { HttpProbe } from '../lib/http';
import { FileStorage } from '../lib/storage';
import { ProcessorRegistry } from './processors';
import { ValidationEngine } from './validationEngine';
import { TrustRegistry } from './trustRegistry';
import { MetadataAggregator } from './metadataAggregator';
import { MetadataIndex, SnapshotMetadataIndex } from './metadataIndex';
import { AttributeReleasePolicy } from './attributeReleasePolicy';
import { ConsentTracker } from './consentTracker';
import { PseudonymAllocator } from './pseudonymAllocator';
import { AttributeReleaseService } from './releaseService';
import { ServiceProviderService } from './serviceProviderService';
import { MetadataStoreService } from './metadataStoreService';
import userService from './userService';

export interface ServiceDependencies {
  repositories: Repositories;
  processors: ProcessorRegistry;
  http: HttpProbe;
  storage: FileStorage;
  agreementValidForHours: number;
  persistentIdMaxAttempts: number;
  /** Defaults to an index over the active metadata sources. */
  metadataIndex?: MetadataIndex;
  now?: () => Date;
}

export function createServices(deps: ServiceDependencies) {
  const { repositories } = deps;
  const metadataAggregator = new MetadataAggregator(repositories.metadataSources, deps.storage);
  const metadataIndex =
    deps.metadataIndex ?? new SnapshotMetadataIndex(() => metadataAggregator.activeDescriptors(), deps.http);
  const validation = new ValidationEngine({
    serviceProviders: repositories.serviceProviders,
    metadataSources: repositories.metadataSources,
    processors: deps.processors,
    metadataIndex,
    http: deps.http,
    storage: deps.storage
  });
  const trustRegistry = new TrustRegistry(repositories.serviceProviders);
  const releasePolicy = new AttributeReleasePolicy(deps.processors);
  const consent = new ConsentTracker(repositories.agreements, { validityHours: deps.agreementValidForHours }, deps.now);
  const pseudonyms = new PseudonymAllocator(repositories.persistentIds, { maxAttempts: deps.persistentIdMaxAttempts });

  return {
    validation,
    trustRegistry,
    metadataAggregator,
    metadataIndex,
    releasePolicy,
    consent,
    pseudonyms,
    release: new AttributeReleaseService(trustRegistry, releasePolicy, consent, pseudonyms),
    serviceProviders: new ServiceProviderService(repositories, validation),
    metadataStores: new MetadataStoreService(repositories.metadataSources, validation),
    users: {
      forgetUser: (userId: string) => userService.forgetUser(repositories, userId)
    }
  };
}

export type Services = ReturnType<typeof createServices>;
