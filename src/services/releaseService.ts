import { SPConfig, UserRecord } from '../types';
import { ForbiddenError, NotFoundError } from '../lib/errors';
import logger from '../lib/logger';
import { TrustRegistry, toSPConfig } from './trustRegistry';
import { AttributeReleasePolicy } from './attributeReleasePolicy';
import { ConsentDecision, ConsentTracker } from './consentTracker';
import { PseudonymAllocator } from './pseudonymAllocator';
import { SamlAttributes } from './processors';

export interface ReleaseRequest {
  userId: string;
  user: UserRecord;
  spEntityId: string;
  /** SAML attribute names requested in the SP's metadata, when it states any. */
  requestedAttributes?: readonly string[];
}

export interface PreparedRelease {
  spEntityId: string;
  config: SPConfig;
  attributes: SamlAttributes;
  persistentId: string;
  /** Null when the SP does not show the agreement screen. */
  consent: ConsentDecision | null;
}

/**
 * Everything the SSO flow needs before it can build an assertion for one
 * user and one SP.
 */
export class AttributeReleaseService {
  constructor(
    private readonly registry: TrustRegistry,
    private readonly policy: AttributeReleasePolicy,
    private readonly consent: ConsentTracker,
    private readonly pseudonyms: PseudonymAllocator
  ) {}

  async prepare(request: ReleaseRequest): Promise<PreparedRelease> {
    const sp = await this.registry.findActive(request.spEntityId);
    const config = sp && toSPConfig(sp);
    if (!sp || !config) {
      throw new NotFoundError('sp_not_found');
    }

    const policy = this.policy.resolve(sp);
    if (!policy.ok) {
      logger.error('Active service provider has an unusable release policy', {
        sp: sp.entity_id,
        kind: policy.error.kind,
        err: policy.error.message
      });
      throw new NotFoundError('sp_not_found');
    }

    if (!policy.value.processor.hasAccess(request.user)) {
      logger.warn('User denied by attribute processor', { sp: sp.entity_id, userId: request.userId });
      throw new ForbiddenError('access_denied');
    }

    const attributes = this.policy.release(policy.value, request.user, request.requestedAttributes);
    const consent = sp.agreement_screen
      ? await this.consent.evaluate(request.userId, sp.entity_id, Object.keys(attributes))
      : null;
    const persistentId = await this.pseudonyms.getOrCreate(request.userId, sp.id);

    return { spEntityId: sp.entity_id, config, attributes, persistentId, consent };
  }

  async markAssertionIssued(spEntityId: string): Promise<void> {
    await this.registry.touchLastSeen(spEntityId);
    logger.info('SAML assertion issued', { sp: spEntityId });
  }
}
