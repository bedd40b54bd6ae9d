import { AttributeMapping, ServiceProviderEntry, UserRecord } from '../types';
import { ValidationError } from '../lib/errors';
import { Result, ok, err } from '../lib/result';
import { parseAttributeMapping } from '../lib/mapping';
import { AttributeProcessor, ProcessorRegistry, SamlAttributes } from './processors';

export interface ReleasePolicy {
  processor: AttributeProcessor;
  mapping: AttributeMapping;
  forceRelease: boolean;
}

export class AttributeReleasePolicy {
  constructor(private readonly processors: ProcessorRegistry) {}

  resolveProcessor(name: string): Result<AttributeProcessor, ValidationError> {
    return this.processors.resolve(name);
  }

  resolve(sp: ServiceProviderEntry): Result<ReleasePolicy, ValidationError> {
    const processor = this.resolveProcessor(sp.attribute_processor);
    if (!processor.ok) return processor;

    const mapping = parseAttributeMapping(sp.attribute_mapping);
    if (!mapping.ok) {
      return err(
        new ValidationError('MalformedMapping', `Attribute Mapping is not a valid JSON format: ${mapping.error}`)
      );
    }

    return ok({ processor: processor.value, mapping: mapping.value, forceRelease: sp.force_attribute_release });
  }

  /**
   * Attributes to put in the assertion. `requested` holds the SAML names the
   * SP asked for in its metadata; it is ignored when release is forced.
   */
  release(policy: ReleasePolicy, user: UserRecord, requested?: readonly string[]): SamlAttributes {
    const identity = policy.processor.createIdentity(user, policy.mapping);
    if (policy.forceRelease || requested === undefined) {
      return identity;
    }
    const wanted = new Set(requested);
    return Object.fromEntries(Object.entries(identity).filter(([name]) => wanted.has(name)));
  }
}
