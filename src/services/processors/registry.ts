/**
 * Attribute processor registry
 *
 * Processors are strategies turning a user record into SAML attribute values.
 * They are registered by name at start-up and SPs refer to them by that name.
 */

import { AttributeMapping, UserRecord } from '../../types';
import { ValidationError } from '../../lib/errors';
import { Result, ok, err } from '../../lib/result';

export type SamlAttributes = Record<string, string[]>;

export interface AttributeProcessor {
  /** Whether the user may sign in to SPs using this processor. */
  hasAccess(user: UserRecord): boolean;
  createIdentity(user: UserRecord, mapping: AttributeMapping): SamlAttributes;
}

export class ProcessorRegistry {
  private readonly processors = new Map<string, AttributeProcessor>();

  register(name: string, processor: AttributeProcessor): this {
    if (this.processors.has(name)) {
      throw new Error(`Attribute processor "${name}" is already registered`);
    }
    this.processors.set(name, processor);
    return this;
  }

  resolve(name: string): Result<AttributeProcessor, ValidationError> {
    const processor = this.processors.get(name);
    if (!processor) {
      return err(new ValidationError('UnknownProcessor', `Unknown attribute processor "${name}"`));
    }
    return ok(processor);
  }
}
