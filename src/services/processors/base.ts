import { AttributeMapping, UserRecord } from '../../types';
import { AttributeProcessor, SamlAttributes } from './registry';

function toValues(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v) => v !== null && v !== undefined).map((v) => String(v));
  }
  if (value instanceof Date) {
    return [value.toISOString()];
  }
  return [String(value)];
}

/**
 * Grants access to every user and copies each mapped attribute present on the
 * user record under its SAML name.
 */
export class BaseProcessor implements AttributeProcessor {
  hasAccess(_user: UserRecord): boolean {
    return true;
  }

  createIdentity(user: UserRecord, mapping: AttributeMapping): SamlAttributes {
    const identity: SamlAttributes = {};
    for (const [internal, samlName] of Object.entries(mapping)) {
      const value = user[internal];
      if (value === undefined || value === null) continue;
      identity[samlName] = toValues(value);
    }
    return identity;
  }
}
