import { AttributeMapping } from '../types';
import { Result, ok, err } from './result';
import { describeError } from './errors';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string | null | undefined): Result<Record<string, unknown>, string> {
  if (text === null || text === undefined || text.trim() === '') {
    return err('empty document');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return err(describeError(e));
  }
  if (!isPlainObject(parsed)) {
    return err('expected a JSON object');
  }
  return ok(parsed);
}

/** Parses stored attribute-mapping text. Values must be SAML attribute names. */
export function parseAttributeMapping(text: string | null | undefined): Result<AttributeMapping, string> {
  const parsed = parseJsonObject(text);
  if (!parsed.ok) return parsed;

  const entries: [string, string][] = [];
  for (const [internal, samlName] of Object.entries(parsed.value)) {
    if (typeof samlName !== 'string') {
      return err(`value of "${internal}" must be a string`);
    }
    entries.push([internal, samlName]);
  }
  return ok(Object.fromEntries(entries));
}

export function serializeAttributeMapping(mapping: AttributeMapping): string {
  return JSON.stringify(mapping, null, 4);
}

/** Parses the keyword arguments attached to a metadata source. */
export function parseKwargs(text: string | null | undefined): Result<Record<string, unknown>, string> {
  return parseJsonObject(text);
}

/** Agreement records keep the released attribute names comma-joined. */
export function joinAttributeNames(names: Iterable<string>): string {
  return Array.from(names).join(',');
}

export function splitAttributeNames(attrs: string): Set<string> {
  return new Set(attrs.split(','));
}
