import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  joinAttributeNames,
  parseAttributeMapping,
  parseKwargs,
  serializeAttributeMapping,
  splitAttributeNames
} from './mapping';
import { DEFAULT_ATTRIBUTE_MAPPING } from './constants';

describe('attribute mapping', () => {
  it('parses the default mapping', () => {
    const parsed = parseAttributeMapping(serializeAttributeMapping(DEFAULT_ATTRIBUTE_MAPPING));
    expect(parsed).toEqual({ ok: true, value: DEFAULT_ATTRIBUTE_MAPPING });
  });

  it('keeps declaration order', () => {
    const parsed = parseAttributeMapping('{"mail": "email", "cn": "commonName", "sn": "surname"}');
    expect(parsed.ok && Object.keys(parsed.value)).toEqual(['mail', 'cn', 'sn']);
  });

  it('rejects a trailing comma', () => {
    const parsed = parseAttributeMapping('{"email": "email",}');
    expect(parsed.ok).toBe(false);
  });

  it('rejects arrays, null and empty text', () => {
    expect(parseAttributeMapping('["email"]')).toEqual({ ok: false, error: 'expected a JSON object' });
    expect(parseAttributeMapping(null)).toEqual({ ok: false, error: 'empty document' });
    expect(parseAttributeMapping('   ')).toEqual({ ok: false, error: 'empty document' });
  });

  it('rejects non-string SAML names', () => {
    expect(parseAttributeMapping('{"is_staff": true}')).toEqual({
      ok: false,
      error: 'value of "is_staff" must be a string'
    });
  });

  it('serialized then parsed yields an equal mapping', () => {
    fc.assert(
      fc.property(fc.dictionary(fc.string().filter((k) => k !== '__proto__'), fc.string()), (mapping) => {
        const parsed = parseAttributeMapping(serializeAttributeMapping(mapping));
        expect(parsed).toEqual({ ok: true, value: mapping });
      }),
      { numRuns: 100 }
    );
  });
});

describe('kwargs', () => {
  it('accepts any JSON object', () => {
    expect(parseKwargs('{"disable_ssl_certificate_validation": true}')).toEqual({
      ok: true,
      value: { disable_ssl_certificate_validation: true }
    });
  });

  it('rejects malformed text', () => {
    expect(parseKwargs('{bad').ok).toBe(false);
  });
});

describe('agreement attribute names', () => {
  it('joins and splits on commas', () => {
    expect(joinAttributeNames(['email', 'first_name'])).toBe('email,first_name');
    expect(splitAttributeNames('email,first_name')).toEqual(new Set(['email', 'first_name']));
  });
});
