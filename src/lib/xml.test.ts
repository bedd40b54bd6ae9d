import { describe, it, expect } from 'vitest';
import { extractServiceProviderIds, parseXml } from './xml';
import { readFixture } from '../testing/fixtures';

describe('parseXml', () => {
  it('parses a metadata aggregate', () => {
    const doc = parseXml(readFixture('federation.xml'));
    expect(doc.documentElement.localName).toBe('EntitiesDescriptor');
  });

  it('rejects DOCTYPE declarations', () => {
    const xml = '<?xml version="1.0"?><!DOCTYPE foo [<!ENTITY xxe SYSTEM "file:///etc/passwd">]><foo>&xxe;</foo>';
    expect(() => parseXml(xml)).toThrow('XML security error: DOCTYPE declarations are not allowed');
  });

  it('rejects unquoted attribute values', () => {
    expect(() => parseXml('<a attr=x></a>')).toThrow('XML Parse Error');
  });

  it('rejects undeclared entity references', () => {
    expect(() => parseXml('<a>&bogus;</a>')).toThrow();
  });

  it('rejects SYSTEM identifiers in the prolog', () => {
    expect(() => parseXml('<?xml version="1.0"?> SYSTEM "http://example.org/x.dtd"<a/>')).toThrow(
      'XML security error: SYSTEM references are not allowed'
    );
  });

  it('accepts SYSTEM and PUBLIC as element text', () => {
    const doc = parseXml(
      '<md:EntitiesDescriptor xmlns:md="urn:oasis:names:tc:SAML:2.0:metadata">' +
        '<md:Extensions>See SYSTEM "policy" and PUBLIC \'terms\'</md:Extensions>' +
        '</md:EntitiesDescriptor>'
    );
    expect(doc.documentElement.textContent).toBe('See SYSTEM "policy" and PUBLIC \'terms\'');
  });

  it('rejects text without a root element', () => {
    expect(() => parseXml('this is not xml')).toThrow();
  });
});

describe('extractServiceProviderIds', () => {
  it('lists only entities with an SP role and an assertion consumer', () => {
    expect(extractServiceProviderIds(parseXml(readFixture('federation.xml')))).toEqual([
      'https://sp.example.org/metadata'
    ]);
  });

  it('handles a single default-namespace EntityDescriptor', () => {
    expect(extractServiceProviderIds(parseXml(readFixture('single-sp.xml')))).toEqual([
      'https://wiki.example.org/shibboleth'
    ]);
  });

  it('skips SP roles without an AssertionConsumerService', () => {
    const xml =
      '<EntityDescriptor xmlns="urn:oasis:names:tc:SAML:2.0:metadata" entityID="https://bare.example.org">' +
      '<SPSSODescriptor protocolSupportEnumeration="urn:oasis:names:tc:SAML:2.0:protocol"/>' +
      '</EntityDescriptor>';
    expect(extractServiceProviderIds(parseXml(xml))).toEqual([]);
  });
});
