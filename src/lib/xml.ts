/**
 * Hardened XML parsing for metadata documents.
 *
 * Documents carrying DOCTYPE or ENTITY declarations, or SYSTEM/PUBLIC
 * identifiers in their prolog, are rejected before they reach the parser, so
 * no entity is ever expanded. Parser warnings count as failures.
 */

import { DOMParser } from '@xmldom/xmldom';
import { SAML_METADATA_NS } from './constants';

const XXE_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/<!DOCTYPE\s/i, 'DOCTYPE declarations are not allowed'],
  [/<!ENTITY\s/i, 'ENTITY declarations are not allowed']
];

const PROLOG_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/SYSTEM\s+["']/i, 'SYSTEM references are not allowed'],
  [/PUBLIC\s+["']/i, 'PUBLIC references are not allowed']
];

/** Everything before the root element's start tag. */
function prologOf(xml: string): string {
  const root = xml.search(/<[^?!]/);
  return root === -1 ? xml : xml.slice(0, root);
}

export type XmlDocument = ReturnType<DOMParser['parseFromString']>;

function rejectMatches(text: string, patterns: ReadonlyArray<[RegExp, string]>): void {
  for (const [pattern, reason] of patterns) {
    if (pattern.test(text)) {
      throw new Error(`XML security error: ${reason}`);
    }
  }
}

export function parseXml(xml: string): XmlDocument {
  rejectMatches(xml, XXE_PATTERNS);
  rejectMatches(prologOf(xml), PROLOG_PATTERNS);

  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: string) => {
        throw new Error(`XML Parse Error: ${msg}`);
      },
      error: (msg: string) => {
        throw new Error(`XML Parse Error: ${msg}`);
      },
      fatalError: (msg: string) => {
        throw new Error(`XML Fatal Error: ${msg}`);
      }
    }
  });

  const doc = parser.parseFromString(xml, 'text/xml');
  if (!doc || !doc.documentElement) {
    throw new Error('XML Parse Error: document has no root element');
  }
  return doc;
}

/**
 * Entity ids of every EntityDescriptor that declares an SP role with at least
 * one AssertionConsumerService.
 */
export function extractServiceProviderIds(doc: XmlDocument): string[] {
  const ids: string[] = [];
  const descriptors = doc.getElementsByTagNameNS(SAML_METADATA_NS, 'EntityDescriptor');
  for (let i = 0; i < descriptors.length; i++) {
    const descriptor = descriptors.item(i);
    if (!descriptor) continue;
    const entityId = descriptor.getAttribute('entityID');
    if (!entityId) continue;
    const roles = descriptor.getElementsByTagNameNS(SAML_METADATA_NS, 'SPSSODescriptor');
    for (let j = 0; j < roles.length; j++) {
      const role = roles.item(j);
      if (role && role.getElementsByTagNameNS(SAML_METADATA_NS, 'AssertionConsumerService').length > 0) {
        ids.push(entityId);
        break;
      }
    }
  }
  return ids;
}
