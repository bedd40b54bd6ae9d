import { AttributeMapping, MetadataSourceKind } from '../types';

export const DEFAULT_PROCESSOR = 'base';

export const DEFAULT_ATTRIBUTE_MAPPING: AttributeMapping = {
  email: 'email',
  first_name: 'first_name',
  last_name: 'last_name',
  is_staff: 'is_staff',
  is_superuser: 'is_superuser'
};

export const METADATA_SOURCE_KINDS: readonly MetadataSourceKind[] = ['remote', 'mdq', 'local'];

export const SIGNING_ALGORITHMS = [
  'http://www.w3.org/2001/04/xmldsig-more#rsa-sha224',
  'http://www.w3.org/2001/04/xmldsig-more#rsa-sha256',
  'http://www.w3.org/2001/04/xmldsig-more#rsa-sha384',
  'http://www.w3.org/2001/04/xmldsig-more#rsa-sha512',
  'http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha224',
  'http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha256',
  'http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha384',
  'http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha512'
];

export const DIGEST_ALGORITHMS = [
  'http://www.w3.org/2001/04/xmldsig-more#sha224',
  'http://www.w3.org/2001/04/xmlenc#sha256',
  'http://www.w3.org/2001/04/xmldsig-more#sha384',
  'http://www.w3.org/2001/04/xmlenc#sha512'
];

export const DEFAULT_SIGNING_ALGORITHM = 'http://www.w3.org/2001/04/xmldsig-more#rsa-sha256';
export const DEFAULT_DIGEST_ALGORITHM = 'http://www.w3.org/2001/04/xmlenc#sha256';

export const SAML_METADATA_NS = 'urn:oasis:names:tc:SAML:2.0:metadata';

export function isMetadataSourceKind(value: unknown): value is MetadataSourceKind {
  return typeof value === 'string' && (METADATA_SOURCE_KINDS as readonly string[]).includes(value);
}
