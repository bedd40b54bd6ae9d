import fs from 'fs';
import path from 'path';
import { vi } from 'vitest';
import { DEFAULT_ATTRIBUTE_MAPPING, DEFAULT_DIGEST_ALGORITHM, DEFAULT_SIGNING_ALGORITHM } from '../lib/constants';
import { serializeAttributeMapping } from '../lib/mapping';
import { FileStorage } from '../lib/storage';
import { HttpProbe } from '../lib/http';
import { MetadataSourceEntry, ServiceProviderEntry } from '../types';

export const SP_ENTITY_ID = 'https://sp.example.org/metadata';

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf8');
}

export function fixturePath(name: string): string {
  return path.join(__dirname, 'fixtures', name);
}

export function makeServiceProvider(overrides: Partial<ServiceProviderEntry> = {}): ServiceProviderEntry {
  const at = new Date('2026-01-01T00:00:00Z');
  return {
    id: 'sp-1',
    entity_id: SP_ENTITY_ID,
    display_name: 'Example SP',
    metadata_url: '',
    description: 'An example service provider',
    agreement_screen: false,
    agreement_consent_form: false,
    agreement_message: '',
    signing_algorithm: DEFAULT_SIGNING_ALGORITHM,
    digest_algorithm: DEFAULT_DIGEST_ALGORITHM,
    disable_encrypted_assertions: true,
    attribute_processor: 'base',
    attribute_mapping: serializeAttributeMapping(DEFAULT_ATTRIBUTE_MAPPING),
    force_attribute_release: false,
    is_valid: false,
    is_active: false,
    created: at,
    updated: at,
    last_seen: null,
    ...overrides
  };
}

export function makeMetadataSource(overrides: Partial<MetadataSourceEntry> = {}): MetadataSourceEntry {
  const at = new Date('2026-01-01T00:00:00Z');
  return {
    id: 'md-1',
    name: 'federation',
    type: 'remote',
    url: 'https://fed.example.org/metadata.xml',
    file: null,
    kwargs: '{}',
    is_valid: true,
    is_active: true,
    created: at,
    updated: at,
    ...overrides
  };
}

export function stubStorage(objectStorage = false, contents = ''): FileStorage {
  return {
    objectStorage,
    pathOf: (ref: string) => `/media/${ref}`,
    urlOf: (ref: string) => `https://files.example.org/${ref}`,
    read: vi.fn().mockResolvedValue(contents)
  };
}

export function stubHttp(status = 200, body = '') {
  return {
    get: vi.fn<HttpProbe['get']>().mockResolvedValue({ status, body }),
    head: vi.fn<HttpProbe['head']>().mockResolvedValue({ status })
  };
}
