import { MetadataSourceRepository } from '../repositories/interfaces';
import {
  ActiveSource,
  LocationDescriptor,
  MetadataSourceEntry,
  MetadataSourceKind,
  MetadataSourceSnapshot,
  RemoteSourceDescriptor,
  SourceDescriptor
} from '../types';
import { FileStorage } from '../lib/storage';
import { parseKwargs } from '../lib/mapping';
import logger from '../lib/logger';

/**
 * Where a `local` source lives: its attached file (a URL when files sit in
 * object storage) or else its `url`, read as a directory path.
 */
export function resolveLocation(entry: MetadataSourceEntry, storage: FileStorage): LocationDescriptor | null {
  if (entry.file) {
    return storage.objectStorage
      ? { kind: 'url', value: storage.urlOf(entry.file) }
      : { kind: 'path', value: storage.pathOf(entry.file) };
  }
  if (entry.url) {
    return { kind: 'path', value: entry.url };
  }
  return null;
}

function toDescriptor(entry: MetadataSourceEntry, storage: FileStorage): SourceDescriptor | null {
  if (entry.type === 'local') {
    const location = resolveLocation(entry, storage);
    if (!location) return null;
    return location.kind === 'url' ? { url: location.value } : location.value;
  }

  const kwargs = parseKwargs(entry.kwargs);
  if (!kwargs.ok) {
    logger.warn('Skipping metadata source with unreadable kwargs', { source: entry.name, err: kwargs.error });
    return null;
  }
  const descriptor: RemoteSourceDescriptor = { url: entry.url ?? '' };
  if (entry.file) {
    descriptor.cert = storage.pathOf(entry.file);
  }
  return { ...descriptor, ...kwargs.value };
}

/** Descriptors of the active and valid sources, each under its declared type. */
export function describeActiveSources(
  entries: readonly MetadataSourceEntry[],
  storage: FileStorage
): ActiveSource[] {
  const sources: ActiveSource[] = [];
  for (const entry of entries) {
    if (!entry.is_active || !entry.is_valid) continue;
    const descriptor = toDescriptor(entry, storage);
    if (descriptor !== null) {
      sources.push({ type: entry.type, descriptor });
    }
  }
  return sources;
}

/**
 * Groups active and valid sources by kind for the SAML metadata loader.
 *
 * Every `{ url }` mapping is listed under `remote`, whatever the declared type:
 * MDQ services and `local` files kept in object storage included.
 */
export function buildSourceSnapshot(
  entries: readonly MetadataSourceEntry[],
  storage: FileStorage
): MetadataSourceSnapshot {
  const snapshot: MetadataSourceSnapshot = {};
  for (const { type, descriptor } of describeActiveSources(entries, storage)) {
    const kind: MetadataSourceKind = typeof descriptor === 'string' ? type : 'remote';
    (snapshot[kind] ??= []).push(descriptor);
  }
  return snapshot;
}

export class MetadataAggregator {
  constructor(
    private readonly sources: MetadataSourceRepository,
    private readonly storage: FileStorage
  ) {}

  async activeSources(): Promise<MetadataSourceSnapshot> {
    return buildSourceSnapshot(await this.sources.listActive(), this.storage);
  }

  async activeDescriptors(): Promise<ActiveSource[]> {
    return describeActiveSources(await this.sources.listActive(), this.storage);
  }

  resolveLocation(entry: MetadataSourceEntry): LocationDescriptor | null {
    return resolveLocation(entry, this.storage);
  }
}
