import fs from 'fs/promises';
import path from 'path';
import { ActiveSource, SourceDescriptor } from '../types';
import { HttpProbe } from '../lib/http';
import { extractServiceProviderIds, parseXml } from '../lib/xml';
import { describeError } from '../lib/errors';
import logger from '../lib/logger';

/** Lookup into the metadata currently loaded by the SAML binding. */
export interface MetadataIndex {
  hasServiceProvider(entityId: string): Promise<boolean>;
}

export type SourcesProvider = () => Promise<ActiveSource[]>;

function describe(descriptor: SourceDescriptor): string {
  return typeof descriptor === 'string' ? descriptor : descriptor.url;
}

/**
 * Answers from the active metadata sources. Aggregate documents are read on
 * every lookup; sources declared as `mdq` are queried per entity.
 */
export class SnapshotMetadataIndex implements MetadataIndex {
  constructor(
    private readonly sources: SourcesProvider,
    private readonly http: HttpProbe
  ) {}

  async hasServiceProvider(entityId: string): Promise<boolean> {
    const sources = await this.sources();
    const aggregates = sources.filter((source) => source.type !== 'mdq').map((source) => source.descriptor);
    const services = sources.filter((source) => source.type === 'mdq').map((source) => source.descriptor);

    for (const descriptor of aggregates) {
      try {
        const ids = await this.loadEntityIds(descriptor);
        if (ids.includes(entityId)) return true;
      } catch (e) {
        logger.warn('Metadata source could not be read', { source: describe(descriptor), err: describeError(e) });
      }
    }

    for (const descriptor of services) {
      if (typeof descriptor === 'string') continue;
      const url = `${descriptor.url.replace(/\/+$/, '')}/entities/${encodeURIComponent(entityId)}`;
      try {
        const res = await this.http.get(url);
        if (res.status === 200 && extractServiceProviderIds(parseXml(res.body)).includes(entityId)) {
          return true;
        }
      } catch (e) {
        logger.warn('MDQ lookup failed', { source: descriptor.url, entityId, err: describeError(e) });
      }
    }

    return false;
  }

  private async loadEntityIds(descriptor: SourceDescriptor): Promise<string[]> {
    if (typeof descriptor !== 'string') {
      const res = await this.http.get(descriptor.url);
      if (res.status !== 200) {
        throw new Error(`HTTP ${res.status}`);
      }
      return extractServiceProviderIds(parseXml(res.body));
    }

    const stat = await fs.stat(descriptor);
    const files = stat.isDirectory()
      ? (await fs.readdir(descriptor)).map((name) => path.join(descriptor, name))
      : [descriptor];

    const ids: string[] = [];
    for (const file of files) {
      ids.push(...extractServiceProviderIds(parseXml(await fs.readFile(file, 'utf8'))));
    }
    return ids;
  }
}
