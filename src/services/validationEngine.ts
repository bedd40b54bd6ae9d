/**
 * Validation of SP and metadata-source definitions.
 *
 * Every check runs; the message of the last failing one is reported. A
 * failure forces is_active=false and is_valid follows it, a success sets
 * is_valid=true and keeps the administrator's is_active. The resulting pair
 * is persisted before the outcome is returned.
 */

import fs from 'fs/promises';
import path from 'path';
import { MetadataSourceRepository, ServiceProviderRepository } from '../repositories/interfaces';
import { MetadataSourceEntry, ServiceProviderEntry, ValidityState } from '../types';
import { ValidationError, describeError } from '../lib/errors';
import { Result, ok, err } from '../lib/result';
import { parseAttributeMapping, parseKwargs } from '../lib/mapping';
import { parseXml } from '../lib/xml';
import { HttpProbe } from '../lib/http';
import { FileStorage } from '../lib/storage';
import logger from '../lib/logger';
import { ProcessorRegistry } from './processors';
import { MetadataIndex } from './metadataIndex';

export type ValidationOutcome = Result<ValidityState, ValidationError>;

export interface ValidationEngineDeps {
  serviceProviders: ServiceProviderRepository;
  metadataSources: MetadataSourceRepository;
  processors: ProcessorRegistry;
  metadataIndex: MetadataIndex;
  http: HttpProbe;
  storage: FileStorage;
}

/** Tracks the running verdict of one validation pass. */
class Verdict {
  error: ValidationError | null = null;

  constructor(public isActive: boolean) {}

  fail(error: ValidationError): void {
    this.error = error;
    this.isActive = false;
  }

  settle(): ValidationOutcome {
    if (this.error) {
      return err(this.error);
    }
    return ok({ is_valid: true, is_active: this.isActive });
  }

  state(): ValidityState {
    return this.error
      ? { is_valid: this.isActive, is_active: this.isActive }
      : { is_valid: true, is_active: this.isActive };
  }
}

export class ValidationEngine {
  constructor(private readonly deps: ValidationEngineDeps) {}

  /** `requestedActive` is the administrator's wish; it is stored only with the verdict. */
  async validateServiceProvider(
    entry: ServiceProviderEntry,
    requestedActive: boolean = entry.is_active
  ): Promise<ValidationOutcome> {
    const verdict = new Verdict(requestedActive);

    const processor = this.deps.processors.resolve(entry.attribute_processor);
    if (!processor.ok) {
      verdict.fail(processor.error);
    }

    const mapping = parseAttributeMapping(entry.attribute_mapping);
    if (!mapping.ok) {
      verdict.fail(
        new ValidationError('MalformedMapping', `Attribute Mapping is not a valid JSON format: ${mapping.error}`)
      );
    }

    let present = false;
    try {
      present = await this.deps.metadataIndex.hasServiceProvider(entry.entity_id);
    } catch (e) {
      logger.warn('Metadata lookup failed', { entityId: entry.entity_id, err: describeError(e) });
    }
    if (!present) {
      verdict.fail(new ValidationError('EntityNotInMetadata', `${entry.entity_id} is not present in any Metadata`));
    }

    const state = verdict.state();
    await this.deps.serviceProviders.saveValidity(entry.id, state);
    this.report('service provider', entry.entity_id, entry, state, verdict.error);
    return verdict.settle();
  }

  async validateMetadataSource(
    entry: MetadataSourceEntry,
    requestedActive: boolean = entry.is_active
  ): Promise<ValidationOutcome> {
    const verdict = new Verdict(requestedActive);

    switch (entry.type) {
      case 'remote':
        await this.probe(entry, verdict, 'get', entry.url);
        break;
      case 'mdq':
        await this.probe(entry, verdict, 'head', entry.url && `${entry.url.replace(/\/+$/, '')}/entities/`);
        break;
      case 'local':
        await this.checkLocal(entry, verdict);
        break;
    }

    const kwargs = parseKwargs(entry.kwargs);
    if (!kwargs.ok) {
      verdict.fail(new ValidationError('MalformedKwargs', `kwargs JSON format error: ${kwargs.error}`));
    }

    const state = verdict.state();
    await this.deps.metadataSources.saveValidity(entry.id, state);
    this.report('metadata source', `${entry.name} [${state.is_valid}]`, entry, state, verdict.error);
    return verdict.settle();
  }

  private async probe(
    entry: MetadataSourceEntry,
    verdict: Verdict,
    method: 'get' | 'head',
    url: string | null
  ): Promise<void> {
    if (!url) {
      verdict.fail(new ValidationError('SourceUnreachable', `Endpoint is not reachable: no URL configured`));
      return;
    }
    try {
      const { status } = await this.deps.http[method](url);
      if (status !== 200) {
        logger.error('Metadata endpoint query failed', { source: entry.name, url, status });
        verdict.fail(new ValidationError('SourceUnreachable', `Endpoint answered with HTTP ${status}`));
      }
    } catch (e) {
      verdict.fail(new ValidationError('SourceUnreachable', `Endpoint is not reachable: ${describeError(e)}`));
    }
  }

  private async checkLocal(entry: MetadataSourceEntry, verdict: Verdict): Promise<void> {
    try {
      if (entry.file) {
        parseXml(await this.deps.storage.read(entry.file));
      }
      if (entry.url) {
        const names = await fs.readdir(entry.url);
        for (const name of names) {
          parseXml(await fs.readFile(path.join(entry.url, name), 'utf8'));
        }
      }
    } catch (e) {
      verdict.fail(new ValidationError('MalformedXML', `found an invalid XML: ${describeError(e)}`));
    }

    if (!entry.url && !entry.file) {
      verdict.fail(new ValidationError('EmptySource', 'Empty file or url for "local" type. Metadata is not valid'));
    }
  }

  private report(
    what: string,
    label: string,
    before: ValidityState,
    after: ValidityState,
    error: ValidationError | null
  ): void {
    if (error) {
      logger.warn(`Invalid ${what}`, { entry: label, kind: error.kind, err: error.message });
    }
    if (before.is_valid !== after.is_valid || before.is_active !== after.is_active) {
      logger.audit(`${what} validity changed`, {
        entry: label,
        from: { is_valid: before.is_valid, is_active: before.is_active },
        to: after
      });
    }
  }
}
