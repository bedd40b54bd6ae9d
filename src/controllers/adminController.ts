import { Request, Response, NextFunction } from 'express';
import { Services } from '../services';
import { ValidationOutcome } from '../services/validationEngine';
import { HttpError } from '../lib/errors';
import { isMetadataSourceKind } from '../lib/constants';
import { MetadataSourceInput, ServiceProviderInput } from '../types';

type Body = Record<string, unknown>;

const SP_TEXT_FIELDS = [
  'entity_id',
  'display_name',
  'metadata_url',
  'description',
  'agreement_message',
  'signing_algorithm',
  'digest_algorithm',
  'attribute_processor'
] as const;

const SP_FLAG_FIELDS = [
  'agreement_screen',
  'agreement_consent_form',
  'disable_encrypted_assertions',
  'force_attribute_release',
  'is_active'
] as const;

function readServiceProviderPatch(body: Body): Partial<ServiceProviderInput> {
  const patch: Partial<ServiceProviderInput> = {};
  for (const key of SP_TEXT_FIELDS) {
    const value = body[key];
    if (typeof value === 'string') patch[key] = value;
  }
  for (const key of SP_FLAG_FIELDS) {
    const value = body[key];
    if (typeof value === 'boolean') patch[key] = value;
  }
  const mapping = body.attribute_mapping;
  if (typeof mapping === 'string' || mapping === null) patch.attribute_mapping = mapping;
  return patch;
}

function readMetadataStorePatch(body: Body): Partial<MetadataSourceInput> {
  const patch: Partial<MetadataSourceInput> = {};
  if (typeof body.name === 'string') patch.name = body.name;
  if (isMetadataSourceKind(body.type)) patch.type = body.type;
  for (const key of ['url', 'file'] as const) {
    const value = body[key];
    if (typeof value === 'string') patch[key] = value === '' ? null : value;
    else if (value === null) patch[key] = null;
  }
  if (typeof body.kwargs === 'string') patch.kwargs = body.kwargs;
  if (typeof body.is_active === 'boolean') patch.is_active = body.is_active;
  return patch;
}

function describeOutcome(outcome: ValidationOutcome) {
  if (outcome.ok) {
    return { ...outcome.value };
  }
  return { error: outcome.error.message, kind: outcome.error.kind, is_valid: false, is_active: false };
}

function sendOutcome(res: Response, outcome: ValidationOutcome) {
  res.status(outcome.ok ? 200 : 422).json(describeOutcome(outcome));
}

export function createAdminController(services: Services) {
  return {
    async listServiceProviders(_req: Request, res: Response, next: NextFunction) {
      try {
        res.json(await services.serviceProviders.list());
      } catch (err) {
        next(err);
      }
    },

    async getServiceProvider(req: Request, res: Response, next: NextFunction) {
      try {
        res.json(await services.serviceProviders.get(req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async createServiceProvider(req: Request, res: Response, next: NextFunction) {
      try {
        const patch = readServiceProviderPatch(req.body);
        const { entity_id, display_name } = patch;
        if (!entity_id || !display_name) {
          throw new HttpError(400, 'entity_id and display_name are required');
        }
        res.status(201).json(await services.serviceProviders.create({ ...patch, entity_id, display_name }));
      } catch (err) {
        next(err);
      }
    },

    async updateServiceProvider(req: Request, res: Response, next: NextFunction) {
      try {
        const saved = await services.serviceProviders.update(req.params.id, readServiceProviderPatch(req.body));
        res.json({ ...saved.entry, validation: describeOutcome(saved.validation) });
      } catch (err) {
        next(err);
      }
    },

    async validateServiceProvider(req: Request, res: Response, next: NextFunction) {
      try {
        sendOutcome(res, await services.serviceProviders.validate(req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async deleteServiceProvider(req: Request, res: Response, next: NextFunction) {
      try {
        await services.serviceProviders.remove(req.params.id);
        res.status(204).send();
      } catch (err) {
        next(err);
      }
    },

    async listMetadataStores(_req: Request, res: Response, next: NextFunction) {
      try {
        res.json(await services.metadataStores.list());
      } catch (err) {
        next(err);
      }
    },

    async getMetadataStore(req: Request, res: Response, next: NextFunction) {
      try {
        res.json(await services.metadataStores.get(req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async createMetadataStore(req: Request, res: Response, next: NextFunction) {
      try {
        const patch = readMetadataStorePatch(req.body);
        const { name, type } = patch;
        if (!name || !type) {
          throw new HttpError(400, 'name and type are required');
        }
        res.status(201).json(await services.metadataStores.create({ ...patch, name, type }));
      } catch (err) {
        next(err);
      }
    },

    async updateMetadataStore(req: Request, res: Response, next: NextFunction) {
      try {
        const saved = await services.metadataStores.update(req.params.id, readMetadataStorePatch(req.body));
        res.json({ ...saved.entry, validation: describeOutcome(saved.validation) });
      } catch (err) {
        next(err);
      }
    },

    async validateMetadataStore(req: Request, res: Response, next: NextFunction) {
      try {
        sendOutcome(res, await services.metadataStores.validate(req.params.id));
      } catch (err) {
        next(err);
      }
    },

    async deleteMetadataStore(req: Request, res: Response, next: NextFunction) {
      try {
        await services.metadataStores.remove(req.params.id);
        res.status(204).send();
      } catch (err) {
        next(err);
      }
    },

    async serviceProviderSnapshot(_req: Request, res: Response, next: NextFunction) {
      try {
        res.json(await services.trustRegistry.activeConfiguration());
      } catch (err) {
        next(err);
      }
    },

    async metadataSourceSnapshot(_req: Request, res: Response, next: NextFunction) {
      try {
        res.json(await services.metadataAggregator.activeSources());
      } catch (err) {
        next(err);
      }
    },

    async forgetUser(req: Request, res: Response, next: NextFunction) {
      try {
        res.json(await services.users.forgetUser(req.params.userId));
      } catch (err) {
        next(err);
      }
    }
  };
}

export type AdminController = ReturnType<typeof createAdminController>;
