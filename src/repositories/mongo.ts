import mongoose from 'mongoose';
import ServiceProviderModel, { ServiceProviderDocument } from '../models/ServiceProvider';
import MetadataStoreModel, { MetadataStoreDocument } from '../models/MetadataStore';
import AgreementRecordModel, { AgreementRecordDocument } from '../models/AgreementRecord';
import PersistentIdModel, { PersistentIdDocument } from '../models/PersistentId';
import { AllocationConflictError, StorageError } from '../lib/errors';
import { isMetadataSourceKind } from '../lib/constants';
import {
  AgreementRecord,
  MetadataSourceEntry,
  PersistentIdentifier,
  ServiceProviderEntry
} from '../types';
import {
  AgreementRecordRepository,
  MetadataSourceRepository,
  PersistentIdRepository,
  Repositories,
  ServiceProviderRepository
} from './interfaces';

const DUPLICATE_KEY = 11000;

function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === DUPLICATE_KEY;
}

function toServiceProvider(doc: ServiceProviderDocument): ServiceProviderEntry {
  return {
    id: doc._id.toString(),
    entity_id: doc.entity_id,
    display_name: doc.display_name,
    metadata_url: doc.metadata_url ?? '',
    description: doc.description ?? '',
    agreement_screen: Boolean(doc.agreement_screen),
    agreement_consent_form: Boolean(doc.agreement_consent_form),
    agreement_message: doc.agreement_message ?? '',
    signing_algorithm: String(doc.signing_algorithm),
    digest_algorithm: String(doc.digest_algorithm),
    disable_encrypted_assertions: Boolean(doc.disable_encrypted_assertions),
    attribute_processor: doc.attribute_processor ?? '',
    attribute_mapping: doc.attribute_mapping ?? null,
    force_attribute_release: Boolean(doc.force_attribute_release),
    is_valid: Boolean(doc.is_valid),
    is_active: Boolean(doc.is_active),
    created: doc.created,
    updated: doc.updated,
    last_seen: doc.last_seen ?? null
  };
}

function toMetadataSource(doc: MetadataStoreDocument): MetadataSourceEntry {
  if (!isMetadataSourceKind(doc.type)) {
    throw new StorageError(`metadata store ${doc._id.toString()} has unknown type "${String(doc.type)}"`);
  }
  return {
    id: doc._id.toString(),
    name: doc.name,
    type: doc.type,
    url: doc.url ?? null,
    file: doc.file ?? null,
    kwargs: doc.kwargs ?? '{}',
    is_valid: Boolean(doc.is_valid),
    is_active: Boolean(doc.is_active),
    created: doc.created,
    updated: doc.updated
  };
}

function toAgreementRecord(doc: AgreementRecordDocument): AgreementRecord {
  return {
    id: doc._id.toString(),
    user_id: doc.user_id,
    sp_entity_id: doc.sp_entity_id,
    attrs: doc.attrs ?? '',
    created: doc.created
  };
}

function toPersistentId(doc: PersistentIdDocument): PersistentIdentifier {
  return {
    id: doc._id.toString(),
    sp_id: doc.sp_id.toString(),
    user_id: doc.user_id,
    persistent_id: doc.persistent_id,
    created: doc.created
  };
}

export const serviceProviderRepository: ServiceProviderRepository = {
  async list() {
    const docs = await ServiceProviderModel.find().sort({ entity_id: 1 }).lean<ServiceProviderDocument[]>();
    return docs.map(toServiceProvider);
  },

  async listActive() {
    const docs = await ServiceProviderModel.find({ is_active: true })
      .sort({ entity_id: 1 })
      .lean<ServiceProviderDocument[]>();
    return docs.map(toServiceProvider);
  },

  async findById(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await ServiceProviderModel.findById(id).lean<ServiceProviderDocument>();
    return doc ? toServiceProvider(doc) : null;
  },

  async findByEntityId(entityId) {
    const doc = await ServiceProviderModel.findOne({ entity_id: entityId }).lean<ServiceProviderDocument>();
    return doc ? toServiceProvider(doc) : null;
  },

  async create(input) {
    const doc = await ServiceProviderModel.create({ ...input, is_valid: false, is_active: false });
    return toServiceProvider(doc.toObject<ServiceProviderDocument>());
  },

  async update(id, patch) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await ServiceProviderModel.findByIdAndUpdate(
      id,
      { ...patch, updated: new Date() },
      { new: true, runValidators: true }
    ).lean<ServiceProviderDocument>();
    return doc ? toServiceProvider(doc) : null;
  },

  async saveValidity(id, state) {
    await ServiceProviderModel.updateOne(
      { _id: id },
      { $set: { is_valid: state.is_valid, is_active: state.is_active, updated: new Date() } }
    );
  },

  async touchLastSeen(id, at) {
    await ServiceProviderModel.updateOne({ _id: id }, { $set: { last_seen: at } });
  },

  async delete(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await ServiceProviderModel.findByIdAndDelete(id).lean<ServiceProviderDocument>();
    return doc ? toServiceProvider(doc) : null;
  }
};

export const metadataSourceRepository: MetadataSourceRepository = {
  async list() {
    const docs = await MetadataStoreModel.find().sort({ name: 1 }).lean<MetadataStoreDocument[]>();
    return docs.map(toMetadataSource);
  },

  async listActive() {
    const docs = await MetadataStoreModel.find({ is_active: true, is_valid: true })
      .sort({ name: 1 })
      .lean<MetadataStoreDocument[]>();
    return docs.map(toMetadataSource);
  },

  async findById(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await MetadataStoreModel.findById(id).lean<MetadataStoreDocument>();
    return doc ? toMetadataSource(doc) : null;
  },

  async create(input) {
    const doc = await MetadataStoreModel.create({ ...input, is_valid: false, is_active: false });
    return toMetadataSource(doc.toObject<MetadataStoreDocument>());
  },

  async update(id, patch) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await MetadataStoreModel.findByIdAndUpdate(
      id,
      { ...patch, updated: new Date() },
      { new: true, runValidators: true }
    ).lean<MetadataStoreDocument>();
    return doc ? toMetadataSource(doc) : null;
  },

  async saveValidity(id, state) {
    await MetadataStoreModel.updateOne(
      { _id: id },
      { $set: { is_valid: state.is_valid, is_active: state.is_active, updated: new Date() } }
    );
  },

  async delete(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await MetadataStoreModel.findByIdAndDelete(id).lean<MetadataStoreDocument>();
    return doc ? toMetadataSource(doc) : null;
  }
};

export const agreementRecordRepository: AgreementRecordRepository = {
  async findLatest(userId, spEntityId) {
    const doc = await AgreementRecordModel.findOne({ user_id: userId, sp_entity_id: spEntityId })
      .sort({ created: -1 })
      .lean<AgreementRecordDocument>();
    return doc ? toAgreementRecord(doc) : null;
  },

  async append(userId, spEntityId, attrs) {
    const doc = await AgreementRecordModel.create({ user_id: userId, sp_entity_id: spEntityId, attrs });
    return toAgreementRecord(doc.toObject<AgreementRecordDocument>());
  },

  async deleteByUser(userId) {
    const res = await AgreementRecordModel.deleteMany({ user_id: userId });
    return res.deletedCount;
  },

  async deleteBySpEntityId(spEntityId) {
    const res = await AgreementRecordModel.deleteMany({ sp_entity_id: spEntityId });
    return res.deletedCount;
  }
};

export const persistentIdRepository: PersistentIdRepository = {
  async find(spId, userId) {
    if (!mongoose.isValidObjectId(spId)) return null;
    const doc = await PersistentIdModel.findOne({ sp_id: spId, user_id: userId }).lean<PersistentIdDocument>();
    return doc ? toPersistentId(doc) : null;
  },

  async insert(spId, userId, persistentId) {
    try {
      const doc = await PersistentIdModel.create({ sp_id: spId, user_id: userId, persistent_id: persistentId });
      return toPersistentId(doc.toObject<PersistentIdDocument>());
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new AllocationConflictError();
      }
      throw err;
    }
  },

  async deleteByUser(userId) {
    const res = await PersistentIdModel.deleteMany({ user_id: userId });
    return res.deletedCount;
  },

  async deleteBySp(spId) {
    if (!mongoose.isValidObjectId(spId)) return 0;
    const res = await PersistentIdModel.deleteMany({ sp_id: spId });
    return res.deletedCount;
  }
};

export const mongoRepositories: Repositories = {
  serviceProviders: serviceProviderRepository,
  metadataSources: metadataSourceRepository,
  agreements: agreementRecordRepository,
  persistentIds: persistentIdRepository
};
