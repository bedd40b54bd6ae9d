import mongoose, { InferSchemaType, Schema, Types } from 'mongoose';
import {
  DEFAULT_ATTRIBUTE_MAPPING,
  DEFAULT_DIGEST_ALGORITHM,
  DEFAULT_PROCESSOR,
  DEFAULT_SIGNING_ALGORITHM,
  DIGEST_ALGORITHMS,
  SIGNING_ALGORITHMS
} from '../lib/constants';
import { serializeAttributeMapping } from '../lib/mapping';

const ServiceProviderSchema = new Schema(
  {
    entity_id: { type: String, required: true, unique: true, maxlength: 254 },
    display_name: { type: String, required: true, maxlength: 254 },
    metadata_url: { type: String, default: '' },
    description: { type: String, default: '' },
    agreement_screen: { type: Boolean, default: false },
    agreement_consent_form: { type: Boolean, default: false },
    agreement_message: { type: String, default: '' },
    signing_algorithm: { type: String, enum: SIGNING_ALGORITHMS, default: DEFAULT_SIGNING_ALGORITHM },
    digest_algorithm: { type: String, enum: DIGEST_ALGORITHMS, default: DEFAULT_DIGEST_ALGORITHM },
    disable_encrypted_assertions: { type: Boolean, default: true },
    attribute_processor: { type: String, default: DEFAULT_PROCESSOR, maxlength: 256 },
    attribute_mapping: { type: String, default: serializeAttributeMapping(DEFAULT_ATTRIBUTE_MAPPING) },
    force_attribute_release: { type: Boolean, default: false },
    is_valid: { type: Boolean, default: false },
    is_active: { type: Boolean, default: false },
    created: { type: Date, default: Date.now },
    updated: { type: Date, default: Date.now },
    last_seen: { type: Date, default: null }
  },
  { collection: 'service_providers' }
);

export type ServiceProviderDocument = InferSchemaType<typeof ServiceProviderSchema> & { _id: Types.ObjectId };

export default mongoose.model('ServiceProvider', ServiceProviderSchema);
