import mongoose, { InferSchemaType, Schema, Types } from 'mongoose';
import { METADATA_SOURCE_KINDS } from '../lib/constants';

const MetadataStoreSchema = new Schema(
  {
    name: { type: String, required: true, maxlength: 256 },
    // remote/mdq endpoint, or a directory of metadata files for local
    url: { type: String, default: null },
    // certificate for remote/mdq, XML document for local
    file: { type: String, default: null },
    type: { type: String, enum: [...METADATA_SOURCE_KINDS], required: true },
    kwargs: { type: String, default: '{}' },
    is_valid: { type: Boolean, default: false },
    is_active: { type: Boolean, default: false },
    created: { type: Date, default: Date.now },
    updated: { type: Date, default: Date.now }
  },
  { collection: 'metadata_stores' }
);

export type MetadataStoreDocument = InferSchemaType<typeof MetadataStoreSchema> & { _id: Types.ObjectId };

export default mongoose.model('MetadataStore', MetadataStoreSchema);
