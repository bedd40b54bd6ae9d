import mongoose, { InferSchemaType, Schema, Types } from 'mongoose';

const PersistentIdSchema = new Schema(
  {
    sp_id: { type: Schema.Types.ObjectId, ref: 'ServiceProvider', required: true },
    user_id: { type: String, required: true },
    persistent_id: { type: String, required: true },
    created: { type: Date, default: Date.now }
  },
  { collection: 'persistent_ids' }
);

PersistentIdSchema.index({ sp_id: 1, persistent_id: 1 }, { unique: true, name: 'unique_ids_per_sp' });
PersistentIdSchema.index({ sp_id: 1, user_id: 1 }, { unique: true, name: 'unique_users_per_sp' });

export type PersistentIdDocument = InferSchemaType<typeof PersistentIdSchema> & { _id: Types.ObjectId };

export default mongoose.model('PersistentId', PersistentIdSchema);
