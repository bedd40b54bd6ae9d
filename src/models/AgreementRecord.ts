import mongoose, { InferSchemaType, Schema, Types } from 'mongoose';

const AgreementRecordSchema = new Schema(
  {
    user_id: { type: String, required: true },
    // entity id as it was at consent time, not a reference
    sp_entity_id: { type: String, required: true },
    attrs: { type: String, default: '' },
    created: { type: Date, default: Date.now }
  },
  { collection: 'agreement_records' }
);

AgreementRecordSchema.index({ user_id: 1, sp_entity_id: 1, created: -1 });

export type AgreementRecordDocument = InferSchemaType<typeof AgreementRecordSchema> & { _id: Types.ObjectId };

export default mongoose.model('AgreementRecord', AgreementRecordSchema);
