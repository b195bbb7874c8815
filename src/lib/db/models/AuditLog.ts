import { Schema, model, models, type InferSchemaType, type Model } from 'mongoose';

const auditLogSchema = new Schema(
  {
    job_id: { type: String, index: true },
    action: { type: String, required: true },
    entity: { type: String, required: true },
    entity_id: { type: String },
    payload: { type: Schema.Types.Mixed }
  },
  { timestamps: true }
);

export type AuditLogDocument = InferSchemaType<typeof auditLogSchema>;

export const AuditLog: Model<AuditLogDocument> = models.AuditLog || model<AuditLogDocument>('AuditLog', auditLogSchema);
