import { Schema, model, models, type InferSchemaType, type Model } from 'mongoose';

const pageStructureSchema = new Schema(
  {
    related_classes: { type: [String], default: [] },
    element_present: { type: Boolean, default: false },
    class_frequency: { type: Schema.Types.Mixed, default: {} },
    selector_pattern: { type: String }
  },
  { _id: false }
);

const errorReportSchema = new Schema(
  {
    analysis_id: { type: String, index: true },
    source_ref: { type: String },
    field_name: { type: String, required: true, index: true },
    issue_type: {
      type: String,
      enum: ['mismatch', 'missing', 'incorrect-format', 'other'],
      required: true
    },
    severity: { type: String, enum: ['low', 'medium', 'high'], default: 'medium' },
    description: { type: String },
    crawler_value: { type: String },
    report_value: { type: String },
    page_structure: { type: pageStructureSchema },
    status: { type: String, enum: ['pending', 'reviewed', 'resolved'], default: 'pending', index: true },
    resolved_at: { type: Date }
  },
  { timestamps: true }
);

errorReportSchema.index({ createdAt: -1 });

export type ErrorReportDocument = InferSchemaType<typeof errorReportSchema>;

export const ErrorReportModel: Model<ErrorReportDocument> =
  models.ErrorReport || model<ErrorReportDocument>('ErrorReport', errorReportSchema);
