import { Schema, model, models, type InferSchemaType, type Model } from 'mongoose';

const STAGES = ['crawling', 'analyzing', 'evaluating-checklist', 'validating'];

const analysisJobSchema = new Schema(
  {
    source_ref: { type: String, required: true, index: true },
    kind: { type: String, enum: ['single-item', 'collection'], required: true },
    status: {
      type: String,
      enum: ['queued', 'running', 'completed', 'failed'],
      default: 'queued',
      index: true
    },
    stages: { type: [{ type: String, enum: STAGES }], required: true },
    progress: {
      stage: { type: String, enum: ['queued', ...STAGES, 'completed'], default: 'queued' },
      percentage: { type: Number, min: 0, max: 100, default: 0 }
    },
    stage_outputs: { type: Schema.Types.Mixed, default: {} },
    validation: { type: Schema.Types.Mixed },
    result: { type: Schema.Types.Mixed },
    error: { type: String }
  },
  { timestamps: true, minimize: false }
);

export type AnalysisJobDocument = InferSchemaType<typeof analysisJobSchema>;

export const AnalysisJobModel: Model<AnalysisJobDocument> =
  models.AnalysisJob || model<AnalysisJobDocument>('AnalysisJob', analysisJobSchema);
