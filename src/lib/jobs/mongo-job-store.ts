import { Types } from 'mongoose';
import { NotFoundError, StaleStageError } from '@/lib/errors';
import { AnalysisJobModel } from '@/lib/db/models';
import type {
  AnalysisJob,
  AnalysisKind,
  FinalResult,
  JobStatus,
  ProgressStage,
  StageName,
  StageOutput,
  StageOutputMap,
  StageOutputs,
  TerminalOutcome,
  ValidationReport
} from '@/lib/pipeline/types';
import {
  assertCommittable,
  assertCompletable,
  assertPercentage,
  existingOutcome,
  isTerminal,
  type JobStore
} from './job-store';

type JobRecord = {
  _id: Types.ObjectId;
  source_ref: string;
  kind: AnalysisKind;
  status: JobStatus;
  stages: StageName[];
  progress: { stage: ProgressStage; percentage: number };
  stage_outputs?: StageOutputs;
  validation?: ValidationReport | null;
  result?: FinalResult | null;
  error?: string | null;
  createdAt: Date;
  updatedAt: Date;
};

const ACTIVE: JobStatus[] = ['queued', 'running'];

function toJob(record: JobRecord): AnalysisJob {
  return {
    id: record._id.toString(),
    sourceRef: record.source_ref,
    kind: record.kind,
    status: record.status,
    stages: record.stages,
    progress: { stage: record.progress.stage, percentage: record.progress.percentage },
    stageOutputs: record.stage_outputs ?? {},
    validation: record.validation ?? undefined,
    result: record.result ?? undefined,
    error: record.error ?? undefined,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt
  };
}

/**
 * Mongo-backed store. Every transition is one conditional update on the job
 * document, guarded on the status and stage it was decided against, so a
 * commit either lands whole or not at all.
 */
export class MongoJobStore implements JobStore {
  async create(sourceRef: string, kind: AnalysisKind, stages: StageName[]): Promise<AnalysisJob> {
    if (stages.length === 0) {
      throw new RangeError('A job needs at least one stage');
    }
    const doc = await AnalysisJobModel.create({
      source_ref: sourceRef,
      kind,
      status: 'queued',
      stages,
      progress: { stage: 'queued', percentage: 0 },
      stage_outputs: {}
    });
    return toJob(doc.toObject<JobRecord>());
  }

  async get(jobId: string): Promise<AnalysisJob | null> {
    if (!Types.ObjectId.isValid(jobId)) return null;
    const record = await AnalysisJobModel.findById(jobId).lean<JobRecord | null>();
    return record ? toJob(record) : null;
  }

  async start(jobId: string): Promise<void> {
    await this.require(jobId);
    await AnalysisJobModel.updateOne({ _id: jobId, status: 'queued' }, { $set: { status: 'running' } });
  }

  async commitStage<S extends StageName>(
    jobId: string,
    stage: S,
    output: StageOutputMap[S],
    percentage: number
  ): Promise<void> {
    assertPercentage(percentage);
    const job = await this.require(jobId);
    assertCommittable(job, stage, output);

    const tagged: StageOutput = output;
    const set: Record<string, unknown> = {
      status: 'running',
      'progress.stage': stage,
      [`stage_outputs.${stage}`]: output
    };
    if (tagged.type === 'validation') {
      set.validation = tagged.report;
    }

    const updated = await AnalysisJobModel.findOneAndUpdate(
      { _id: jobId, status: { $in: ACTIVE }, 'progress.stage': job.progress.stage },
      { $set: set, $max: { 'progress.percentage': percentage } },
      { new: true }
    ).lean<JobRecord | null>();

    if (!updated) {
      const current = await this.require(jobId);
      throw new StaleStageError(jobId, stage, isTerminal(current) ? current.status : current.progress.stage);
    }
  }

  async fail(jobId: string, error: string): Promise<TerminalOutcome> {
    if (!Types.ObjectId.isValid(jobId)) throw new NotFoundError('Analysis', jobId);
    const updated = await AnalysisJobModel.findOneAndUpdate(
      { _id: jobId, status: { $in: ACTIVE } },
      { $set: { status: 'failed', error } },
      { new: true }
    ).lean<JobRecord | null>();

    if (updated) return { status: 'failed', transitioned: true, error };
    return existingOutcome(await this.require(jobId));
  }

  async complete(jobId: string, result: FinalResult): Promise<TerminalOutcome> {
    const job = await this.require(jobId);
    if (isTerminal(job)) return existingOutcome(job);
    assertCompletable(job);

    const updated = await AnalysisJobModel.findOneAndUpdate(
      { _id: jobId, status: { $in: ACTIVE }, 'progress.stage': job.progress.stage },
      { $set: { status: 'completed', 'progress.stage': 'completed', 'progress.percentage': 100, result } },
      { new: true }
    ).lean<JobRecord | null>();

    if (updated) return { status: 'completed', transitioned: true };
    const current = await this.require(jobId);
    if (isTerminal(current)) return existingOutcome(current);
    throw new StaleStageError(jobId, 'completed', current.progress.stage);
  }

  private async require(jobId: string): Promise<AnalysisJob> {
    const job = await this.get(jobId);
    if (!job) throw new NotFoundError('Analysis', jobId);
    return job;
  }
}
