import { Types } from 'mongoose';
import { StaleStageError, NotFoundError } from '@/lib/errors';
import { nextStage } from '@/lib/pipeline/stages';
import {
  OUTPUT_TYPE_BY_STAGE,
  type AnalysisJob,
  type AnalysisKind,
  type FinalResult,
  type StageName,
  type StageOutput,
  type StageOutputMap,
  type StageOutputs,
  type TerminalOutcome
} from '@/lib/pipeline/types';

/**
 * Single source of truth for analysis jobs.
 *
 * Only the pipeline runner writes, one writer per job. `commitStage` is the
 * only path that advances progress and refuses anything but the immediate
 * successor of the job's current stage.
 */
export interface JobStore {
  create(sourceRef: string, kind: AnalysisKind, stages: StageName[]): Promise<AnalysisJob>;
  get(jobId: string): Promise<AnalysisJob | null>;
  start(jobId: string): Promise<void>;
  commitStage<S extends StageName>(
    jobId: string,
    stage: S,
    output: StageOutputMap[S],
    percentage: number
  ): Promise<void>;
  fail(jobId: string, error: string): Promise<TerminalOutcome>;
  complete(jobId: string, result: FinalResult): Promise<TerminalOutcome>;
}

export function isTerminal(job: Pick<AnalysisJob, 'status'>): boolean {
  return job.status === 'completed' || job.status === 'failed';
}

export function existingOutcome(job: AnalysisJob): TerminalOutcome {
  return {
    status: job.status === 'completed' ? 'completed' : 'failed',
    transitioned: false,
    error: job.error
  };
}

export function assertPercentage(percentage: number) {
  if (!Number.isInteger(percentage) || percentage < 0 || percentage > 100) {
    throw new RangeError(`Progress percentage must be an integer in [0, 100], got ${percentage}`);
  }
}

/**
 * Checks a commit against a job snapshot without touching it. Throws
 * StaleStageError when the stage is out of order, the job is terminal, or
 * the output is tagged for another stage.
 */
export function assertCommittable<S extends StageName>(job: AnalysisJob, stage: S, output: StageOutputMap[S]) {
  const expected = isTerminal(job) ? null : nextStage(job.stages, job.progress.stage);
  if (expected !== stage) {
    throw new StaleStageError(job.id, stage, isTerminal(job) ? job.status : job.progress.stage);
  }
  const tagged: StageOutput = output;
  if (tagged.type !== OUTPUT_TYPE_BY_STAGE[stage]) {
    throw new StaleStageError(job.id, `${stage} (output ${tagged.type})`, job.progress.stage);
  }
}

export function assertCompletable(job: AnalysisJob) {
  const last = job.stages[job.stages.length - 1];
  if (job.progress.stage !== last) {
    throw new StaleStageError(job.id, 'completed', job.progress.stage);
  }
}

export function withOutput<S extends StageName>(
  outputs: StageOutputs,
  stage: S,
  output: StageOutputMap[S]
): StageOutputs {
  const next: StageOutputs = { ...outputs };
  next[stage] = output;
  return next;
}

export function newJobId(): string {
  return new Types.ObjectId().toString();
}

/**
 * Process-local store. Every write swaps in a fresh snapshot and readers get
 * deep copies, so a poller never observes a half-applied commit.
 */
export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, AnalysisJob>();

  constructor(private now: () => Date = () => new Date()) {}

  async create(sourceRef: string, kind: AnalysisKind, stages: StageName[]): Promise<AnalysisJob> {
    if (stages.length === 0) {
      throw new RangeError('A job needs at least one stage');
    }
    const at = this.now();
    const job: AnalysisJob = {
      id: newJobId(),
      sourceRef,
      kind,
      status: 'queued',
      stages: [...stages],
      progress: { stage: 'queued', percentage: 0 },
      stageOutputs: {},
      createdAt: at,
      updatedAt: at
    };
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  async get(jobId: string): Promise<AnalysisJob | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async start(jobId: string): Promise<void> {
    const job = this.require(jobId);
    if (job.status !== 'queued') return;
    this.jobs.set(jobId, { ...job, status: 'running', updatedAt: this.now() });
  }

  async commitStage<S extends StageName>(
    jobId: string,
    stage: S,
    output: StageOutputMap[S],
    percentage: number
  ): Promise<void> {
    assertPercentage(percentage);
    const job = this.require(jobId);
    assertCommittable(job, stage, output);

    const stored = structuredClone(output);
    const next: AnalysisJob = {
      ...job,
      status: 'running',
      progress: { stage, percentage: Math.max(job.progress.percentage, percentage) },
      stageOutputs: withOutput(job.stageOutputs, stage, stored),
      updatedAt: this.now()
    };
    const tagged: StageOutput = stored;
    if (tagged.type === 'validation') {
      next.validation = tagged.report;
    }
    this.jobs.set(jobId, next);
  }

  async fail(jobId: string, error: string): Promise<TerminalOutcome> {
    const job = this.require(jobId);
    if (isTerminal(job)) return existingOutcome(job);

    this.jobs.set(jobId, { ...job, status: 'failed', error, updatedAt: this.now() });
    return { status: 'failed', transitioned: true, error };
  }

  async complete(jobId: string, result: FinalResult): Promise<TerminalOutcome> {
    const job = this.require(jobId);
    if (isTerminal(job)) return existingOutcome(job);
    assertCompletable(job);

    this.jobs.set(jobId, {
      ...job,
      status: 'completed',
      progress: { stage: 'completed', percentage: 100 },
      result: structuredClone(result),
      updatedAt: this.now()
    });
    return { status: 'completed', transitioned: true };
  }

  private require(jobId: string): AnalysisJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError('Analysis', jobId);
    return job;
  }
}
