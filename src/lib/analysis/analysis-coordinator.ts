import { CancelledFailure, errorMessage, NotFoundError, NotReadyError, SubmissionError } from '@/lib/errors';
import type { CancellationRegistry } from '@/lib/jobs/cancellation';
import { isTerminal, type JobStore } from '@/lib/jobs/job-store';
import { planStages } from '@/lib/pipeline/stages';
import type { AnalysisJob, AnalysisKind, FinalResult, JobProgress, JobStatus, ValidationReport } from '@/lib/pipeline/types';
import type { AnalysisQueue } from '@/lib/queue/analysis-queue';
import type { AuditEmitter } from '@/lib/side-channel';
import { DOWNLOAD_FORMATS, isDownloadFormat, renderDownload, type DownloadArtifact } from './export';
import { validateSubmission } from './submission';

export type SubmitResult = {
  jobId: string;
  status: 'queued' | 'running';
  kindDetected: AnalysisKind;
};

export type PollView = {
  jobId: string;
  sourceRef: string;
  kind: AnalysisKind;
  status: JobStatus;
  progress: JobProgress;
  result?: FinalResult;
  validation?: ValidationReport;
  error?: string;
};

export type ProgressSnapshot = {
  status: JobStatus;
  progress: JobProgress;
  error?: string;
};

export type CancelResult = {
  jobId: string;
  status: JobStatus;
  cancelled: boolean;
};

export type CoordinatorDeps = {
  store: JobStore;
  queue: AnalysisQueue;
  cancellations: CancellationRegistry;
  audit: AuditEmitter;
  allowedSourceHosts: string[];
  validateCollections: boolean;
};

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/** The request-facing side of analysis jobs. Only the pipeline runner writes to a job after submission. */
export class AnalysisCoordinator {
  constructor(private deps: CoordinatorDeps) {}

  async submit(input: unknown): Promise<SubmitResult> {
    const { sourceRef, kind } = validateSubmission(input, this.deps.allowedSourceHosts);
    const stages = planStages(kind, { validateCollections: this.deps.validateCollections });
    const job = await this.deps.store.create(sourceRef, kind, stages);

    this.deps.audit({
      jobId: job.id,
      action: 'JOB_CREATED',
      entity: 'AnalysisJob',
      entityId: job.id,
      payload: { sourceRef, kind, stages }
    });

    try {
      await this.deps.queue.enqueue(job.id);
    } catch (error) {
      await this.deps.store.fail(job.id, `Queue dispatch failed: ${errorMessage(error)}`);
      throw error;
    }

    return { jobId: job.id, status: 'queued', kindDetected: kind };
  }

  async poll(jobId: string): Promise<PollView> {
    const job = await this.require(jobId);
    const view: PollView = {
      jobId: job.id,
      sourceRef: job.sourceRef,
      kind: job.kind,
      status: job.status,
      progress: job.progress
    };
    if (job.status === 'completed') {
      if (job.result) view.result = job.result;
      if (job.validation) view.validation = job.validation;
    }
    if (job.status === 'failed' && job.error !== undefined) {
      view.error = job.error;
    }
    return view;
  }

  async download(jobId: string, format: string): Promise<DownloadArtifact> {
    const normalized = format.toLowerCase();
    if (!isDownloadFormat(normalized)) {
      throw new SubmissionError(`Unsupported download format ${format}; use one of ${DOWNLOAD_FORMATS.join(', ')}`);
    }
    const job = await this.require(jobId);
    if (job.status !== 'completed' || !job.result) {
      throw new NotReadyError(jobId, job.status);
    }
    return renderDownload(job, job.result, normalized);
  }

  /**
   * A job running in this process stops before its next stage. A queued job
   * fails at once; its worker finds it terminal and skips it.
   */
  async cancel(jobId: string): Promise<CancelResult> {
    const job = await this.require(jobId);
    if (isTerminal(job)) {
      return { jobId, status: job.status, cancelled: false };
    }

    if (this.deps.cancellations.cancel(jobId)) {
      console.log(`[Pipeline ${jobId}] Cancellation requested`);
      return { jobId, status: job.status, cancelled: true };
    }

    if (job.status === 'queued') {
      const outcome = await this.deps.store.fail(jobId, new CancelledFailure().message);
      if (outcome.transitioned) {
        console.log(`[Pipeline ${jobId}] Cancelled while queued`);
        this.deps.audit({ jobId, action: 'JOB_CANCELLED', entity: 'AnalysisJob', entityId: jobId });
      }
      return { jobId, status: outcome.status, cancelled: outcome.transitioned };
    }

    // Running in another worker process; no signal reaches it from here.
    return { jobId, status: job.status, cancelled: false };
  }

  /**
   * Yields the job's status each time it changes, ending after the first
   * terminal snapshot or when `signal` aborts.
   */
  async *watch(jobId: string, opts: { intervalMs: number; signal?: AbortSignal }): AsyncGenerator<ProgressSnapshot> {
    let last = '';
    while (!opts.signal?.aborted) {
      const job = await this.require(jobId);
      const snapshot: ProgressSnapshot = { status: job.status, progress: job.progress };
      if (job.error !== undefined) snapshot.error = job.error;

      const key = JSON.stringify(snapshot);
      if (key !== last) {
        last = key;
        yield snapshot;
      }
      if (isTerminal(job)) return;
      await delay(opts.intervalMs, opts.signal);
    }
  }

  private async require(jobId: string): Promise<AnalysisJob> {
    const job = await this.deps.store.get(jobId);
    if (!job) throw new NotFoundError('Analysis', jobId);
    return job;
  }
}
