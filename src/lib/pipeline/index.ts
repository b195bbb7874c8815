import { CancelledFailure, errorMessage, NotFoundError, StageFailure } from '@/lib/errors';
import type { AppConfig } from '@/lib/config';
import type { CancellationRegistry } from '@/lib/jobs/cancellation';
import { existingOutcome, isTerminal, type JobStore } from '@/lib/jobs/job-store';
import type { AuditEmitter } from '@/lib/side-channel';
import { crawlSource } from './01-crawl';
import { analyzeListing } from './02-analyze';
import { evaluateChecklist } from './03-checklist';
import { validateAgainstCrawl } from './04-validate';
import { invokeCollaborator, parseStageOutput, renderedReportSchema } from './schemas';
import { STAGE_LABELS, STAGE_WEIGHTS } from './stages';
import type {
  AnalysisJob,
  Collaborators,
  FinalResult,
  StageCallOptions,
  StageName,
  StageOutputs,
  TerminalOutcome
} from './types';
import { JobDeadline } from './utils/deadline';

export type PipelineDeps = {
  store: JobStore;
  collaborators: Collaborators;
  settings: AppConfig['pipeline'];
  cancellations: CancellationRegistry;
  audit: AuditEmitter;
  /** Top reported fields, passed to retrieval as a hint. */
  priorityFields?: (topK: number) => Promise<string[]>;
  now?: () => Date;
};

function logStage(jobId: string, index: number, stage: StageName, status: 'RUNNING' | 'DONE' | 'FAILED', message?: string) {
  console.log(`[Pipeline ${jobId}] Stage ${index} (${STAGE_LABELS[stage]}): ${status}${message ? ': ' + message : ''}`);
}

function missingInput(stage: StageName, needs: StageName): StageFailure {
  return new StageFailure(stage, `requires ${needs} output, which this job did not produce`);
}

async function loadPriorityHints(jobId: string, deps: PipelineDeps): Promise<string[]> {
  const topK = deps.settings.priorityHintCount;
  if (!deps.priorityFields || topK === 0) return [];
  try {
    return await deps.priorityFields(topK);
  } catch (error) {
    // The hint is advisory; crawling proceeds without it.
    console.warn(`[Pipeline ${jobId}] Priority field hint unavailable: ${errorMessage(error)}`);
    return [];
  }
}

async function runStages(job: AnalysisJob, deps: PipelineDeps, deadline: JobDeadline, cancel: AbortSignal) {
  const { store, collaborators } = deps;
  const call: StageCallOptions = { jobId: job.id, signal: deadline.signal };
  const outputs: StageOutputs = {};

  for (const [position, stage] of job.stages.entries()) {
    // Cancellation lands between stages, never inside one.
    if (cancel.aborted) throw new CancelledFailure();
    deadline.check();

    const index = position + 1;
    logStage(job.id, index, stage, 'RUNNING');

    switch (stage) {
      case 'crawling': {
        const priorityFields = await deadline.race(loadPriorityHints(job.id, deps));
        const output = await deadline.race(
          crawlSource({ sourceRef: job.sourceRef, kind: job.kind, priorityFields }, collaborators.retrieval, call)
        );
        await deadline.race(store.commitStage(job.id, stage, output, STAGE_WEIGHTS[stage]));
        outputs.crawling = output;
        logStage(job.id, index, stage, 'DONE', `${Object.keys(output.fields).length} fields, ${output.records.length} records`);
        break;
      }
      case 'analyzing': {
        const crawl = outputs.crawling;
        if (!crawl) throw missingInput(stage, 'crawling');
        const output = await deadline.race(analyzeListing({ kind: job.kind, crawl }, collaborators.analysis, call));
        await deadline.race(store.commitStage(job.id, stage, output, STAGE_WEIGHTS[stage]));
        outputs.analyzing = output;
        logStage(job.id, index, stage, 'DONE', `overall score ${output.result.overallScore}`);
        break;
      }
      case 'evaluating-checklist': {
        const crawl = outputs.crawling;
        const analysis = outputs.analyzing;
        if (!crawl) throw missingInput(stage, 'crawling');
        if (!analysis) throw missingInput(stage, 'analyzing');
        const output = await deadline.race(
          evaluateChecklist({ kind: job.kind, crawl, analysis: analysis.result }, collaborators.checklist, call)
        );
        await deadline.race(store.commitStage(job.id, stage, output, STAGE_WEIGHTS[stage]));
        outputs['evaluating-checklist'] = output;
        logStage(job.id, index, stage, 'DONE', `completion ${output.checklist.completionRate ?? 0}%`);
        break;
      }
      case 'validating': {
        const crawl = outputs.crawling;
        const analysis = outputs.analyzing;
        const checklist = outputs['evaluating-checklist'];
        if (!crawl) throw missingInput(stage, 'crawling');
        if (!analysis) throw missingInput(stage, 'analyzing');
        if (!checklist) throw missingInput(stage, 'evaluating-checklist');
        const output = validateAgainstCrawl({
          kind: job.kind,
          crawl,
          analysis: analysis.result,
          checklist: checklist.checklist,
          threshold: deps.settings.validationThreshold,
          now: deps.now
        });
        await deadline.race(store.commitStage(job.id, stage, output, STAGE_WEIGHTS[stage]));
        outputs.validating = output;
        const { report } = output;
        logStage(
          job.id,
          index,
          stage,
          'DONE',
          `score ${report.validationScore}, ${report.mismatches.length} mismatches, ${report.missingItems.length} missing`
        );
        deps.audit({
          jobId: job.id,
          action: 'VALIDATION_COMPLETED',
          entity: 'AnalysisJob',
          entityId: job.id,
          payload: {
            validationScore: report.validationScore,
            isValid: report.isValid,
            correctedFields: report.correctedFields
          }
        });
        break;
      }
    }
  }

  if (cancel.aborted) throw new CancelledFailure();
  deadline.check();
  return outputs;
}

async function assembleResult(
  job: AnalysisJob,
  outputs: StageOutputs,
  deps: PipelineDeps,
  deadline: JobDeadline
): Promise<FinalResult> {
  const crawl = outputs.crawling;
  const analysis = outputs.analyzing;
  const checklist = outputs['evaluating-checklist'];
  if (!crawl || !analysis || !checklist) {
    throw new StageFailure('rendering', 'pipeline ended without crawl, analysis and checklist output');
  }
  const validation = outputs.validating;
  const reconciled = validation?.correctedResult ?? analysis.result;
  const call: StageCallOptions = { jobId: job.id, signal: deadline.signal };

  const raw = await deadline.race(
    invokeCollaborator('rendering', () =>
      deps.collaborators.renderer.render(
        {
          kind: job.kind,
          sourceRef: job.sourceRef,
          crawl,
          analysis: reconciled,
          checklist: checklist.checklist,
          validation: validation?.report
        },
        call
      )
    )
  );
  const report = parseStageOutput('rendering', renderedReportSchema, raw);

  return {
    analysis: reconciled,
    checklist: checklist.checklist,
    validation: validation?.report,
    report
  };
}

/**
 * Drives one job through its planned stages. Every failure, timeout or
 * cancellation ends in `fail` with the error kept on the job; nothing is
 * thrown to the caller once the job exists.
 */
export async function runAnalysisPipeline(jobId: string, deps: PipelineDeps): Promise<TerminalOutcome> {
  const job = await deps.store.get(jobId);
  if (!job) {
    throw new NotFoundError('Analysis', jobId);
  }
  if (isTerminal(job)) {
    // Cancelled while still queued.
    return existingOutcome(job);
  }

  const deadline = new JobDeadline(deps.settings.jobTimeoutMs);
  const cancel = deps.cancellations.register(jobId);

  try {
    await deadline.race(deps.store.start(jobId));
    console.log(`[Pipeline ${jobId}] Started ${job.kind} analysis of ${job.sourceRef}`);

    const outputs = await runStages(job, deps, deadline, cancel);
    const result = await assembleResult(job, outputs, deps, deadline);
    const outcome = await deps.store.complete(jobId, result);

    if (outcome.transitioned) {
      console.log(`[Pipeline ${jobId}] Completed`);
      deps.audit({
        jobId,
        action: 'PIPELINE_COMPLETED',
        entity: 'AnalysisJob',
        entityId: jobId,
        payload: { overallScore: result.analysis.overallScore, validationScore: result.validation?.validationScore }
      });
    }
    return outcome;
  } catch (error) {
    const message = errorMessage(error, 'Pipeline failed');
    const outcome = await deps.store.fail(jobId, message);

    if (outcome.transitioned) {
      console.error(`[Pipeline ${jobId}] Failed: ${message}`);
      deps.audit({
        jobId,
        action: 'PIPELINE_FAILED',
        entity: 'AnalysisJob',
        entityId: jobId,
        payload: { error: message }
      });
    }
    return outcome;
  } finally {
    deadline.clear();
    deps.cancellations.release(jobId);
  }
}
