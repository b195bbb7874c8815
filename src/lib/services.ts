import { AnalysisCoordinator } from '@/lib/analysis/analysis-coordinator';
import { createCollaborators } from '@/lib/collaborators/collaborator-client';
import { getAppConfig, type AppConfig } from '@/lib/config';
import { connectToDatabase } from '@/lib/db/mongoose';
import { ErrorFeedbackAggregator } from '@/lib/feedback/aggregator';
import { InMemoryErrorReportStore } from '@/lib/feedback/memory-report-store';
import { MongoErrorReportStore } from '@/lib/feedback/mongo-report-store';
import type { ErrorReportStore } from '@/lib/feedback/types';
import { CancellationRegistry } from '@/lib/jobs/cancellation';
import { InMemoryJobStore, type JobStore } from '@/lib/jobs/job-store';
import { MongoJobStore } from '@/lib/jobs/mongo-job-store';
import { runAnalysisPipeline } from '@/lib/pipeline';
import type { Collaborators } from '@/lib/pipeline/types';
import { createAnalysisQueue, type AnalysisQueue } from '@/lib/queue/analysis-queue';
import { createAuditEmitter, mongoAuditSink, noopAuditSink, type AuditSink } from '@/lib/side-channel';

export type Services = {
  config: AppConfig;
  jobs: JobStore;
  queue: AnalysisQueue;
  analyses: AnalysisCoordinator;
  feedback: ErrorFeedbackAggregator;
  /** Runs one job to a terminal state; what the queue calls. */
  runJob: (jobId: string) => ReturnType<typeof runAnalysisPipeline>;
};

export type ServiceOverrides = {
  config?: AppConfig;
  jobs?: JobStore;
  reports?: ErrorReportStore;
  collaborators?: Collaborators;
  auditSink?: AuditSink;
  queue?: (runJob: (jobId: string) => Promise<unknown>) => AnalysisQueue;
  now?: () => Date;
};

/**
 * Wires every component from configuration. With MONGODB_URI unset the
 * stores are in-memory; with REDIS_URL unset jobs run on an in-process pool.
 */
export function buildServices(overrides: ServiceOverrides = {}): Services {
  const config = overrides.config ?? getAppConfig();
  const persistent = Boolean(config.mongodbUri);

  const jobs = overrides.jobs ?? (persistent ? new MongoJobStore() : new InMemoryJobStore());
  const reports = overrides.reports ?? (persistent ? new MongoErrorReportStore() : new InMemoryErrorReportStore());
  const audit = createAuditEmitter(overrides.auditSink ?? (persistent ? mongoAuditSink : noopAuditSink));
  const collaborators = overrides.collaborators ?? createCollaborators(config.collaborator);
  const cancellations = new CancellationRegistry();
  const feedback = new ErrorFeedbackAggregator(reports, audit, overrides.now);

  const runJob = (jobId: string) =>
    runAnalysisPipeline(jobId, {
      store: jobs,
      collaborators,
      settings: config.pipeline,
      cancellations,
      audit,
      priorityFields: (topK) => feedback.priorityFields(topK),
      now: overrides.now
    });

  const queue = overrides.queue
    ? overrides.queue(runJob)
    : createAnalysisQueue({ redisUrl: config.redisUrl, concurrency: config.workerConcurrency, handler: runJob });

  const analyses = new AnalysisCoordinator({
    store: jobs,
    queue,
    cancellations,
    audit,
    allowedSourceHosts: config.allowedSourceHosts,
    validateCollections: config.pipeline.validateCollections
  });

  return { config, jobs, queue, analyses, feedback, runJob };
}

type ServicesCache = {
  services: Services | null;
  ready: Promise<Services> | null;
};

declare global {
  // eslint-disable-next-line no-var
  var listingAuditServices: ServicesCache | undefined;
}

const cached = global.listingAuditServices ?? { services: null, ready: null };
global.listingAuditServices = cached;

/** Process-wide services, built once and reused across route invocations and hot reloads. */
export async function getServices(): Promise<Services> {
  if (cached.services) {
    return cached.services;
  }

  if (!cached.ready) {
    cached.ready = (async () => {
      const services = buildServices();
      if (services.config.mongodbUri) {
        await connectToDatabase(services.config.mongodbUri);
      }
      return services;
    })();
  }

  try {
    cached.services = await cached.ready;
  } catch (error) {
    cached.ready = null;
    throw error;
  }
  return cached.services;
}

/** Replaces the process-wide services; tests install in-memory wiring here. */
export function setServices(services: Services | null) {
  cached.services = services;
  cached.ready = services ? Promise.resolve(services) : null;
}
