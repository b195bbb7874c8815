/**
 * Collaborator Client
 *
 * Calls the crawling/scoring sidecar over HTTP. One client serves all four
 * collaborator roles:
 *
 *   POST /retrieve   { source_ref, kind, priority_fields }  → { fields, records? }
 *   POST /analyze    { kind, fields, records }              → { overall_score, ... }
 *   POST /checklist  { kind, fields, records, analysis }    → { categories: [...] }
 *   POST /render     { kind, source_ref, fields, analysis, checklist, validation? } → { document }
 *
 * Every response is parsed with zod; a response of the wrong shape is a
 * StageFailure like any transport error. Network errors and 5xx answers are
 * retried with exponential backoff here, not in the pipeline; a 4xx answer
 * fails at once.
 */

import { z } from 'zod';
import { StageFailure } from '@/lib/errors';
import type {
  AnalysisKind,
  AnalysisResult,
  AnalysisService,
  ChecklistResult,
  ChecklistService,
  Collaborators,
  CrawlOutput,
  RenderedReport,
  ReportRenderer,
  RetrievalService,
  StageCallOptions,
  ValidationReport
} from '@/lib/pipeline/types';

const fieldMapSchema = z.record(z.unknown());

const retrieveResponseSchema = z.object({
  fields: fieldMapSchema,
  records: z.array(fieldMapSchema).optional().default([])
});

const analyzeResponseSchema = z
  .object({ overall_score: z.number().min(0).max(100) })
  .passthrough()
  .transform(({ overall_score, ...rest }): AnalysisResult => ({ ...rest, overallScore: overall_score }));

const checklistResponseSchema = z.object({
  completion_rate: z.number().optional(),
  categories: z.array(
    z.object({
      name: z.string(),
      items: z.array(
        z.object({
          id: z.string(),
          title: z.string(),
          status: z.enum(['completed', 'pending']),
          auto_checked: z.boolean().optional().default(false),
          backing_field: z.string().optional()
        })
      )
    })
  )
});

const renderResponseSchema = z.object({ document: z.string().min(1) });

/** Sleeps for `ms`, waking early when `signal` aborts. */
function backoff(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export type CollaboratorClientOptions = {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  fetchImpl?: typeof fetch;
};

export class CollaboratorClient implements RetrievalService, AnalysisService, ChecklistService, ReportRenderer {
  private baseUrl: string;
  private timeoutMs: number;
  private maxRetries: number;
  private fetchImpl: typeof fetch;

  constructor(opts: CollaboratorClientOptions) {
    this.baseUrl = opts.baseUrl;
    this.timeoutMs = opts.timeoutMs;
    this.maxRetries = opts.maxRetries;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  // ────────────────────────────────────────────────────────────────
  // HTTP helpers
  // ────────────────────────────────────────────────────────────────

  private async post<T>(
    stage: string,
    route: string,
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    opts: StageCallOptions
  ): Promise<T> {
    const url = `${this.baseUrl}${route}`;
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (opts.signal.aborted) break;

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeoutMs);
      const onAbort = () => controller.abort();
      opts.signal.addEventListener('abort', onAbort, { once: true });

      try {
        const response = await this.fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', 'X-Analysis-Id': opts.jobId },
          body: JSON.stringify(body),
          signal: controller.signal
        });

        if (response.status >= 400 && response.status < 500) {
          // The request itself was refused; sending it again changes nothing.
          throw new StageFailure(stage, `${route} returned ${response.status}`);
        }
        if (!response.ok) {
          throw new Error(`${route} returned ${response.status}`);
        }

        const parsed = schema.safeParse(await response.json());
        if (!parsed.success) {
          // A malformed answer will not fix itself on retry.
          const issue = parsed.error.issues[0];
          throw new StageFailure(stage, `invalid response shape at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? ''}`);
        }
        return parsed.data;
      } catch (err) {
        if (err instanceof StageFailure) throw err;
        lastError = err;
        if (attempt < this.maxRetries && !opts.signal.aborted) {
          const delay = 200 * Math.pow(2, attempt);
          console.warn(`[Collaborator] ${route} attempt ${attempt + 1} failed, retrying in ${delay}ms`);
          await backoff(delay, opts.signal);
        }
      } finally {
        clearTimeout(timer);
        opts.signal.removeEventListener('abort', onAbort);
      }
    }

    const reason = lastError instanceof Error ? lastError.message : `request to ${url} failed`;
    throw new StageFailure(stage, reason);
  }

  // ────────────────────────────────────────────────────────────────
  // Collaborator roles
  // ────────────────────────────────────────────────────────────────

  async retrieve(
    input: { sourceRef: string; kind: AnalysisKind; priorityFields: string[] },
    opts: StageCallOptions
  ): Promise<CrawlOutput> {
    const data = await this.post(
      'crawling',
      '/retrieve',
      { source_ref: input.sourceRef, kind: input.kind, priority_fields: input.priorityFields },
      retrieveResponseSchema,
      opts
    );
    return { type: 'crawl', fields: data.fields, records: data.records };
  }

  async analyze(input: { kind: AnalysisKind; crawl: CrawlOutput }, opts: StageCallOptions): Promise<AnalysisResult> {
    return this.post(
      'analyzing',
      '/analyze',
      { kind: input.kind, fields: input.crawl.fields, records: input.crawl.records },
      analyzeResponseSchema,
      opts
    );
  }

  async evaluate(
    input: { kind: AnalysisKind; crawl: CrawlOutput; analysis: AnalysisResult },
    opts: StageCallOptions
  ): Promise<ChecklistResult> {
    const data = await this.post(
      'evaluating-checklist',
      '/checklist',
      { kind: input.kind, fields: input.crawl.fields, records: input.crawl.records, analysis: input.analysis },
      checklistResponseSchema,
      opts
    );
    return {
      completionRate: data.completion_rate,
      categories: data.categories.map((category) => ({
        name: category.name,
        items: category.items.map((item) => ({
          id: item.id,
          title: item.title,
          status: item.status,
          autoChecked: item.auto_checked,
          backingField: item.backing_field
        }))
      }))
    };
  }

  async render(
    input: {
      kind: AnalysisKind;
      sourceRef: string;
      crawl: CrawlOutput;
      analysis: AnalysisResult;
      checklist: ChecklistResult;
      validation?: ValidationReport;
    },
    opts: StageCallOptions
  ): Promise<RenderedReport> {
    const data = await this.post(
      'rendering',
      '/render',
      {
        kind: input.kind,
        source_ref: input.sourceRef,
        fields: input.crawl.fields,
        analysis: input.analysis,
        checklist: input.checklist,
        validation: input.validation
      },
      renderResponseSchema,
      opts
    );
    return { format: 'markdown', document: data.document };
  }
}

export function createCollaborators(opts: CollaboratorClientOptions): Collaborators {
  const client = new CollaboratorClient(opts);
  return { retrieval: client, analysis: client, checklist: client, renderer: client };
}
