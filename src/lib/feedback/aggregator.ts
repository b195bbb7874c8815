import Papa from 'papaparse';
import { z } from 'zod';
import { NotFoundError, SubmissionError } from '@/lib/errors';
import type { AuditEmitter } from '@/lib/side-channel';
import {
  ISSUE_TYPES,
  REVIEW_STATUSES,
  SEVERITIES,
  type ErrorReport,
  type ErrorReportStore,
  type FieldPriorityStat,
  type PageStructure,
  type ReviewStatus,
  type StructureChunk
} from './types';

export const DEFAULT_QUERY_LIMIT = 50;
export const MAX_QUERY_LIMIT = 500;
export const DEFAULT_PRIORITY_COUNT = 10;

/** Strings are kept as typed; anything else is stored as its JSON text. */
function encodeValue(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/** Joins the three most frequent classes, most frequent first, into a child selector. */
export function selectorPattern(classFrequency: Record<string, number>): string | undefined {
  const top = Object.entries(classFrequency)
    .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b))
    .slice(0, 3);
  if (top.length === 0) return undefined;
  return top.map(([cls]) => `.${cls}`).join(' > ');
}

const pageStructureSchema = z
  .object({
    relatedClasses: z.array(z.string().trim().min(1)).max(100).default([]),
    elementPresent: z.boolean().default(false),
    classFrequency: z.record(z.number().int().nonnegative()).default({})
  })
  .transform(
    (structure): PageStructure => ({ ...structure, selectorPattern: selectorPattern(structure.classFrequency) })
  );

export const errorReportInputSchema = z.object({
  analysisId: z.string().trim().min(1).optional(),
  sourceRef: z.string().url().optional(),
  fieldName: z.string().trim().min(1, 'fieldName is required').max(200),
  issueType: z.enum(ISSUE_TYPES),
  severity: z.enum(SEVERITIES).default('medium'),
  description: z.string().max(2000).optional(),
  crawlerValue: z.unknown().transform(encodeValue),
  reportValue: z.unknown().transform(encodeValue),
  pageStructure: pageStructureSchema.optional()
});

export type ReportQuery = {
  fieldName?: string;
  status?: ReviewStatus;
  analysisId?: string;
  limit?: number;
};

const CSV_COLUMNS = [
  'id',
  'createdAt',
  'analysisId',
  'sourceRef',
  'fieldName',
  'issueType',
  'severity',
  'status',
  'crawlerValue',
  'reportValue',
  'description',
  'selectorPattern',
  'resolvedAt'
];

/** Count descending, then most recent report, then field name. */
export function rankFieldStats(stats: FieldPriorityStat[]): FieldPriorityStat[] {
  return [...stats].sort(
    (a, b) =>
      b.reportCount - a.reportCount ||
      b.lastReportedAt.getTime() - a.lastReportedAt.getTime() ||
      a.fieldName.localeCompare(b.fieldName)
  );
}

export class ErrorFeedbackAggregator {
  constructor(
    private store: ErrorReportStore,
    private audit: AuditEmitter,
    private now: () => Date = () => new Date()
  ) {}

  async submit(input: unknown): Promise<{ errorReportId: string }> {
    const parsed = errorReportInputSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const at = issue?.path.length ? `${issue.path.join('.')}: ` : '';
      throw new SubmissionError(`${at}${issue?.message ?? 'Invalid error report'}`);
    }

    const report = await this.store.insert(parsed.data, this.now());
    this.audit({
      jobId: report.analysisId,
      action: 'ERROR_REPORT_SUBMITTED',
      entity: 'ErrorReport',
      entityId: report.id,
      payload: { fieldName: report.fieldName, issueType: report.issueType, severity: report.severity }
    });
    return { errorReportId: report.id };
  }

  async query(filters: ReportQuery = {}): Promise<ErrorReport[]> {
    const limit = Math.min(Math.max(Math.trunc(filters.limit ?? DEFAULT_QUERY_LIMIT), 1), MAX_QUERY_LIMIT);
    return this.store.find({
      fieldName: filters.fieldName,
      status: filters.status,
      analysisId: filters.analysisId,
      limit
    });
  }

  async fieldStats(): Promise<FieldPriorityStat[]> {
    return rankFieldStats(await this.store.fieldStats());
  }

  /** The `topK` highest ranked fields with their counts. */
  async priorityStats(topK: number): Promise<FieldPriorityStat[]> {
    if (!Number.isInteger(topK) || topK < 0) {
      throw new RangeError(`topK must be a non-negative integer, got ${topK}`);
    }
    if (topK === 0) return [];
    const ranked = await this.fieldStats();
    return ranked.slice(0, topK);
  }

  async priorityFields(topK: number): Promise<string[]> {
    return (await this.priorityStats(topK)).map((stat) => stat.fieldName);
  }

  async shouldPrioritizeField(fieldName: string, topK = DEFAULT_PRIORITY_COUNT): Promise<boolean> {
    return (await this.priorityFields(topK)).includes(fieldName);
  }

  /**
   * Page structure captured with the field's pending reports, newest first.
   * Crawlers use the selector patterns as hints on similar pages.
   */
  async chunksForField(fieldName: string): Promise<StructureChunk[]> {
    const reports = await this.store.find({ fieldName, status: 'pending', limit: MAX_QUERY_LIMIT });
    const chunks: StructureChunk[] = [];
    for (const report of reports) {
      if (!report.pageStructure) continue;
      chunks.push({
        ...report.pageStructure,
        errorReportId: report.id,
        fieldName: report.fieldName,
        sourceRef: report.sourceRef,
        reportedAt: report.createdAt
      });
    }
    return chunks;
  }

  /** Hook for the review workflow; `resolved` stamps `resolvedAt`. */
  async updateStatus(id: string, status: ReviewStatus): Promise<ErrorReport> {
    if (!REVIEW_STATUSES.includes(status)) {
      throw new SubmissionError(`Unknown review status: ${status}`);
    }
    const updated = await this.store.updateStatus(id, status, this.now());
    if (!updated) throw new NotFoundError('Error report', id);

    this.audit({
      jobId: updated.analysisId,
      action: 'ERROR_REPORT_STATUS_CHANGED',
      entity: 'ErrorReport',
      entityId: id,
      payload: { status }
    });
    return updated;
  }

  async exportCsv(filters: ReportQuery = {}): Promise<string> {
    const reports = await this.query({ ...filters, limit: filters.limit ?? MAX_QUERY_LIMIT });
    const rows = reports.map((report) => ({
      id: report.id,
      createdAt: report.createdAt.toISOString(),
      analysisId: report.analysisId ?? '',
      sourceRef: report.sourceRef ?? '',
      fieldName: report.fieldName,
      issueType: report.issueType,
      severity: report.severity,
      status: report.status,
      crawlerValue: report.crawlerValue ?? '',
      reportValue: report.reportValue ?? '',
      description: report.description ?? '',
      selectorPattern: report.pageStructure?.selectorPattern ?? '',
      resolvedAt: report.resolvedAt?.toISOString() ?? ''
    }));
    return Papa.unparse(rows, { columns: CSV_COLUMNS });
  }
}
