export const ISSUE_TYPES = ['mismatch', 'missing', 'incorrect-format', 'other'] as const;
export const SEVERITIES = ['low', 'medium', 'high'] as const;
export const REVIEW_STATUSES = ['pending', 'reviewed', 'resolved'] as const;

export type IssueType = (typeof ISSUE_TYPES)[number];
export type Severity = (typeof SEVERITIES)[number];
export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

/**
 * DOM evidence captured where the reporter saw the wrong value. The crawler
 * reads it back through the structure chunks of a field.
 */
export type PageStructure = {
  relatedClasses: string[];
  elementPresent: boolean;
  classFrequency: Record<string, number>;
  /** `.a > .b > .c` from the three most frequent classes; absent without any. */
  selectorPattern?: string;
};

export type ErrorReport = {
  id: string;
  analysisId?: string;
  sourceRef?: string;
  fieldName: string;
  issueType: IssueType;
  severity: Severity;
  description?: string;
  /** Stored as text; non-string submissions are JSON-encoded. */
  crawlerValue?: string;
  reportValue?: string;
  pageStructure?: PageStructure;
  status: ReviewStatus;
  createdAt: Date;
  resolvedAt?: Date;
};

export type NewErrorReport = Omit<ErrorReport, 'id' | 'status' | 'createdAt' | 'resolvedAt'>;

export type ErrorReportFilter = {
  fieldName?: string;
  status?: ReviewStatus;
  analysisId?: string;
  limit: number;
};

export type StructureChunk = PageStructure & {
  errorReportId: string;
  fieldName: string;
  sourceRef?: string;
  reportedAt: Date;
};

export type FieldPriorityStat = {
  fieldName: string;
  reportCount: number;
  lastReportedAt: Date;
};

/**
 * Append-only report log. Each insert gets a fresh id, so concurrent
 * submissions never conflict.
 */
export interface ErrorReportStore {
  insert(report: NewErrorReport, at: Date): Promise<ErrorReport>;
  /** Newest first, at most `filter.limit`. */
  find(filter: ErrorReportFilter): Promise<ErrorReport[]>;
  /** One entry per field name, in no particular order. */
  fieldStats(): Promise<FieldPriorityStat[]>;
  updateStatus(id: string, status: ReviewStatus, at: Date): Promise<ErrorReport | null>;
}
