/* ------------------------------------------------------------------ */
/*  Shared API type definitions (DTOs)                                */
/*  Wire shapes of the HTTP surface. Dates travel as ISO strings.     */
/*  Do NOT add runtime code.                                          */
/* ------------------------------------------------------------------ */

/* ── Analysis jobs ── */

export type AnalysisKind = "single-item" | "collection";
export type JobStatus = "queued" | "running" | "completed" | "failed";
export type ProgressStage = "queued" | "crawling" | "analyzing" | "evaluating-checklist" | "validating" | "completed";

export interface SubmitAnalysisPayload {
  sourceRef: string;
  /** Overrides detection from the URL path. */
  kind?: AnalysisKind;
}

export interface SubmitAnalysisResponse {
  jobId: string;
  status: "queued" | "running";
  kindDetected: AnalysisKind;
}

export interface JobProgress {
  stage: ProgressStage;
  percentage: number;
}

export interface FieldMismatch {
  field: string;
  crawlerValue: unknown;
  reportValue: unknown;
}

export interface MissingItem {
  field: string;
  checklistItemId: string;
}

export interface ValidationReport {
  validationScore: number;
  isValid: boolean;
  threshold: number;
  mismatches: FieldMismatch[];
  missingItems: MissingItem[];
  correctedFields: string[];
  comparedFields: number;
  checkedAt: string;
}

export interface ChecklistItem {
  id: string;
  title: string;
  status: "completed" | "pending";
  autoChecked: boolean;
  backingField?: string;
}

export interface ChecklistCategory {
  name: string;
  items: ChecklistItem[];
}

export interface AnalysisResultPayload {
  analysis: { overallScore: number; [section: string]: unknown };
  checklist: { completionRate?: number; categories: ChecklistCategory[] };
  validation?: ValidationReport;
  report: { format: "markdown"; document: string };
}

export interface PollResponse {
  jobId: string;
  sourceRef: string;
  kind: AnalysisKind;
  status: JobStatus;
  progress: JobProgress;
  result?: AnalysisResultPayload;
  validation?: ValidationReport;
  error?: string;
}

export interface ProgressEvent {
  status: JobStatus;
  progress: JobProgress;
  error?: string;
}

export type DownloadFormat = "markdown" | "xlsx" | "json";

export interface CancelResponse {
  jobId: string;
  status: JobStatus;
  cancelled: boolean;
}

/* ── Error feedback ── */

export type IssueType = "mismatch" | "missing" | "incorrect-format" | "other";
export type Severity = "low" | "medium" | "high";
export type ReviewStatus = "pending" | "reviewed" | "resolved";

export interface PageStructurePayload {
  relatedClasses?: string[];
  elementPresent?: boolean;
  /** Class name → occurrences around the reported element. */
  classFrequency?: Record<string, number>;
}

export interface SubmitErrorReportPayload {
  analysisId?: string;
  sourceRef?: string;
  fieldName: string;
  issueType: IssueType;
  severity?: Severity;
  description?: string;
  crawlerValue?: unknown;
  reportValue?: unknown;
  pageStructure?: PageStructurePayload;
}

export interface SubmitErrorReportResponse {
  errorReportId: string;
}

export interface ErrorReportPayload {
  id: string;
  analysisId?: string;
  sourceRef?: string;
  fieldName: string;
  issueType: IssueType;
  severity: Severity;
  description?: string;
  crawlerValue?: string;
  reportValue?: string;
  pageStructure?: StoredPageStructure;
  status: ReviewStatus;
  createdAt: string;
  resolvedAt?: string;
}

export interface StoredPageStructure {
  relatedClasses: string[];
  elementPresent: boolean;
  classFrequency: Record<string, number>;
  selectorPattern?: string;
}

export interface ErrorReportListResponse {
  reports: ErrorReportPayload[];
}

export interface UpdateErrorReportPayload {
  status: ReviewStatus;
}

export interface UpdateErrorReportResponse {
  report: ErrorReportPayload;
}

export interface StructureChunkPayload extends StoredPageStructure {
  errorReportId: string;
  fieldName: string;
  sourceRef?: string;
  reportedAt: string;
}

export interface StructureChunksResponse {
  fieldName: string;
  prioritized: boolean;
  chunks: StructureChunkPayload[];
}

export interface FieldPriorityStat {
  fieldName: string;
  reportCount: number;
  lastReportedAt: string;
}

export interface PriorityFieldsResponse {
  fields: string[];
  stats: FieldPriorityStat[];
}

/* ── Errors ── */

export interface ApiError {
  error: string;
}
