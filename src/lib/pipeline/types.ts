export type AnalysisKind = 'single-item' | 'collection';

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

export type StageName =
  | 'crawling'
  | 'analyzing'
  | 'evaluating-checklist'
  | 'validating';

/** Where a job's progress cursor can sit: before the first stage, on a committed stage, or done. */
export type ProgressStage = 'queued' | StageName | 'completed';

export type JobProgress = {
  stage: ProgressStage;
  percentage: number;
};

/** Harvested page data. Nested objects are addressed with dotted paths (`price.sale_price`). */
export type FieldMap = Record<string, unknown>;

export type AnalysisResult = {
  overallScore: number;
  [section: string]: unknown;
};

export type ChecklistItem = {
  id: string;
  title: string;
  status: 'completed' | 'pending';
  autoChecked: boolean;
  /** Harvested field the item's status is derived from, when the checklist service names one. */
  backingField?: string;
};

export type ChecklistCategory = {
  name: string;
  items: ChecklistItem[];
};

export type ChecklistResult = {
  completionRate?: number;
  categories: ChecklistCategory[];
};

export type FieldMismatch = {
  field: string;
  crawlerValue: unknown;
  reportValue: unknown;
};

export type MissingItem = {
  field: string;
  checklistItemId: string;
};

export type ValidationReport = {
  validationScore: number;
  isValid: boolean;
  threshold: number;
  mismatches: FieldMismatch[];
  missingItems: MissingItem[];
  correctedFields: string[];
  comparedFields: number;
  checkedAt: string;
};

// ── Tagged per-stage outputs ──

export type CrawlOutput = {
  type: 'crawl';
  fields: FieldMap;
  /** Sub-records of a collection; empty for a single item. */
  records: FieldMap[];
};

export type AnalysisOutput = {
  type: 'analysis';
  result: AnalysisResult;
};

export type ChecklistOutput = {
  type: 'checklist';
  checklist: ChecklistResult;
};

export type ValidationOutput = {
  type: 'validation';
  report: ValidationReport;
  correctedResult: AnalysisResult;
};

export type StageOutputMap = {
  crawling: CrawlOutput;
  analyzing: AnalysisOutput;
  'evaluating-checklist': ChecklistOutput;
  validating: ValidationOutput;
};

export type StageOutput = StageOutputMap[StageName];

export type StageOutputs = Partial<StageOutputMap>;

export const OUTPUT_TYPE_BY_STAGE: { [S in StageName]: StageOutputMap[S]['type'] } = {
  crawling: 'crawl',
  analyzing: 'analysis',
  'evaluating-checklist': 'checklist',
  validating: 'validation'
};

export type RenderedReport = {
  format: 'markdown';
  document: string;
};

export type FinalResult = {
  analysis: AnalysisResult;
  checklist: ChecklistResult;
  validation?: ValidationReport;
  report: RenderedReport;
};

export type AnalysisJob = {
  id: string;
  sourceRef: string;
  kind: AnalysisKind;
  status: JobStatus;
  stages: StageName[];
  progress: JobProgress;
  stageOutputs: StageOutputs;
  validation?: ValidationReport;
  result?: FinalResult;
  error?: string;
  createdAt: Date;
  updatedAt: Date;
};

export type TerminalOutcome = {
  status: 'completed' | 'failed';
  /** False when the job was already terminal and the call changed nothing. */
  transitioned: boolean;
  error?: string;
};

// ── External collaborators ──

export type StageCallOptions = {
  jobId: string;
  signal: AbortSignal;
};

export interface RetrievalService {
  retrieve(
    input: { sourceRef: string; kind: AnalysisKind; priorityFields: string[] },
    opts: StageCallOptions
  ): Promise<CrawlOutput>;
}

export interface AnalysisService {
  analyze(input: { kind: AnalysisKind; crawl: CrawlOutput }, opts: StageCallOptions): Promise<AnalysisResult>;
}

export interface ChecklistService {
  evaluate(
    input: { kind: AnalysisKind; crawl: CrawlOutput; analysis: AnalysisResult },
    opts: StageCallOptions
  ): Promise<ChecklistResult>;
}

export interface ReportRenderer {
  render(
    input: {
      kind: AnalysisKind;
      sourceRef: string;
      crawl: CrawlOutput;
      analysis: AnalysisResult;
      checklist: ChecklistResult;
      validation?: ValidationReport;
    },
    opts: StageCallOptions
  ): Promise<RenderedReport>;
}

export type Collaborators = {
  retrieval: RetrievalService;
  analysis: AnalysisService;
  checklist: ChecklistService;
  renderer: ReportRenderer;
};
