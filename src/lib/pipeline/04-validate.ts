import type { AnalysisKind, AnalysisResult, ChecklistResult, CrawlOutput, FieldMap, ValidationOutput } from './types';
import { FIELD_MAPPINGS } from './utils/field-mapping';
import { reconcile } from './utils/reconciliation';

/**
 * The ground-truth view the validator reads. A collection's sub-records are
 * exposed under `records` so the mapping can count them.
 */
export function harvestedView(kind: AnalysisKind, crawl: CrawlOutput): FieldMap {
  if (kind === 'collection') {
    return { ...crawl.fields, records: crawl.records };
  }
  return crawl.fields;
}

export function validateAgainstCrawl(input: {
  kind: AnalysisKind;
  crawl: CrawlOutput;
  analysis: AnalysisResult;
  checklist: ChecklistResult;
  threshold: number;
  now?: () => Date;
}): ValidationOutput {
  const { report, correctedResult } = reconcile({
    harvested: harvestedView(input.kind, input.crawl),
    result: input.analysis,
    checklist: input.checklist,
    mapping: FIELD_MAPPINGS[input.kind],
    threshold: input.threshold,
    now: input.now
  });
  return { type: 'validation', report, correctedResult };
}
