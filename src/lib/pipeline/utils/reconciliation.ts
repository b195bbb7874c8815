import type {
  AnalysisResult,
  ChecklistResult,
  FieldMap,
  FieldMismatch,
  MissingItem,
  ValidationReport
} from '../types';
import { CHECKLIST_BACKING_FIELDS, type FieldCorrespondence } from './field-mapping';
import { getPath, isBlank, setPath } from './field-path';
import { normalizeNumeric, normalizeText } from './normalize';

export type ReconcileInput = {
  harvested: FieldMap;
  result: AnalysisResult;
  checklist?: ChecklistResult;
  mapping: FieldCorrespondence[];
  threshold: number;
  backingFields?: Record<string, string>;
  now?: () => Date;
};

export type ReconcileOutput = {
  report: ValidationReport;
  correctedResult: AnalysisResult;
};

type Comparison =
  | { comparable: false }
  | { comparable: true; equal: boolean; groundTruth: unknown };

/**
 * Compares one mapped pair. `groundTruth` is the harvested value in the form
 * written back into the result when the two sides disagree.
 *
 * A blank report value is never compared. A blank harvested value is
 * compared as `absentAs` when given; for counts, an absent or empty list
 * counts as zero.
 */
export function compareField(
  type: FieldCorrespondence['type'],
  crawlerValue: unknown,
  reportValue: unknown,
  absentAs?: number
): Comparison {
  if (isBlank(reportValue)) {
    return { comparable: false };
  }

  const harvested = isBlank(crawlerValue) ? (type === 'count' ? (absentAs ?? 0) : absentAs) : crawlerValue;
  if (harvested === undefined) {
    return { comparable: false };
  }

  switch (type) {
    case 'numeric': {
      const expected = normalizeNumeric(harvested);
      if (expected === null) return { comparable: false };
      return { comparable: true, equal: normalizeNumeric(reportValue) === expected, groundTruth: expected };
    }
    case 'count': {
      const expected = Array.isArray(harvested) ? harvested.length : normalizeNumeric(harvested);
      if (expected === null) return { comparable: false };
      return { comparable: true, equal: normalizeNumeric(reportValue) === expected, groundTruth: expected };
    }
    case 'string':
      return {
        comparable: true,
        equal: normalizeText(harvested) === normalizeText(reportValue),
        groundTruth: harvested
      };
  }
}

function findMissingItems(
  harvested: FieldMap,
  checklist: ChecklistResult | undefined,
  backingFields: Record<string, string>
): MissingItem[] {
  const missing: MissingItem[] = [];
  for (const category of checklist?.categories ?? []) {
    for (const item of category.items) {
      if (!item.autoChecked) continue;
      const field = item.backingField ?? backingFields[item.id];
      if (!field) continue;
      if (isBlank(getPath(harvested, field))) {
        missing.push({ field, checklistItemId: item.id });
      }
    }
  }
  return missing;
}

/**
 * Reconciles the analysis result against harvested ground truth.
 *
 * Mismatched result values are overwritten with the harvested value on a
 * copy of the result; the input result is left untouched. Checklist items
 * whose backing field was never harvested are reported as missing but do not
 * affect the score.
 */
export function reconcile(input: ReconcileInput): ReconcileOutput {
  const { harvested, mapping, threshold } = input;
  const correctedResult = structuredClone(input.result);
  const mismatches: FieldMismatch[] = [];
  const correctedFields: string[] = [];
  let compared = 0;

  for (const pair of mapping) {
    const crawlerValue = getPath(harvested, pair.field);
    const reportValue = getPath(input.result, pair.resultPath);
    const outcome = compareField(pair.type, crawlerValue, reportValue, pair.absentAs);
    if (!outcome.comparable) continue;

    compared += 1;
    if (outcome.equal) continue;

    mismatches.push({ field: pair.field, crawlerValue: crawlerValue ?? outcome.groundTruth, reportValue });
    setPath(correctedResult, pair.resultPath, outcome.groundTruth);
    if (!correctedFields.includes(pair.field)) {
      correctedFields.push(pair.field);
    }
  }

  const matched = compared - mismatches.length;
  const validationScore = compared === 0 ? 100 : Math.round((100 * matched) / compared);

  return {
    report: {
      validationScore,
      isValid: validationScore >= threshold,
      threshold,
      mismatches,
      missingItems: findMissingItems(harvested, input.checklist, input.backingFields ?? CHECKLIST_BACKING_FIELDS),
      correctedFields,
      comparedFields: compared,
      checkedAt: (input.now ?? (() => new Date()))().toISOString()
    },
    correctedResult
  };
}
