import type { AnalysisKind, ProgressStage, StageName } from './types';

export const STAGE_LABELS: Record<StageName, string> = {
  crawling: 'Crawl source page',
  analyzing: 'Score listing',
  'evaluating-checklist': 'Evaluate checklist',
  validating: 'Reconcile crawl vs report'
};

/** Percentage reported once a stage commits. Completion is always 100. */
export const STAGE_WEIGHTS: Record<StageName, number> = {
  crawling: 30,
  analyzing: 55,
  'evaluating-checklist': 75,
  validating: 90
};

export function planStages(kind: AnalysisKind, opts: { validateCollections: boolean }): StageName[] {
  const stages: StageName[] = ['crawling', 'analyzing', 'evaluating-checklist'];
  if (kind === 'single-item' || opts.validateCollections) {
    stages.push('validating');
  }
  return stages;
}

/** The stage allowed to commit next, or null once every planned stage has committed. */
export function nextStage(stages: StageName[], current: ProgressStage): StageName | null {
  if (current === 'completed') return null;
  if (current === 'queued') return stages[0] ?? null;
  const index = stages.indexOf(current);
  if (index === -1) return null;
  return stages[index + 1] ?? null;
}
