import type {
  AnalysisKind,
  AnalysisResult,
  ChecklistOutput,
  ChecklistResult,
  ChecklistService,
  CrawlOutput,
  StageCallOptions
} from './types';
import { checklistResultSchema, invokeCollaborator, parseStageOutput } from './schemas';

/** Share of completed items, 0–100, when the checklist service does not report one. */
export function completionRate(checklist: Pick<ChecklistResult, 'categories'>): number {
  const items = checklist.categories.flatMap((category) => category.items);
  if (items.length === 0) return 0;
  const completed = items.filter((item) => item.status === 'completed').length;
  return Math.round((100 * completed) / items.length);
}

export async function evaluateChecklist(
  input: { kind: AnalysisKind; crawl: CrawlOutput; analysis: AnalysisResult },
  checklist: ChecklistService,
  call: StageCallOptions
): Promise<ChecklistOutput> {
  const raw = await invokeCollaborator('evaluating-checklist', () => checklist.evaluate(input, call));
  const parsed = parseStageOutput('evaluating-checklist', checklistResultSchema, raw);
  return {
    type: 'checklist',
    checklist: { ...parsed, completionRate: parsed.completionRate ?? completionRate(parsed) }
  };
}
