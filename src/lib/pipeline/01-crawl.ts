import { StageFailure } from '@/lib/errors';
import type { AnalysisKind, CrawlOutput, RetrievalService, StageCallOptions } from './types';
import { crawlOutputSchema, invokeCollaborator, parseStageOutput } from './schemas';

export type CrawlInput = {
  sourceRef: string;
  kind: AnalysisKind;
  /** Fields users most often report as wrong; retrieval may spend extra effort on them. */
  priorityFields: string[];
};

export async function crawlSource(
  input: CrawlInput,
  retrieval: RetrievalService,
  call: StageCallOptions
): Promise<CrawlOutput> {
  const raw = await invokeCollaborator('crawling', () => retrieval.retrieve(input, call));
  const output = parseStageOutput('crawling', crawlOutputSchema, raw);

  if (input.kind === 'single-item' && Object.keys(output.fields).length === 0) {
    throw new StageFailure('crawling', 'no fields harvested from source');
  }
  return output;
}
