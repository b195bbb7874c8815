import type { AnalysisKind, AnalysisOutput, AnalysisService, CrawlOutput, StageCallOptions } from './types';
import { analysisResultSchema, invokeCollaborator, parseStageOutput } from './schemas';

export async function analyzeListing(
  input: { kind: AnalysisKind; crawl: CrawlOutput },
  analysis: AnalysisService,
  call: StageCallOptions
): Promise<AnalysisOutput> {
  const raw = await invokeCollaborator('analyzing', () => analysis.analyze(input, call));
  const result = parseStageOutput('analyzing', analysisResultSchema, raw);
  return { type: 'analysis', result };
}
