import { z } from 'zod';
import { errorMessage, StageFailure } from '@/lib/errors';

// Collaborators are black boxes; what they hand back is checked here before
// anything is committed.

const fieldMap = z.record(z.unknown());

export const crawlOutputSchema = z.object({
  type: z.literal('crawl'),
  fields: fieldMap,
  records: z.array(fieldMap)
});

export const analysisResultSchema = z
  .object({
    overallScore: z.number().min(0).max(100)
  })
  .passthrough();

export const checklistResultSchema = z.object({
  completionRate: z.number().min(0).max(100).optional(),
  categories: z.array(
    z.object({
      name: z.string(),
      items: z.array(
        z.object({
          id: z.string().min(1),
          title: z.string(),
          status: z.enum(['completed', 'pending']),
          autoChecked: z.boolean(),
          backingField: z.string().min(1).optional()
        })
      )
    })
  )
});

export const renderedReportSchema = z.object({
  format: z.literal('markdown'),
  document: z.string().min(1)
});

/** Runs a collaborator call, reporting anything it throws as a failure of `stage`. */
export async function invokeCollaborator<T>(stage: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof StageFailure) throw error;
    throw new StageFailure(stage, errorMessage(error, 'collaborator error'));
  }
}

export function parseStageOutput<T>(stage: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const at = issue?.path.length ? issue.path.join('.') : '<root>';
    throw new StageFailure(stage, `invalid output at ${at}: ${issue?.message ?? 'unexpected shape'}`);
  }
  return parsed.data;
}
