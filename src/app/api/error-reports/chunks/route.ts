import { NextResponse } from 'next/server';
import { z } from 'zod';
import { toErrorResponse } from '@/lib/errors';
import { getServices } from '@/lib/services';

export const runtime = 'nodejs';

const schema = z.object({ fieldName: z.string().trim().min(1, 'fieldName is required') });

/** Page structure chunks for one field, with whether the crawler should prioritize it. */
export async function GET(request: Request) {
  const parsed = schema.safeParse(Object.fromEntries(new URL(request.url).searchParams));
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.issues[0]?.message ?? 'Invalid query' }, { status: 400 });
  }

  const { fieldName } = parsed.data;
  try {
    const { feedback } = await getServices();
    const [prioritized, chunks] = await Promise.all([
      feedback.shouldPrioritizeField(fieldName),
      feedback.chunksForField(fieldName)
    ]);
    return NextResponse.json({ fieldName, prioritized, chunks });
  } catch (error) {
    return toErrorResponse(error, 'GET /api/error-reports/chunks');
  }
}
