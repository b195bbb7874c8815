import { NextResponse } from 'next/server';
import { z } from 'zod';
import { toErrorResponse } from '@/lib/errors';
import { getServices } from '@/lib/services';

export const runtime = 'nodejs';

const schema = z.object({ topK: z.coerce.number().int().min(1).max(100).default(10) });

export async function GET(request: Request) {
  const parsed = schema.safeParse(Object.fromEntries(new URL(request.url).searchParams));
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.issues[0]?.message ?? 'Invalid query' }, { status: 400 });
  }

  try {
    const { feedback } = await getServices();
    const stats = await feedback.priorityStats(parsed.data.topK);
    return NextResponse.json({ fields: stats.map((stat) => stat.fieldName), stats });
  } catch (error) {
    return toErrorResponse(error, 'GET /api/error-reports/priority-fields');
  }
}
