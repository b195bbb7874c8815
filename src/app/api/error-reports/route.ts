import { NextResponse } from 'next/server';
import type { ApiError, SubmitErrorReportResponse } from '@shared/types/api';
import { z } from 'zod';
import { toErrorResponse } from '@/lib/errors';
import { MAX_QUERY_LIMIT } from '@/lib/feedback/aggregator';
import { REVIEW_STATUSES } from '@/lib/feedback/types';
import { readJsonBody } from '@/lib/http';
import { rateLimit } from '@/lib/rate-limit';
import { getServices } from '@/lib/services';

export const runtime = 'nodejs';

const querySchema = z.object({
  fieldName: z.string().trim().min(1).optional(),
  status: z.enum(REVIEW_STATUSES).optional(),
  analysisId: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_QUERY_LIMIT).optional(),
  format: z.enum(['json', 'csv']).default('json')
});

export async function POST(request: Request) {
  if (!rateLimit(request, 'error-reports')) {
    return NextResponse.json<ApiError>({ error: 'Too many requests' }, { status: 429 });
  }

  try {
    const body = await readJsonBody(request);
    const { feedback } = await getServices();
    return NextResponse.json<SubmitErrorReportResponse>(await feedback.submit(body), { status: 201 });
  } catch (error) {
    return toErrorResponse(error, 'POST /api/error-reports');
  }
}

export async function GET(request: Request) {
  const params = Object.fromEntries(new URL(request.url).searchParams);
  const parsed = querySchema.safeParse(params);
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.issues[0]?.message ?? 'Invalid query' }, { status: 400 });
  }

  const { format, ...filters } = parsed.data;
  try {
    const { feedback } = await getServices();
    if (format === 'csv') {
      return new NextResponse(await feedback.exportCsv(filters), {
        headers: {
          'Content-Type': 'text/csv; charset=utf-8',
          'Content-Disposition': 'attachment; filename="error-reports.csv"'
        }
      });
    }
    return NextResponse.json({ reports: await feedback.query(filters) });
  } catch (error) {
    return toErrorResponse(error, 'GET /api/error-reports');
  }
}
