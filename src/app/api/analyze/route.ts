import { NextResponse } from 'next/server';
import type { ApiError, SubmitAnalysisResponse } from '@shared/types/api';
import { toErrorResponse } from '@/lib/errors';
import { readJsonBody } from '@/lib/http';
import { rateLimit } from '@/lib/rate-limit';
import { getServices } from '@/lib/services';

export const runtime = 'nodejs';

export async function POST(request: Request) {
  if (!rateLimit(request, 'analyze')) {
    return NextResponse.json<ApiError>({ error: 'Too many requests' }, { status: 429 });
  }

  try {
    const body = await readJsonBody(request);
    const { analyses } = await getServices();
    const submitted = await analyses.submit(body);
    return NextResponse.json<SubmitAnalysisResponse>(submitted, { status: 202 });
  } catch (error) {
    return toErrorResponse(error, 'POST /api/analyze');
  }
}
