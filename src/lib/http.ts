import { SubmissionError } from '@/lib/errors';

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new SubmissionError('Request body must be valid JSON');
  }
}

export type RouteContext<P extends Record<string, string>> = { params: Promise<P> };
