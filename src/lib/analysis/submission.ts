import { z } from 'zod';
import type { SubmitAnalysisPayload } from '@shared/types/api';
import { SubmissionError } from '@/lib/errors';
import type { AnalysisKind } from '@/lib/pipeline/types';

export const submissionSchema = z.object({
  sourceRef: z.string({ required_error: 'sourceRef is required' }).trim().min(1, 'sourceRef is required').max(2048),
  kind: z.enum(['single-item', 'collection']).optional()
}) satisfies z.ZodType<SubmitAnalysisPayload>;

export type ValidSubmission = {
  sourceRef: string;
  kind: AnalysisKind;
};

/** Kind implied by a listing URL's path, or null when the path names neither. */
export function detectKind(url: URL): AnalysisKind | null {
  const path = url.pathname.toLowerCase();
  if (path.includes('/goods/') || path.endsWith('goods.aspx')) return 'single-item';
  if (path.includes('/shop/')) return 'collection';
  return null;
}

function hostAllowed(hostname: string, allowedHosts: string[]): boolean {
  if (allowedHosts.length === 0) return true;
  const host = hostname.toLowerCase();
  return allowedHosts.some((allowed) => host === allowed || host.endsWith(`.${allowed}`));
}

/**
 * Checks a submission before any job exists. Throws SubmissionError for a
 * malformed URL, a host outside the allow-list, or a path whose kind cannot
 * be told and was not given.
 */
export function validateSubmission(input: unknown, allowedHosts: string[]): ValidSubmission {
  const parsed = submissionSchema.safeParse(input);
  if (!parsed.success) {
    throw new SubmissionError(parsed.error.issues[0]?.message ?? 'Invalid payload');
  }

  let url: URL;
  try {
    url = new URL(parsed.data.sourceRef);
  } catch {
    throw new SubmissionError(`sourceRef is not a valid URL: ${parsed.data.sourceRef}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new SubmissionError(`sourceRef must use http or https, got ${url.protocol.replace(/:$/, '')}`);
  }
  if (!hostAllowed(url.hostname, allowedHosts)) {
    throw new SubmissionError(`sourceRef host ${url.hostname} is not an allowed listing host`);
  }

  const kind = parsed.data.kind ?? detectKind(url);
  if (!kind) {
    throw new SubmissionError('Cannot tell a single item from a collection by this URL; pass kind explicitly');
  }

  return { sourceRef: url.toString(), kind };
}
