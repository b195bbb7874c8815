import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { POST as submitAnalysis } from '../app/api/analyze/route';
import { GET as pollAnalysis } from '../app/api/analyze/[id]/route';
import { POST as cancelAnalysis } from '../app/api/analyze/[id]/cancel/route';
import { GET as downloadAnalysis } from '../app/api/analyze/[id]/download/route';
import { GET as analysisEvents } from '../app/api/analyze/[id]/events/route';
import { GET as listReports, POST as submitReport } from '../app/api/error-reports/route';
import { PATCH as updateReport } from '../app/api/error-reports/[id]/route';
import { GET as structureChunks } from '../app/api/error-reports/chunks/route';
import { GET as priorityFields } from '../app/api/error-reports/priority-fields/route';
import type {
  AnalysisResultPayload,
  CancelResponse,
  ErrorReportListResponse,
  PollResponse,
  PriorityFieldsResponse,
  StructureChunksResponse,
  SubmitAnalysisPayload,
  SubmitAnalysisResponse,
  SubmitErrorReportPayload,
  SubmitErrorReportResponse,
  UpdateErrorReportResponse
} from '@shared/types/api';
import { LocalWorkerPool } from '../lib/queue/analysis-queue';
import { resetRateLimits } from '../lib/rate-limit';
import { buildServices, setServices, type Services } from '../lib/services';
import { deferred, fakeCollaborators, PRODUCT_URL, testConfig, type FakeCollaboratorOptions } from './helpers';

const BASE = 'http://localhost:3000';
const PRODUCT_SUBMISSION: SubmitAnalysisPayload = { sourceRef: PRODUCT_URL };

function jsonRequest(path: string, method: string, body: unknown, ip = '203.0.113.10'): Request {
  return new Request(`${BASE}${path}`, {
    method,
    headers: { 'Content-Type': 'application/json', 'x-forwarded-for': ip },
    body: typeof body === 'string' ? body : JSON.stringify(body)
  });
}

function params<P extends Record<string, string>>(value: P) {
  return { params: Promise.resolve(value) };
}

let services: Services;

function install(opts: FakeCollaboratorOptions = {}) {
  services = buildServices({ config: testConfig(), collaborators: fakeCollaborators(opts) });
  setServices(services);
}

async function settle() {
  if (services.queue instanceof LocalWorkerPool) await services.queue.onIdle();
}

async function submit(): Promise<string> {
  const response = await submitAnalysis(jsonRequest('/api/analyze', 'POST', PRODUCT_SUBMISSION));
  const body: SubmitAnalysisResponse = await response.json();
  return body.jobId;
}

describe('analysis routes', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    resetRateLimits();
    install();
  });

  afterEach(() => {
    setServices(null);
  });

  it('accepts a submission with 202', async () => {
    const response = await submitAnalysis(jsonRequest('/api/analyze', 'POST', PRODUCT_SUBMISSION));
    expect(response.status).toBe(202);
    expect(await response.json()).toMatchObject({ status: 'queued', kindDetected: 'single-item' });
    await settle();
  });

  it('answers 400 for malformed JSON and invalid URLs', async () => {
    const broken = await submitAnalysis(jsonRequest('/api/analyze', 'POST', '{"sourceRef":'));
    expect(broken.status).toBe(400);
    expect(await broken.json()).toEqual({ error: 'Request body must be valid JSON' });

    const invalid = await submitAnalysis(jsonRequest('/api/analyze', 'POST', { sourceRef: 'nope' }));
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({ error: 'sourceRef is not a valid URL: nope' });
  });

  it('rate limits submissions per client', async () => {
    const statuses: number[] = [];
    for (let i = 0; i < 31; i++) {
      const response = await submitAnalysis(jsonRequest('/api/analyze', 'POST', { sourceRef: 'nope' }, '198.51.100.7'));
      statuses.push(response.status);
    }
    expect(statuses.slice(0, 30).every((status) => status === 400)).toBe(true);
    expect(statuses[30]).toBe(429);

    const other = await submitAnalysis(jsonRequest('/api/analyze', 'POST', { sourceRef: 'nope' }, '198.51.100.8'));
    expect(other.status).toBe(400);
  });

  it('answers 404 for an unknown job', async () => {
    const response = await pollAnalysis(new Request(`${BASE}/api/analyze/unknown`), params({ id: 'unknown' }));
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Analysis unknown not found' });
  });

  it('polls a completed job', async () => {
    const jobId = await submit();
    await settle();

    const response = await pollAnalysis(new Request(`${BASE}/api/analyze/${jobId}`), params({ id: jobId }));
    const body: PollResponse = await response.json();
    expect(response.status).toBe(200);
    expect(body.status).toBe('completed');
    expect(body.validation?.mismatches).toEqual([{ field: 'price.sale_price', crawlerValue: 4562, reportValue: 4500 }]);
    const result: AnalysisResultPayload | undefined = body.result;
    expect(result?.report.document).toBe(`# Report for ${PRODUCT_URL}\n\nScore: 72\n`);
    expect(result?.validation).toEqual(body.validation);
  });

  it('answers 409 for a download before completion', async () => {
    const gate = deferred<void>();
    install({ analyzeGate: gate.promise });
    const jobId = await submit();

    const response = await downloadAnalysis(
      new Request(`${BASE}/api/analyze/${jobId}/download?format=markdown`),
      params({ id: jobId })
    );
    expect(response.status).toBe(409);

    gate.resolve();
    await settle();
  });

  it('downloads the markdown report as an attachment', async () => {
    const jobId = await submit();
    await settle();

    const response = await downloadAnalysis(new Request(`${BASE}/api/analyze/${jobId}/download`), params({ id: jobId }));
    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('text/markdown; charset=utf-8');
    expect(response.headers.get('Content-Disposition')).toBe(`attachment; filename="analysis-${jobId}.md"`);
    expect(await response.text()).toBe(`# Report for ${PRODUCT_URL}\n\nScore: 72\n`);
  });

  it('answers 400 for an unknown download format', async () => {
    const jobId = await submit();
    await settle();
    const response = await downloadAnalysis(
      new Request(`${BASE}/api/analyze/${jobId}/download?format=pdf`),
      params({ id: jobId })
    );
    expect(response.status).toBe(400);
  });

  it('reports a cancel on a finished job as a no-op', async () => {
    const jobId = await submit();
    await settle();
    const response = await cancelAnalysis(
      new Request(`${BASE}/api/analyze/${jobId}/cancel`, { method: 'POST' }),
      params({ id: jobId })
    );
    const body: CancelResponse = await response.json();
    expect(body).toEqual({ jobId, status: 'completed', cancelled: false });
  });

  it('streams a terminal progress event and closes', async () => {
    const jobId = await submit();
    await settle();

    const response = await analysisEvents(new Request(`${BASE}/api/analyze/${jobId}/events`), params({ id: jobId }));
    expect(response.headers.get('Content-Type')).toBe('text/event-stream');
    expect(await response.text()).toBe(
      'event: progress\ndata: {"status":"completed","progress":{"stage":"completed","percentage":100}}\n\n'
    );
  });

  it('answers 404 before opening a stream for an unknown job', async () => {
    const response = await analysisEvents(new Request(`${BASE}/api/analyze/x/events`), params({ id: 'x' }));
    expect(response.status).toBe(404);
  });
});

describe('error report routes', () => {
  beforeEach(() => {
    resetRateLimits();
    install();
  });

  afterEach(() => {
    setServices(null);
  });

  async function fileReport(fieldName: string, extra: Partial<SubmitErrorReportPayload> = {}) {
    const payload: SubmitErrorReportPayload = { fieldName, issueType: 'mismatch', severity: 'high', ...extra };
    const response = await submitReport(jsonRequest('/api/error-reports', 'POST', payload));
    expect(response.status).toBe(201);
    const body: SubmitErrorReportResponse = await response.json();
    return body.errorReportId;
  }

  it('accepts reports and ranks priority fields', async () => {
    await fileReport('product_name');
    await fileReport('product_name');
    await fileReport('product_name');
    await fileReport('price');

    const response = await priorityFields(new Request(`${BASE}/api/error-reports/priority-fields?topK=2`));
    const body: PriorityFieldsResponse = await response.json();
    expect(body.fields).toEqual(['product_name', 'price']);
    expect(body.stats[0]).toMatchObject({ fieldName: 'product_name', reportCount: 3 });
  });

  it('serves the page structure chunks of a field', async () => {
    const id = await fileReport('price', {
      pageStructure: { relatedClasses: ['sale'], elementPresent: true, classFrequency: { sale: 4, 'price-box': 2 } }
    });
    await fileReport('category');

    const response = await structureChunks(new Request(`${BASE}/api/error-reports/chunks?fieldName=price`));
    const body: StructureChunksResponse = await response.json();
    expect(body.fieldName).toBe('price');
    expect(body.prioritized).toBe(true);
    expect(body.chunks).toHaveLength(1);
    expect(body.chunks[0]).toMatchObject({ errorReportId: id, selectorPattern: '.sale > .price-box', elementPresent: true });

    const missing = await structureChunks(new Request(`${BASE}/api/error-reports/chunks`));
    expect(missing.status).toBe(400);
  });

  it('answers 400 for an invalid report', async () => {
    const response = await submitReport(jsonRequest('/api/error-reports', 'POST', { issueType: 'mismatch' }));
    expect(response.status).toBe(400);
  });

  it('lists reports filtered by field and exports CSV', async () => {
    await fileReport('price');
    await fileReport('category');

    const list = await listReports(new Request(`${BASE}/api/error-reports?fieldName=price`));
    const body: ErrorReportListResponse = await list.json();
    expect(body.reports.map((r) => r.fieldName)).toEqual(['price']);

    const csv = await listReports(new Request(`${BASE}/api/error-reports?format=csv`));
    expect(csv.headers.get('Content-Type')).toBe('text/csv; charset=utf-8');
    expect((await csv.text()).split('\r\n')[0]).toBe(
      'id,createdAt,analysisId,sourceRef,fieldName,issueType,severity,status,crawlerValue,reportValue,description,selectorPattern,resolvedAt'
    );
  });

  it('answers 400 for a limit above the maximum', async () => {
    const response = await listReports(new Request(`${BASE}/api/error-reports?limit=501`));
    expect(response.status).toBe(400);
  });

  it('updates review status and answers 404 for unknown reports', async () => {
    const id = await fileReport('price');

    const resolved = await updateReport(jsonRequest(`/api/error-reports/${id}`, 'PATCH', { status: 'resolved' }), params({ id }));
    const body: UpdateErrorReportResponse = await resolved.json();
    expect(body.report.status).toBe('resolved');
    expect(typeof body.report.resolvedAt).toBe('string');

    const missing = await updateReport(
      jsonRequest('/api/error-reports/missing', 'PATCH', { status: 'reviewed' }),
      params({ id: 'missing' })
    );
    expect(missing.status).toBe(404);

    const invalid = await updateReport(jsonRequest(`/api/error-reports/${id}`, 'PATCH', { status: 'done' }), params({ id }));
    expect(invalid.status).toBe(400);
  });
});
