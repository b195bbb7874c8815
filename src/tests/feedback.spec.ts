import { describe, it, expect, beforeEach, vi } from 'vitest';
import Papa from 'papaparse';
import { NotFoundError, SubmissionError } from '../lib/errors';
import { ErrorFeedbackAggregator, selectorPattern } from '../lib/feedback/aggregator';
import { InMemoryErrorReportStore } from '../lib/feedback/memory-report-store';
import { createAuditEmitter, type AuditEntry } from '../lib/side-channel';
import { flush, PRODUCT_URL } from './helpers';

function clock(start = Date.parse('2026-04-01T00:00:00.000Z')) {
  let current = start;
  return {
    now: () => new Date(current),
    tick: (ms = 1000) => {
      current += ms;
    }
  };
}

describe('ErrorFeedbackAggregator', () => {
  let store: InMemoryErrorReportStore;
  let audits: AuditEntry[];
  let time: ReturnType<typeof clock>;
  let aggregator: ErrorFeedbackAggregator;

  beforeEach(() => {
    store = new InMemoryErrorReportStore();
    audits = [];
    time = clock();
    aggregator = new ErrorFeedbackAggregator(store, (entry) => audits.push(entry), time.now);
  });

  async function report(fieldName: string, extra: Record<string, unknown> = {}) {
    time.tick();
    return aggregator.submit({ fieldName, issueType: 'mismatch', severity: 'medium', ...extra });
  }

  it('ranks fields by report count', async () => {
    await report('product_name');
    await report('price');
    await report('product_name');
    await report('product_name');

    expect(await aggregator.priorityFields(2)).toEqual(['product_name', 'price']);
    expect(await aggregator.priorityFields(1)).toEqual(['product_name']);
    expect(await aggregator.priorityFields(0)).toEqual([]);
  });

  it('breaks count ties by the most recent report, then by name', async () => {
    await report('shipping_info.shipping_fee');
    await report('reviews.review_count');
    await report('category');

    expect(await aggregator.priorityFields(10)).toEqual(['category', 'reviews.review_count', 'shipping_info.shipping_fee']);

    const sameTime = new ErrorFeedbackAggregator(new InMemoryErrorReportStore(), () => {}, () => new Date(0));
    await sameTime.submit({ fieldName: 'zeta', issueType: 'other' });
    await sameTime.submit({ fieldName: 'alpha', issueType: 'other' });
    expect(await sameTime.priorityFields(2)).toEqual(['alpha', 'zeta']);
  });

  it('returns at most topK fields in strictly descending count', async () => {
    for (const [field, times] of [['a', 1], ['b', 4], ['c', 2], ['d', 3]] as const) {
      for (let i = 0; i < times; i++) await report(field);
    }
    const stats = await aggregator.fieldStats();
    expect(stats.map((s) => [s.fieldName, s.reportCount])).toEqual([['b', 4], ['d', 3], ['c', 2], ['a', 1]]);
    expect(await aggregator.priorityFields(3)).toEqual(['b', 'd', 'c']);
  });

  it('answers whether a field is among the top reported ones', async () => {
    await report('product_name');
    await report('product_name');
    await report('price');

    expect(await aggregator.shouldPrioritizeField('product_name', 1)).toBe(true);
    expect(await aggregator.shouldPrioritizeField('price', 1)).toBe(false);
    expect(await aggregator.shouldPrioritizeField('price')).toBe(true);
    expect(await aggregator.shouldPrioritizeField('category')).toBe(false);
    expect((await aggregator.priorityStats(1)).map((s) => [s.fieldName, s.reportCount])).toEqual([['product_name', 2]]);
  });

  it('rejects invalid reports before storing them', async () => {
    await expect(aggregator.submit({ fieldName: '  ', issueType: 'mismatch' })).rejects.toThrow(
      'fieldName: fieldName is required'
    );
    await expect(aggregator.submit({ fieldName: 'price', issueType: 'typo' })).rejects.toBeInstanceOf(SubmissionError);
    expect(await aggregator.query()).toEqual([]);
  });

  it('stores non-string values as JSON text and defaults severity', async () => {
    const { errorReportId } = await aggregator.submit({
      analysisId: 'job-1',
      fieldName: 'price.sale_price',
      issueType: 'mismatch',
      crawlerValue: 4562,
      reportValue: { amount: 4500 }
    });

    const [stored] = await aggregator.query({ analysisId: 'job-1' });
    expect(stored).toMatchObject({
      id: errorReportId,
      severity: 'medium',
      status: 'pending',
      crawlerValue: '4562',
      reportValue: '{"amount":4500}'
    });
    expect(audits).toEqual([
      {
        jobId: 'job-1',
        action: 'ERROR_REPORT_SUBMITTED',
        entity: 'ErrorReport',
        entityId: errorReportId,
        payload: { fieldName: 'price.sale_price', issueType: 'mismatch', severity: 'medium' }
      }
    ]);
  });

  it('queries newest first with filters and a limit', async () => {
    await report('price');
    await report('product_name');
    await report('price', { severity: 'high' });

    const prices = await aggregator.query({ fieldName: 'price' });
    expect(prices.map((r) => r.severity)).toEqual(['high', 'medium']);
    expect((await aggregator.query({ limit: 1 })).map((r) => r.fieldName)).toEqual(['price']);
    expect(await aggregator.query({ limit: 10_000 })).toHaveLength(3);
  });

  it('marks reports resolved and stamps resolvedAt', async () => {
    const { errorReportId } = await report('category');
    time.tick(5000);

    const resolved = await aggregator.updateStatus(errorReportId, 'resolved');
    expect(resolved.status).toBe('resolved');
    expect(resolved.resolvedAt?.toISOString()).toBe('2026-04-01T00:00:06.000Z');

    const reopened = await aggregator.updateStatus(errorReportId, 'reviewed');
    expect(reopened.resolvedAt).toBeUndefined();
    expect(await aggregator.query({ status: 'reviewed' })).toHaveLength(1);

    await expect(aggregator.updateStatus('missing', 'resolved')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('exports the queried reports as CSV', async () => {
    await report('price', { crawlerValue: '4,562円', reportValue: '4500', description: 'says "4500"' });

    const rows = Papa.parse<Record<string, string>>(await aggregator.exportCsv(), { header: true }).data;
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      fieldName: 'price',
      issueType: 'mismatch',
      crawlerValue: '4,562円',
      reportValue: '4500',
      description: 'says "4500"',
      selectorPattern: '',
      createdAt: '2026-04-01T00:00:01.000Z',
      resolvedAt: ''
    });
  });

  it('keeps page structure with a report and serves it back per field', async () => {
    const first = await report('price', {
      sourceRef: PRODUCT_URL,
      pageStructure: { relatedClasses: ['sale'], elementPresent: true, classFrequency: { sale: 3, 'price-box': 1 } }
    });
    await report('price');
    const third = await report('price', { pageStructure: {} });
    await report('category', { pageStructure: { classFrequency: { crumb: 2 } } });

    expect(await aggregator.chunksForField('price')).toEqual([
      {
        errorReportId: third.errorReportId,
        fieldName: 'price',
        relatedClasses: [],
        elementPresent: false,
        classFrequency: {},
        reportedAt: new Date('2026-04-01T00:00:03.000Z')
      },
      {
        errorReportId: first.errorReportId,
        fieldName: 'price',
        sourceRef: PRODUCT_URL,
        relatedClasses: ['sale'],
        elementPresent: true,
        classFrequency: { sale: 3, 'price-box': 1 },
        selectorPattern: '.sale > .price-box',
        reportedAt: new Date('2026-04-01T00:00:01.000Z')
      }
    ]);

    await aggregator.updateStatus(first.errorReportId, 'resolved');
    expect((await aggregator.chunksForField('price')).map((c) => c.errorReportId)).toEqual([third.errorReportId]);
  });

  it('builds the selector from the three most frequent classes', () => {
    expect(selectorPattern({ wrap: 1, 'price-box': 5, sale: 9, 'goods-info': 5 })).toBe('.sale > .goods-info > .price-box');
    expect(selectorPattern({ only: 2 })).toBe('.only');
    expect(selectorPattern({})).toBeUndefined();
  });

  it('rejects a negative class frequency', async () => {
    await expect(
      aggregator.submit({ fieldName: 'price', issueType: 'missing', pageStructure: { classFrequency: { sale: -1 } } })
    ).rejects.toBeInstanceOf(SubmissionError);
  });

  it('never lets an audit failure reach the submitter', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const failing = new ErrorFeedbackAggregator(
      store,
      createAuditEmitter(async () => {
        throw new Error('audit log offline');
      }),
      time.now
    );

    await expect(failing.submit({ fieldName: 'price', issueType: 'missing' })).resolves.toHaveProperty('errorReportId');
    await flush();
    expect(warn).toHaveBeenCalledWith('[Audit] ERROR_REPORT_SUBMITTED on ErrorReport not recorded: audit log offline');
    expect(await failing.priorityFields(1)).toEqual(['price']);
  });

  it('keeps the emitter from throwing on a synchronous sink failure', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const emit = createAuditEmitter(() => {
      throw new Error('sink exploded');
    });
    expect(() => emit({ action: 'X', entity: 'Y' })).not.toThrow();
  });
});
