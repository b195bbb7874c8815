import * as XLSX from 'xlsx';
import type { AnalysisJob, FinalResult } from '@/lib/pipeline/types';

export const DOWNLOAD_FORMATS = ['markdown', 'xlsx', 'json'] as const;
export type DownloadFormat = (typeof DOWNLOAD_FORMATS)[number];

export type DownloadArtifact = {
  filename: string;
  contentType: string;
  body: Uint8Array<ArrayBuffer>;
};

const MIME: Record<DownloadFormat, string> = {
  markdown: 'text/markdown; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  json: 'application/json; charset=utf-8'
};

const EXTENSION: Record<DownloadFormat, string> = {
  markdown: 'md',
  xlsx: 'xlsx',
  json: 'json'
};

export function isDownloadFormat(value: string): value is DownloadFormat {
  return DOWNLOAD_FORMATS.some((format) => format === value);
}

function utf8(text: string): Uint8Array<ArrayBuffer> {
  return new Uint8Array(new TextEncoder().encode(text));
}

/** Cell text for an arbitrary harvested or reported value. */
function cell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export function buildWorkbook(job: AnalysisJob, result: FinalResult): XLSX.WorkBook {
  const { analysis, checklist, validation } = result;

  const summary = [
    { metric: 'Source', value: job.sourceRef },
    { metric: 'Kind', value: job.kind },
    { metric: 'Overall score', value: analysis.overallScore },
    { metric: 'Checklist completion (%)', value: checklist.completionRate ?? '' },
    { metric: 'Validation score', value: validation?.validationScore ?? '' },
    { metric: 'Valid', value: validation ? (validation.isValid ? 'yes' : 'no') : 'not validated' },
    { metric: 'Threshold', value: validation?.threshold ?? '' },
    { metric: 'Completed at', value: job.updatedAt.toISOString() }
  ];

  const corrected = new Set(validation?.correctedFields ?? []);
  const mismatches = (validation?.mismatches ?? []).map((mismatch) => ({
    field: mismatch.field,
    crawler_value: cell(mismatch.crawlerValue),
    report_value: cell(mismatch.reportValue),
    corrected: corrected.has(mismatch.field) ? 'yes' : 'no'
  }));

  const missing = (validation?.missingItems ?? []).map((item) => ({
    field: item.field,
    checklist_item_id: item.checklistItemId
  }));

  const items = checklist.categories.flatMap((category) =>
    category.items.map((item) => ({
      category: category.name,
      id: item.id,
      title: item.title,
      status: item.status,
      auto_checked: item.autoChecked ? 'yes' : 'no'
    }))
  );

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(summary), 'Summary');
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(mismatches, { header: ['field', 'crawler_value', 'report_value', 'corrected'] }),
    'Mismatches'
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(missing, { header: ['field', 'checklist_item_id'] }),
    'Missing Items'
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(items, { header: ['category', 'id', 'title', 'status', 'auto_checked'] }),
    'Checklist'
  );
  return workbook;
}

export function renderDownload(job: AnalysisJob, result: FinalResult, format: DownloadFormat): DownloadArtifact {
  const filename = `analysis-${job.id}.${EXTENSION[format]}`;
  const contentType = MIME[format];

  switch (format) {
    case 'markdown':
      return { filename, contentType, body: utf8(result.report.document) };
    case 'json':
      return { filename, contentType, body: utf8(JSON.stringify(result, null, 2)) };
    case 'xlsx': {
      const data: ArrayBuffer = XLSX.write(buildWorkbook(job, result), { type: 'array', bookType: 'xlsx' });
      return { filename, contentType, body: new Uint8Array(data) };
    }
  }
}
