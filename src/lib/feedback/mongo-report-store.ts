import { Types, type FilterQuery } from 'mongoose';
import { ErrorReportModel, type ErrorReportDocument } from '@/lib/db/models';
import type {
  ErrorReport,
  ErrorReportFilter,
  ErrorReportStore,
  FieldPriorityStat,
  IssueType,
  NewErrorReport,
  PageStructure,
  ReviewStatus,
  Severity
} from './types';

type PageStructureRecord = {
  related_classes: string[];
  element_present: boolean;
  class_frequency: Record<string, number>;
  selector_pattern?: string | null;
};

type ErrorReportRecord = {
  _id: Types.ObjectId;
  analysis_id?: string | null;
  source_ref?: string | null;
  field_name: string;
  issue_type: IssueType;
  severity: Severity;
  description?: string | null;
  crawler_value?: string | null;
  report_value?: string | null;
  page_structure?: PageStructureRecord | null;
  status: ReviewStatus;
  resolved_at?: Date | null;
  createdAt: Date;
};

function toPageStructure(record: PageStructureRecord): PageStructure {
  return {
    relatedClasses: record.related_classes,
    elementPresent: record.element_present,
    classFrequency: record.class_frequency,
    selectorPattern: record.selector_pattern ?? undefined
  };
}

function toReport(record: ErrorReportRecord): ErrorReport {
  return {
    id: record._id.toString(),
    analysisId: record.analysis_id ?? undefined,
    sourceRef: record.source_ref ?? undefined,
    fieldName: record.field_name,
    issueType: record.issue_type,
    severity: record.severity,
    description: record.description ?? undefined,
    crawlerValue: record.crawler_value ?? undefined,
    reportValue: record.report_value ?? undefined,
    pageStructure: record.page_structure ? toPageStructure(record.page_structure) : undefined,
    status: record.status,
    createdAt: record.createdAt,
    resolvedAt: record.resolved_at ?? undefined
  };
}

export class MongoErrorReportStore implements ErrorReportStore {
  // createdAt comes from the schema timestamps, not the caller's clock.
  async insert(report: NewErrorReport): Promise<ErrorReport> {
    const doc = await ErrorReportModel.create({
      analysis_id: report.analysisId,
      source_ref: report.sourceRef,
      field_name: report.fieldName,
      issue_type: report.issueType,
      severity: report.severity,
      description: report.description,
      crawler_value: report.crawlerValue,
      report_value: report.reportValue,
      page_structure: report.pageStructure && {
        related_classes: report.pageStructure.relatedClasses,
        element_present: report.pageStructure.elementPresent,
        class_frequency: report.pageStructure.classFrequency,
        selector_pattern: report.pageStructure.selectorPattern
      },
      status: 'pending'
    });
    return toReport(doc.toObject<ErrorReportRecord>());
  }

  async find(filter: ErrorReportFilter): Promise<ErrorReport[]> {
    const query: FilterQuery<ErrorReportDocument> = {};
    if (filter.fieldName !== undefined) query.field_name = filter.fieldName;
    if (filter.status !== undefined) query.status = filter.status;
    if (filter.analysisId !== undefined) query.analysis_id = filter.analysisId;

    const records = await ErrorReportModel.find(query)
      .sort({ createdAt: -1, _id: -1 })
      .limit(filter.limit)
      .lean<ErrorReportRecord[]>();
    return records.map(toReport);
  }

  async fieldStats(): Promise<FieldPriorityStat[]> {
    const groups = await ErrorReportModel.aggregate<{ _id: string; count: number; last: Date }>([
      { $group: { _id: '$field_name', count: { $sum: 1 }, last: { $max: '$createdAt' } } }
    ]);
    return groups.map((group) => ({ fieldName: group._id, reportCount: group.count, lastReportedAt: group.last }));
  }

  async updateStatus(id: string, status: ReviewStatus, at: Date): Promise<ErrorReport | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const update =
      status === 'resolved'
        ? { $set: { status, resolved_at: at } }
        : { $set: { status }, $unset: { resolved_at: 1 } };
    const record = await ErrorReportModel.findByIdAndUpdate(id, update, { new: true }).lean<ErrorReportRecord | null>();
    return record ? toReport(record) : null;
  }
}
