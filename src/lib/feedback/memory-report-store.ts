import { Types } from 'mongoose';
import type {
  ErrorReport,
  ErrorReportFilter,
  ErrorReportStore,
  FieldPriorityStat,
  NewErrorReport,
  ReviewStatus
} from './types';

export class InMemoryErrorReportStore implements ErrorReportStore {
  private reports: ErrorReport[] = [];

  async insert(report: NewErrorReport, at: Date): Promise<ErrorReport> {
    const stored: ErrorReport = { ...report, id: new Types.ObjectId().toString(), status: 'pending', createdAt: at };
    this.reports.push(stored);
    return structuredClone(stored);
  }

  async find(filter: ErrorReportFilter): Promise<ErrorReport[]> {
    const matches = this.reports.filter(
      (report) =>
        (filter.fieldName === undefined || report.fieldName === filter.fieldName) &&
        (filter.status === undefined || report.status === filter.status) &&
        (filter.analysisId === undefined || report.analysisId === filter.analysisId)
    );
    // Newest first; among equal timestamps the later insert wins.
    return matches
      .map((report, order) => ({ report, order }))
      .sort((a, b) => b.report.createdAt.getTime() - a.report.createdAt.getTime() || b.order - a.order)
      .slice(0, filter.limit)
      .map(({ report }) => structuredClone(report));
  }

  async fieldStats(): Promise<FieldPriorityStat[]> {
    const stats = new Map<string, FieldPriorityStat>();
    for (const report of this.reports) {
      const entry = stats.get(report.fieldName);
      if (!entry) {
        stats.set(report.fieldName, { fieldName: report.fieldName, reportCount: 1, lastReportedAt: report.createdAt });
        continue;
      }
      entry.reportCount += 1;
      if (report.createdAt > entry.lastReportedAt) entry.lastReportedAt = report.createdAt;
    }
    return [...stats.values()].map((stat) => ({ ...stat, lastReportedAt: new Date(stat.lastReportedAt) }));
  }

  async updateStatus(id: string, status: ReviewStatus, at: Date): Promise<ErrorReport | null> {
    const index = this.reports.findIndex((report) => report.id === id);
    const current = this.reports[index];
    if (!current) return null;

    const updated: ErrorReport = { ...current, status, resolvedAt: status === 'resolved' ? at : undefined };
    this.reports[index] = updated;
    return structuredClone(updated);
  }
}
