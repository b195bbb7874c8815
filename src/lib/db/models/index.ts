export { AnalysisJobModel, type AnalysisJobDocument } from './AnalysisJob';
export { ErrorReportModel, type ErrorReportDocument } from './ErrorReport';
export { AuditLog, type AuditLogDocument } from './AuditLog';
