export { SessionLog } from './SessionLog';
export { buildReport, formatClockTime, formatRecordRow, REPORT_HEADER } from './ReportGenerator';
export type { ReportContext, ReportFormatOptions } from './ReportGenerator';
export { CSVReportSink } from './CSVReportSink';
export type {
    LatencyRecord,
    LatencyRecordFields,
    ReportSink,
    SessionEndReason,
    SessionReport,
    SessionState,
    SessionSummary,
} from './types';
