/**
 * Incident reporting and report persistence
 */

export { IncidentReporter, renderIncidentReport } from './incident-reporter.js';
export type { IncidentReporterConfig } from './incident-reporter.js';
export { ReportWriter, formatReportTimestamp, reportFileName } from './report-writer.js';
