/**
 * Report Writer
 * Persists incident reports as Markdown files
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PersistenceError, createChildLogger, errorMessage } from '@kubemend/shared';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `YYYYMMDD_HHMMSS` in UTC
 */
export function formatReportTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}

export function reportFileName(date: Date, sequence: number): string {
  return `incident_report_${formatReportTimestamp(date)}_${sequence}.md`;
}

export class ReportWriter {
  private logger = createChildLogger({ component: 'ReportWriter' });
  private reportDir: string;
  private sequence = 0;

  constructor(reportDir: string) {
    this.reportDir = reportDir;
  }

  /**
   * Write one report. Returns the file path, or null when the write failed;
   * failures never interrupt the run.
   */
  async write(report: string, generatedAt: Date = new Date()): Promise<string | null> {
    this.sequence += 1;
    const path = join(this.reportDir, reportFileName(generatedAt, this.sequence));

    try {
      await mkdir(this.reportDir, { recursive: true });
      await writeFile(path, report, 'utf-8');
      this.logger.info({ path }, 'Incident report saved');
      return path;
    } catch (error) {
      const failure = new PersistenceError(`Failed to write incident report: ${errorMessage(error)}`, {
        path,
      });
      this.logger.warn({ error: failure.toJSON() }, failure.message);
      return null;
    }
  }
}
