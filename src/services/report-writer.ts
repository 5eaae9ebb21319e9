/**
 * Report Writer
 * Persists the combined report as <owner>_<repo>_<YYYYMMDD_HHMMSS>.json
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CombinedReport, RepositoryRef } from '../types/index.js';
import { ProgressReporter, silentProgress } from './progress-reporter.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time timestamp in YYYYMMDD_HHMMSS form
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function reportFileName(repository: RepositoryRef, date: Date): string {
  return `${repository.owner}_${repository.name}_${formatTimestamp(date)}.json`;
}

export interface ReportWriterOptions {
  progress?: ProgressReporter;
}

export class ReportWriter {
  private progress: ProgressReporter;

  constructor(private readonly outputDir: string, options: ReportWriterOptions = {}) {
    this.progress = options.progress ?? silentProgress;
  }

  /**
   * Write the report and return its path
   */
  async write(report: CombinedReport, repository: RepositoryRef, date: Date = new Date()): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });

    const filePath = join(this.outputDir, reportFileName(repository, date));
    await writeFile(filePath, JSON.stringify(report, null, 2), 'utf-8');

    this.progress.step('='.repeat(60));
    this.progress.info('✅ ANALYSIS COMPLETE');
    this.progress.info('='.repeat(60));
    this.progress.info(`📁 Output saved to: ${filePath}`);
    this.progress.info(`📊 Services found: ${report.repository.services.length}`);
    this.progress.info(`🐛 Open issues: ${report.issues.summary.total_open_issues}`);
    this.progress.info(`🔗 Connections: ${report.repository.connections.length}`);
    this.progress.info('='.repeat(60));

    return filePath;
  }
}
