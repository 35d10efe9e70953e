/**
 * @arch fmtkit.cli.formatter
 */
import type { RunReport } from '../../core/run/types.js';
import type { ISummaryFormatter, SummaryOptions } from './types.js';

/**
 * JSON run summary for machine consumption.
 */
export class JsonFormatter implements ISummaryFormatter {
  private dryRun: boolean;

  constructor(options: Partial<SummaryOptions> = {}) {
    this.dryRun = options.dryRun ?? false;
  }

  format(report: RunReport): string {
    return JSON.stringify({
      dry_run: this.dryRun,
      statistics: {
        success: report.statistics.successCount,
        fail: report.statistics.failCount,
        skipped: report.statistics.skippedCount,
        read_only: report.statistics.readOnlyCount,
      },
      files: report.results.map((r) => ({
        path: r.relativePath,
        outcome: r.outcome ?? 'read-only',
        reason: r.reason,
        formatter: r.formatter,
        ...(r.message ? { message: r.message } : {}),
      })),
      not_started: report.notStarted,
      cache_persisted: report.cachePersisted,
      duration_ms: report.durationMs,
    }, null, 2);
  }
}
