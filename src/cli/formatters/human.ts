/**
 * @arch fmtkit.cli.formatter
 */
import chalk from 'chalk';
import type { RunReport } from '../../core/run/types.js';
import type { FileResult } from '../../core/processing/types.js';
import type { ISummaryFormatter, SummaryOptions } from './types.js';

const FILE_S = ' file(s)';
const LABEL_WIDTH = 33;

type Color = 'green' | 'red' | 'yellow' | 'dim';

/**
 * Human-readable run summary.
 */
export class HumanFormatter implements ISummaryFormatter {
  private options: SummaryOptions;

  constructor(options: Partial<SummaryOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      dryRun: options.dryRun ?? false,
    };
  }

  format(report: RunReport): string {
    const lines: string[] = [];
    const stats = report.statistics;

    // Failures are always listed, everything else only in verbose mode
    const listed = this.options.verbose
      ? report.results
      : report.results.filter((r) => r.outcome === 'fail');
    for (const result of listed) {
      lines.push(this.formatFile(result));
    }
    if (listed.length > 0) lines.push('');

    const formattedLabel = this.options.dryRun ? 'Would be formatted:' : 'Successfully formatted:';
    lines.push(this.row(formattedLabel, `${stats.successCount}${FILE_S}`, stats.successCount > 0 ? 'green' : undefined));
    lines.push(this.row('Fail to format:', `${stats.failCount}${FILE_S}`, stats.failCount > 0 ? 'red' : undefined));
    lines.push(this.row('Skipped:', `${stats.skippedCount}${FILE_S}`));
    lines.push(this.row('Read only skipped:', `${stats.readOnlyCount}${FILE_S}`, stats.readOnlyCount > 0 ? 'yellow' : undefined));
    lines.push(this.row('Approximate time taken:', `${Math.floor(report.durationMs / 1000)}s`));

    if (report.notStarted > 0) {
      lines.push(this.colorize(`Run aborted: ${report.notStarted}${FILE_S} not processed`, 'yellow'));
    }

    return lines.join('\n');
  }

  private formatFile(result: FileResult): string {
    switch (result.outcome) {
      case 'success':
        return `${this.colorize('✓', 'green')} ${result.relativePath}`;
      case 'fail':
        return `${this.colorize('✗', 'red')} ${result.relativePath}${result.message ? `: ${result.message}` : ''}`;
      case 'skipped':
        return `${this.colorize('-', 'dim')} ${result.relativePath} (${result.reason})`;
      case null:
        return `${this.colorize('!', 'yellow')} ${result.relativePath} (read-only)`;
    }
  }

  private row(label: string, value: string, color?: Color): string {
    const text = `${label.padEnd(LABEL_WIDTH)}${value}`;
    return color ? this.colorize(text, color) : text;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    switch (color) {
      case 'green':
        return chalk.green(text);
      case 'red':
        return chalk.red(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
