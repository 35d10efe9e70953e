/**
 * @arch fmtkit.cli.types
 *
 * Run summary formatter type definitions.
 */
import type { RunReport } from '../../core/run/types.js';

export type OutputFormat = 'human' | 'json';

export interface SummaryOptions {
  /** Use colors in output */
  colors: boolean;
  /** List every file with its outcome */
  verbose: boolean;
  /** The run did not write anything */
  dryRun: boolean;
}

/**
 * Renders a run report for the terminal or for machines.
 */
export interface ISummaryFormatter {
  format(report: RunReport): string;
}
