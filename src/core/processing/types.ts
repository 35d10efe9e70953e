/**
 * @arch fmtkit.core.types
 */
import type { LineEnding } from '../config/schema.js';
import type { FormatterId } from '../../formatters/interface.types.js';

/** Terminal result of one file's pipeline. */
export type FormatOutcome = 'success' | 'fail' | 'skipped';

/**
 * Why a file ended with its outcome.
 * - cached: current digest equals the one recorded by an earlier run
 * - unsupported: no initialized formatter for the extension
 * - unchanged: the formatter produced the same content
 * - formatted: the file was rewritten (or would be, in dry-run mode)
 * - missing / read-only: precondition checks done by the run
 * - read-error / format-error / write-error: failures
 */
export type OutcomeReason =
  | 'cached'
  | 'unsupported'
  | 'unchanged'
  | 'formatted'
  | 'missing'
  | 'read-only'
  | 'read-error'
  | 'format-error'
  | 'write-error';

export interface FileResult {
  /** Absolute path */
  file: string;
  /** Project-relative cache key */
  relativePath: string;
  /** Null for read-only files, which are counted apart from the outcomes */
  outcome: FormatOutcome | null;
  reason: OutcomeReason;
  formatter: FormatterId | null;
  /** Error message for failures */
  message?: string;
}

/**
 * Per-run settings of the file pipeline.
 */
export interface ProcessingOptions {
  projectRoot: string;
  lineEnding: LineEnding;
  encoding: BufferEncoding;
  /** Format without writing files or updating the cache */
  dryRun?: boolean;
}
