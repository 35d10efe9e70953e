/**
 * @arch fmtkit.core.types
 */
import type { LineEnding } from '../config/schema.js';
import type { FileResult } from '../processing/types.js';
import type { RunCounts } from './statistics.js';

export interface RunOptions {
  /** Absolute project root; cache keys are relative to it */
  projectRoot: string;
  /** Absolute path of the cache store file */
  cachePath: string;
  lineEnding: LineEnding;
  encoding: BufferEncoding;
  /** Files formatted in parallel */
  concurrency: number;
  /** Format without writing files or the cache */
  dryRun?: boolean;
  /** Keep the cache in memory only */
  noCache?: boolean;
  /** Stops scheduling new files; finished files are kept and cached */
  signal?: AbortSignal;
}

export interface RunReport {
  statistics: RunCounts;
  results: FileResult[];
  /** Candidate files that were never started because the run was aborted */
  notStarted: number;
  /** Whether the cache store was written */
  cachePersisted: boolean;
  durationMs: number;
}
