/**
 * @arch fmtkit.core.barrel
 */
export { FormatRunner, computeRunFingerprint, defaultConcurrency } from './runner.js';
export { RunStatistics, type RunCounts } from './statistics.js';
export type { RunOptions, RunReport } from './types.js';
