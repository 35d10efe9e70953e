/**
 * @arch fmtkit.core.barrel
 */
export { FileProcessor } from './file-processor.js';
export type { FileResult, FormatOutcome, OutcomeReason, ProcessingOptions } from './types.js';
