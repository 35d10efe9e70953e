/**
 * @arch fmtkit.cli.barrel
 */
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export type { ISummaryFormatter, SummaryOptions, OutputFormat } from './types.js';
