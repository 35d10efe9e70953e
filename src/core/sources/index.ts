/**
 * @arch fmtkit.core.barrel
 */
export { collectSourceFiles, DEFAULT_EXCLUDES } from './collector.js';
