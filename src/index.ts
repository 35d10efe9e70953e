/**
 * @arch fmtkit.barrel
 *
 * fmtkit - incremental source formatter.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// File hash cache
export * from './core/cache/index.js';

// Import ordering
export * from './core/import-order/index.js';

// File pipeline and runs
export * from './core/processing/index.js';
export * from './core/run/index.js';
export * from './core/sources/index.js';

// Formatters
export * from './formatters/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli, runFormat, VERSION } from './cli/index.js';
