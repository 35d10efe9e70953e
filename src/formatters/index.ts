/**
 * @arch fmtkit.core.barrel
 */
export { BaseFormatter, COMPILER_SOURCE, COMPILER_COMPLIANCE, COMPILER_TARGET } from './base.js';
export { JavaFormatter } from './java.js';
export { JavaScriptFormatter } from './javascript.js';
export { FormatterRegistry } from './formatter-registry.js';
export { createDefaultRegistry, createConfiguredRegistry } from './register.js';
export {
  LINE_SEPARATORS,
  detectLineEnding,
  resolveLineEnding,
  applyLineEnding,
  type FixedLineEnding,
} from './line-ending.js';
export type {
  FormatterId,
  FormatterSettings,
  ILanguageFormatter,
} from './interface.types.js';
