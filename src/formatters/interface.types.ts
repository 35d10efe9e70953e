/**
 * @arch fmtkit.core.types
 *
 * Language formatter interface definition.
 */
import type { LineEnding } from '../core/config/schema.js';
import type { FormatterOptions } from '../core/config/loader.js';

export type { LineEnding } from '../core/config/schema.js';
export type { FormatterOptions } from '../core/config/loader.js';

/** Built-in formatter identifiers. */
export type FormatterId = 'java' | 'javascript';

/**
 * Run-wide settings every formatter receives on initialization.
 */
export interface FormatterSettings {
  compilerSource: string;
  compilerCompliance: string;
  compilerTarget: string;
  /** Directory holding the cache store */
  targetDirectory: string;
  encoding: BufferEncoding;
}

/**
 * Language formatter interface.
 *
 * Wraps one formatting engine. A formatter that was never initialized (no
 * option set could be loaded for its language) reports isInitialized() false
 * and is never asked to format.
 */
export interface ILanguageFormatter {
  readonly id: FormatterId;

  /** File extensions this formatter handles, lowercase with leading dot */
  readonly supportedExtensions: readonly string[];

  /**
   * Build the engine from an option map.
   * An empty map is replaced by the compiler-version defaults.
   * @throws ConfigError when an option value is invalid
   */
  initialize(options: FormatterOptions, settings: FormatterSettings): void;

  isInitialized(): boolean;

  /**
   * Format source text.
   * @returns the formatted text, or null when it equals the input
   * @throws FormatError when the engine cannot format the input
   */
  format(source: string, lineEnding: LineEnding): Promise<string | null>;

  /**
   * Stable description of the engine configuration.
   * Part of the cache fingerprint: a change re-formats every file.
   */
  fingerprint(): string;
}
