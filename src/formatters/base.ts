/**
 * @arch fmtkit.core.domain
 */
import { z } from 'zod';
import { ConfigError, FormatError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { formatZodError } from '../utils/yaml.js';
import { logger, type Logger } from '../utils/logger.js';
import { applyLineEnding, resolveLineEnding } from './line-ending.js';
import type {
  FormatterId,
  FormatterOptions,
  FormatterSettings,
  ILanguageFormatter,
  LineEnding,
} from './interface.types.js';

/** Option keys filled in when a language has no option set of its own. */
export const COMPILER_SOURCE = 'compiler.source';
export const COMPILER_COMPLIANCE = 'compiler.compliance';
export const COMPILER_TARGET = 'compiler.target';

/** `"true"` / `"false"` option values. */
export const BooleanOption = z.enum(['true', 'false']).transform((v) => v === 'true');

/** Layout options every prettier-backed engine understands. */
export const LayoutOptionsSchema = z.object({
  printWidth: z.coerce.number().int().positive().optional(),
  tabWidth: z.coerce.number().int().min(0).optional(),
  useTabs: BooleanOption.optional(),
});

/**
 * Base class for language formatters.
 * Handles initialization state, line-ending policy and the "no change"
 * signal; subclasses only turn source text into LF-terminated output.
 */
export abstract class BaseFormatter implements ILanguageFormatter {
  abstract readonly id: FormatterId;
  abstract readonly supportedExtensions: readonly string[];

  protected options: FormatterOptions = {};
  private initialized = false;
  private cachedLog: Logger | null = null;

  protected get log(): Logger {
    this.cachedLog ??= logger.child(this.id);
    return this.cachedLog;
  }

  initialize(options: FormatterOptions, settings: FormatterSettings): void {
    const effective: FormatterOptions = Object.keys(options).length > 0
      ? { ...options }
      : {
          [COMPILER_SOURCE]: settings.compilerSource,
          [COMPILER_COMPLIANCE]: settings.compilerCompliance,
          [COMPILER_TARGET]: settings.compilerTarget,
        };

    this.configure(effective);
    this.options = effective;
    this.initialized = true;
    this.log.debug('Formatter initialized', { options: effective });
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async format(source: string, lineEnding: LineEnding): Promise<string | null> {
    if (!this.initialized) {
      throw new FormatError(ErrorCodes.FORMAT_FAILED, `The ${this.id} formatter is not initialized`);
    }

    let formatted: string;
    try {
      formatted = await this.doFormat(source);
    } catch (error) {
      if (error instanceof FormatError) throw error;
      throw new FormatError(
        ErrorCodes.FORMAT_FAILED,
        `Code cannot be formatted: ${errorMessage(error)}`,
        { formatter: this.id }
      );
    }

    const result = applyLineEnding(formatted, resolveLineEnding(lineEnding, source));
    return result === source ? null : result;
  }

  fingerprint(): string {
    const options = Object.keys(this.options)
      .sort()
      .map((key) => [key, this.options[key]]);
    return JSON.stringify({ id: this.id, options, extra: this.fingerprintExtras() });
  }

  /**
   * Validate options and build the engine configuration.
   * @throws ConfigError on an invalid option value
   */
  protected abstract configure(options: FormatterOptions): void;

  /**
   * Format source text. Output line breaks may be of any kind; the base class
   * applies the line-ending policy afterwards.
   */
  protected abstract doFormat(source: string): Promise<string>;

  /**
   * Engine state beyond the option map that changes formatting output.
   */
  protected fingerprintExtras(): unknown {
    return null;
  }

  /**
   * Parse an option map with a schema, raising ConfigError on failure.
   */
  protected parseOptions<T extends z.ZodType>(schema: T, options: FormatterOptions): z.infer<T> {
    const result = schema.safeParse(options);
    if (!result.success) {
      throw new ConfigError(
        ErrorCodes.CONFIG_INVALID,
        `Invalid ${this.id} formatter options: ${formatZodError(result.error)}`,
        { formatter: this.id }
      );
    }
    return result.data;
  }
}
