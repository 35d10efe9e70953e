/**
 * @arch fmtkit.core.domain
 *
 * JavaScript formatter backed by prettier's babel parser.
 */
import { format, type Options } from 'prettier';
import { z } from 'zod';
import { BaseFormatter, BooleanOption, LayoutOptionsSchema } from './base.js';
import type { FormatterOptions } from './interface.types.js';

const JavaScriptOptionsSchema = LayoutOptionsSchema.extend({
  semi: BooleanOption.optional(),
  singleQuote: BooleanOption.optional(),
  bracketSpacing: BooleanOption.optional(),
  trailingComma: z.enum(['all', 'es5', 'none']).optional(),
  arrowParens: z.enum(['always', 'avoid']).optional(),
});

export class JavaScriptFormatter extends BaseFormatter {
  readonly id = 'javascript' as const;
  readonly supportedExtensions = ['.js', '.mjs', '.cjs'] as const;

  private engineOptions: Options = {};

  protected configure(options: FormatterOptions): void {
    this.engineOptions = this.parseOptions(JavaScriptOptionsSchema, options);
  }

  protected async doFormat(source: string): Promise<string> {
    return format(source, {
      ...this.engineOptions,
      parser: 'babel',
      endOfLine: 'lf',
    });
  }
}
