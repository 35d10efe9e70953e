/**
 * @arch fmtkit.core.domain
 *
 * Java formatter: prettier with prettier-plugin-java, followed by import
 * grouping in the configured order.
 */
import { format, type Options, type Plugin } from 'prettier';
import { BaseFormatter, LayoutOptionsSchema } from './base.js';
import { sortImports, DEFAULT_IMPORT_ORDER } from '../core/import-order/index.js';
import type { UnmatchedImports } from '../core/config/schema.js';
import type { FormatterOptions } from './interface.types.js';

const JAVA_PLUGIN_MODULE = 'prettier-plugin-java';

let javaPlugin: Promise<Plugin> | null = null;

function isPrettierPlugin(value: unknown): value is Plugin {
  return typeof value === 'object' && value !== null && 'parsers' in value && 'printers' in value;
}

/**
 * Load the Java plugin on first use; the parser is large and many runs
 * format JavaScript only.
 */
function loadJavaPlugin(): Promise<Plugin> {
  javaPlugin ??= import(JAVA_PLUGIN_MODULE).then((mod: unknown) => {
    const candidate = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
    if (isPrettierPlugin(candidate)) return candidate;
    if (isPrettierPlugin(mod)) return mod;
    throw new Error(`${JAVA_PLUGIN_MODULE} does not export a prettier plugin`);
  });
  return javaPlugin;
}

export class JavaFormatter extends BaseFormatter {
  readonly id = 'java' as const;
  readonly supportedExtensions = ['.java'] as const;

  private engineOptions: Options = {};
  private importOrder: readonly string[] = DEFAULT_IMPORT_ORDER;
  private unmatchedImports: UnmatchedImports = 'last';

  /**
   * Set the import group order applied after the formatting pass.
   */
  setImportOrder(order: readonly string[], unmatched: UnmatchedImports = 'last'): void {
    this.importOrder = [...order];
    this.unmatchedImports = unmatched;
  }

  getImportOrder(): readonly string[] {
    return this.importOrder;
  }

  protected configure(options: FormatterOptions): void {
    this.engineOptions = this.parseOptions(LayoutOptionsSchema, options);
  }

  protected async doFormat(source: string): Promise<string> {
    const plugin = await loadJavaPlugin();
    const formatted = await format(source, {
      ...this.engineOptions,
      parser: 'java',
      plugins: [plugin],
      endOfLine: 'lf',
    });
    return sortImports(formatted, { order: this.importOrder, unmatched: this.unmatchedImports });
  }

  protected fingerprintExtras(): unknown {
    return { importOrder: this.importOrder, unmatched: this.unmatchedImports };
  }
}
