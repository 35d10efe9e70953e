/**
 * @arch fmtkit.infra.formatter-support
 *
 * Builds the formatter registry of a run from configuration.
 */
import { FormatterRegistry } from './formatter-registry.js';
import { JavaFormatter } from './java.js';
import { JavaScriptFormatter } from './javascript.js';
import { loadFormatterOptions, type FormatterOptions } from '../core/config/loader.js';
import { resolveImportOrder } from '../core/import-order/index.js';
import type { Config } from '../core/config/schema.js';
import type { FormatterSettings, ILanguageFormatter } from './interface.types.js';
import { logger } from '../utils/logger.js';

/**
 * Registry with the built-in Java and JavaScript formatters, uninitialized.
 */
export function createDefaultRegistry(): FormatterRegistry {
  const registry = new FormatterRegistry();
  registry.register(new JavaFormatter());
  registry.register(new JavaScriptFormatter());
  return registry;
}

/**
 * Option set for one language: the option file when one is configured
 * (null when it cannot be found), otherwise an empty map so the formatter
 * falls back to the compiler-version defaults.
 */
async function optionsFor(
  projectRoot: string,
  settings: { enabled: boolean; config_file: string | null }
): Promise<FormatterOptions | null> {
  if (!settings.enabled) return null;
  if (settings.config_file === null) return {};
  return loadFormatterOptions(projectRoot, settings.config_file);
}

function initializeIfConfigured(
  formatter: ILanguageFormatter,
  options: FormatterOptions | null,
  settings: FormatterSettings
): void {
  if (options === null) {
    logger.debug(`No ${formatter.id} formatter configuration, ${formatter.id} files are skipped`);
    return;
  }
  formatter.initialize(options, settings);
}

/**
 * Create and initialize the formatters described by a configuration.
 * Languages that are disabled or whose option file is missing stay
 * uninitialized; the run decides whether that leaves anything to do.
 */
export async function createConfiguredRegistry(
  projectRoot: string,
  config: Config,
  settings: FormatterSettings
): Promise<FormatterRegistry> {
  const java = new JavaFormatter();
  const javascript = new JavaScriptFormatter();

  const [javaOptions, jsOptions] = await Promise.all([
    optionsFor(projectRoot, config.java),
    optionsFor(projectRoot, config.javascript),
  ]);

  initializeIfConfigured(java, javaOptions, settings);
  if (java.isInitialized()) {
    java.setImportOrder(
      await resolveImportOrder(config.java.import_order_file, projectRoot),
      config.java.unmatched_imports
    );
  }
  initializeIfConfigured(javascript, jsOptions, settings);

  const registry = new FormatterRegistry();
  registry.register(java);
  registry.register(javascript);
  return registry;
}
