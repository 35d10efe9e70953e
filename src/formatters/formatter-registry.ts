/**
 * @arch fmtkit.core.domain
 *
 * Registry mapping file extensions to language formatters.
 */
import * as path from 'node:path';
import type { FormatterId, ILanguageFormatter } from './interface.types.js';

/**
 * Formatters of one run, keyed by id and by extension.
 * Owned by the run: each run builds its own registry and initializes the
 * formatters before any file is processed.
 */
export class FormatterRegistry {
  private formatters = new Map<FormatterId, ILanguageFormatter>();
  private extensionMap = new Map<string, FormatterId>();

  /**
   * Register a formatter for its supported extensions.
   * A later registration for the same extension replaces the earlier one.
   */
  register(formatter: ILanguageFormatter): void {
    this.formatters.set(formatter.id, formatter);
    for (const ext of formatter.supportedExtensions) {
      this.extensionMap.set(ext.toLowerCase(), formatter.id);
    }
  }

  getById(id: FormatterId): ILanguageFormatter | null {
    return this.formatters.get(id) ?? null;
  }

  /**
   * Formatter for a file's extension, or null when none is registered.
   */
  getForFile(filePath: string): ILanguageFormatter | null {
    const id = this.extensionMap.get(path.extname(filePath).toLowerCase());
    return id ? this.getById(id) : null;
  }

  isSupported(filePath: string): boolean {
    return this.extensionMap.has(path.extname(filePath).toLowerCase());
  }

  /**
   * Formatters that finished initialization.
   */
  getInitialized(): ILanguageFormatter[] {
    return [...this.formatters.values()].filter((f) => f.isInitialized());
  }

  getSupportedExtensions(): string[] {
    return [...this.extensionMap.keys()];
  }

  ids(): FormatterId[] {
    return [...this.formatters.keys()];
  }
}
