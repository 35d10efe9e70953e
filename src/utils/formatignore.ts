/**
 * @arch fmtkit.infra
 *
 * .fmtkitignore support - gitignore-style patterns for files that are never formatted.
 */
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { fileExists, readFile } from './file-system.js';
import { logger } from './logger.js';

export const FORMATIGNORE_FILENAME = '.fmtkitignore';

export interface FormatIgnore {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from project root
   */
  ignores(filePath: string): boolean;

  /**
   * Filter relative paths, returning only non-ignored ones.
   */
  filter(filePaths: string[]): string[];

  patterns(): string[];
}

/**
 * Load .fmtkitignore from the project root.
 * A missing file yields an empty filter.
 */
export async function loadFormatIgnore(projectRoot: string): Promise<FormatIgnore> {
  const ignorePath = join(projectRoot, FORMATIGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return createFormatIgnore([]);
  }

  try {
    return createFormatIgnore(parseFormatIgnore(await readFile(ignorePath)));
  } catch (error) {
    logger.warn(`Cannot read ${FORMATIGNORE_FILENAME}, no files ignored: ${error instanceof Error ? error.message : 'Unknown error'}`);
    return createFormatIgnore([]);
  }
}

export function createFormatIgnore(patterns: string[]): FormatIgnore {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(filePath: string): boolean {
      return ig.ignores(filePath.replace(/\\/g, '/'));
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter((fp) => !this.ignores(fp));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

/**
 * Parse gitignore syntax: `#` comments and blank lines are skipped.
 */
export function parseFormatIgnore(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
