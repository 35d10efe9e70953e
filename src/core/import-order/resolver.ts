/**
 * @arch fmtkit.core.domain
 *
 * Import order resolution from `index=prefix` order files.
 */
import * as path from 'node:path';
import { fileExists, readFile } from '../../utils/file-system.js';
import { ConfigError, SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/** Built-in group order used when no order file is configured. */
export const DEFAULT_IMPORT_ORDER: readonly string[] = ['java', 'javax', 'org', 'com'];

/**
 * Resolve the import group order.
 *
 * @param orderFile Order file relative to the project root, or null for the default order
 * @throws ConfigError when the file is missing or has a malformed line
 * @throws SystemError when the file exists but cannot be read
 */
export async function resolveImportOrder(
  orderFile: string | null,
  projectRoot: string
): Promise<string[]> {
  if (orderFile === null || orderFile.trim() === '') {
    return [...DEFAULT_IMPORT_ORDER];
  }

  const fullPath = path.resolve(projectRoot, orderFile);
  logger.debug(`Reading import order from ${fullPath}`);

  if (!(await fileExists(fullPath))) {
    throw new ConfigError(
      ErrorCodes.CONFIG_NOT_FOUND,
      `Cannot find config file [${orderFile}]`,
      { path: fullPath }
    );
  }

  let content: string;
  try {
    content = await readFile(fullPath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_FAILED,
      `Cannot read config file [${orderFile}]: ${errorMessage(error)}`,
      { path: fullPath }
    );
  }

  return parseImportOrder(content, orderFile);
}

/**
 * Parse order file content.
 * Blank and `#` lines are skipped; other lines are `<index>=<prefix>`, where a
 * missing `=` or an empty right side means the catch-all group. Entries are
 * returned in ascending index order; a repeated index keeps the last prefix.
 */
export function parseImportOrder(content: string, source = '<import order>'): string[] {
  const byIndex = new Map<number, string>();

  content.split(/\r?\n/).forEach((rawLine, lineNo) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) return;

    const eq = line.indexOf('=');
    const indexText = (eq === -1 ? line : line.slice(0, eq)).trim();
    const prefix = eq === -1 ? '' : line.slice(eq + 1).trim();

    const index = Number(indexText);
    if (!/^-?\d+$/.test(indexText) || !Number.isSafeInteger(index)) {
      throw new ConfigError(
        ErrorCodes.CONFIG_INVALID,
        `Invalid import order entry in [${source}] at line ${lineNo + 1}: '${line}'`,
        { source, line: lineNo + 1 }
      );
    }
    byIndex.set(index, prefix);
  });

  return [...byIndex.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, prefix]) => prefix);
}
