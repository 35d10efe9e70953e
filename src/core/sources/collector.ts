/**
 * @arch fmtkit.core.domain
 *
 * Candidate file discovery: directories expanded with include/exclude globs,
 * explicit files and glob patterns, filtered through .fmtkitignore.
 */
import * as path from 'node:path';
import fg from 'fast-glob';
import { globFiles, isDirectory, toPosixRelative } from '../../utils/file-system.js';
import { loadFormatIgnore, type FormatIgnore } from '../../utils/formatignore.js';
import { logger } from '../../utils/logger.js';
import type { FilesSettings } from '../config/schema.js';

/** Always excluded: VCS metadata and installed packages. */
export const DEFAULT_EXCLUDES = [
  '**/node_modules/**',
  '**/.git/**',
  '**/.svn/**',
  '**/.hg/**',
];

/**
 * Collect candidate files.
 *
 * @param paths Files, directories or glob patterns; when empty the
 *   configured directories are scanned. A missing configured directory is
 *   skipped, a missing explicit file is kept so the run reports it.
 * @returns Sorted, de-duplicated absolute paths
 */
export async function collectSourceFiles(
  projectRoot: string,
  files: FilesSettings,
  paths: string[] = [],
  formatIgnore?: FormatIgnore
): Promise<string[]> {
  const ignoreFilter = formatIgnore ?? await loadFormatIgnore(projectRoot);
  const exclude = [...DEFAULT_EXCLUDES, ...files.exclude];
  const explicit = paths.length > 0;
  const targets = explicit ? paths : files.directories;
  const found = new Set<string>();

  for (const target of targets) {
    const absolute = path.resolve(projectRoot, target);

    if (await isDirectory(absolute)) {
      const matches = await globFiles(files.include, {
        cwd: absolute,
        ignore: exclude,
        absolute: true,
        caseSensitive: false,
      });
      matches.forEach((file) => found.add(path.normalize(file)));
    } else if (explicit && fg.isDynamicPattern(target)) {
      const matches = await globFiles(target, { cwd: projectRoot, ignore: exclude, absolute: true });
      matches.forEach((file) => found.add(path.normalize(file)));
    } else if (explicit) {
      found.add(absolute);
    } else {
      logger.debug(`Source directory not found: ${target}`);
    }
  }

  return [...found]
    .filter((file) => {
      const relative = toPosixRelative(projectRoot, file);
      // ignore() only accepts paths inside the root
      if (relative === '' || relative.startsWith('../') || path.isAbsolute(relative)) return true;
      return !ignoreFilter.ignores(relative);
    })
    .sort();
}
