/**
 * @arch fmtkit.infra.fs
 *
 * File system operations - reading, atomic writing, and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import fg from 'fast-glob';

/**
 * Read a UTF-8 file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file and decode it with the given encoding.
 * UTF-8 decoding is strict: invalid byte sequences reject instead of being
 * replaced, so a file in a different encoding is never silently rewritten.
 */
export async function readTextFile(filePath: string, encoding: BufferEncoding): Promise<string> {
  const bytes = await fs.promises.readFile(filePath);
  if (encoding === 'utf8' || encoding === 'utf-8') {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  }
  return bytes.toString(encoding);
}

/**
 * Replace a file's content atomically.
 * Content goes to a temporary sibling first and is renamed over the target,
 * so readers see either the old or the new file. The mode of an existing
 * target is carried over.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  encoding: BufferEncoding = 'utf8'
): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString('hex')}.tmp`);

  let mode: number | undefined;
  try {
    mode = (await fs.promises.stat(filePath)).mode & 0o7777;
  } catch { /* new file, default mode */ }

  try {
    await fs.promises.writeFile(tempPath, Buffer.from(content, encoding));
    // chmod after creation so the umask does not narrow the copied mode
    if (mode !== undefined) await fs.promises.chmod(tempPath, mode);
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if the current process may write to a file.
 */
export async function isWritable(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.W_OK);
    return true;
  } catch { /* read-only or not accessible */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Resolve symlinks; falls back to the resolved path when the target is missing.
 */
export async function canonicalPath(filePath: string): Promise<string> {
  try {
    return await fs.promises.realpath(filePath);
  } catch { /* missing file, keep the lexical path */ }
  return path.resolve(filePath);
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    caseSensitive?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd ?? process.cwd(),
    ignore: options.ignore ?? ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? true,
    onlyFiles: true,
    caseSensitiveMatch: options.caseSensitive ?? true,
    followSymbolicLinks: false,
    dot: false,
  });
}

/**
 * Project-root relative path with forward slashes.
 */
export function toPosixRelative(from: string, to: string): string {
  return path.relative(from, to).split(path.sep).join('/');
}
