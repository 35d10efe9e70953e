/**
 * @arch fmtkit.core.engine
 *
 * FileProcessor - the per-file pipeline: read, digest, cache check,
 * dispatch, compare, rewrite, record.
 */
import { computeDigest } from '../../utils/checksum.js';
import { readTextFile, writeFileAtomic, toPosixRelative } from '../../utils/file-system.js';
import { FormatError, SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { HashCache } from '../cache/hash-cache.js';
import type { FormatterRegistry } from '../../formatters/formatter-registry.js';
import type { FileResult, ProcessingOptions } from './types.js';

const log = logger.child('file');

/**
 * Runs one file through the formatting pipeline.
 *
 * The cache is advanced only when the content on disk is known to be in its
 * formatted form: after a successful rewrite (formatted digest) or when the
 * formatter reported no change (current digest). Failures leave both the
 * file and its cache entry untouched.
 */
export class FileProcessor {
  private readonly cache: HashCache;
  private readonly registry: FormatterRegistry;
  private readonly options: ProcessingOptions;

  constructor(cache: HashCache, registry: FormatterRegistry, options: ProcessingOptions) {
    this.cache = cache;
    this.registry = registry;
    this.options = options;
  }

  /**
   * Project-relative cache key for an absolute path.
   */
  relativePath(filePath: string): string {
    return toPosixRelative(this.options.projectRoot, filePath);
  }

  /**
   * Process one file. The caller has checked that it exists and is writable.
   * @throws SystemError when the file cannot be read
   */
  async process(filePath: string): Promise<FileResult> {
    const relativePath = this.relativePath(filePath);
    const { encoding, lineEnding, dryRun = false } = this.options;
    log.debug(`Processing file: ${relativePath}`);

    let code: string;
    try {
      code = await readTextFile(filePath, encoding);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.READ_FAILED,
        `Cannot read ${relativePath}: ${errorMessage(error)}`,
        { file: filePath }
      );
    }
    const sourceDigest = computeDigest(code, encoding);

    if (this.cache.matches(relativePath, sourceDigest)) {
      log.debug(`File is already formatted: ${relativePath}`);
      return { file: filePath, relativePath, outcome: 'skipped', reason: 'cached', formatter: null };
    }

    const formatter = this.registry.getForFile(filePath);
    if (!formatter || !formatter.isInitialized()) {
      return { file: filePath, relativePath, outcome: 'skipped', reason: 'unsupported', formatter: null };
    }
    const base = { file: filePath, relativePath, formatter: formatter.id };

    let formatted: string | null;
    try {
      formatted = await formatter.format(code, lineEnding);
    } catch (error) {
      if (!(error instanceof FormatError)) throw error;
      log.warn(`${relativePath}: ${error.message}`);
      return { ...base, outcome: 'fail', reason: 'format-error', message: error.message };
    }

    const formattedDigest = formatted === null ? sourceDigest : computeDigest(formatted, encoding);
    if (formatted === null || formattedDigest === sourceDigest) {
      log.debug(`Equal hash code, not writing ${relativePath}`);
      if (!dryRun) this.cache.put(relativePath, sourceDigest);
      return { ...base, outcome: 'skipped', reason: 'unchanged' };
    }

    if (dryRun) {
      return { ...base, outcome: 'success', reason: 'formatted' };
    }

    try {
      await writeFileAtomic(filePath, formatted, encoding);
    } catch (error) {
      const message = `Cannot write ${relativePath}: ${errorMessage(error)}`;
      log.warn(message);
      return { ...base, outcome: 'fail', reason: 'write-error', message };
    }

    this.cache.put(relativePath, formattedDigest);
    log.debug(`Formatted ${relativePath}`);
    return { ...base, outcome: 'success', reason: 'formatted' };
  }
}
