/**
 * @arch fmtkit.core.engine
 *
 * FormatRunner - runs candidate files through the pipeline and aggregates
 * run statistics. Owns the cache and the statistics of one run.
 */
import * as path from 'node:path';
import os from 'node:os';
import { HashCache } from '../cache/hash-cache.js';
import { FileProcessor } from '../processing/file-processor.js';
import { RunStatistics } from './statistics.js';
import { computeChecksum } from '../../utils/checksum.js';
import { fileExists, isWritable, canonicalPath } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { FormatterRegistry } from '../../formatters/formatter-registry.js';
import type { FileResult } from '../processing/types.js';
import type { RunOptions, RunReport } from './types.js';

const log = logger.child('run');

/** Default parallelism: 75% of available CPUs, min 2, max 16. */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Fingerprint of everything that changes formatted output.
 * A cache written under another fingerprint is discarded.
 */
export function computeRunFingerprint(registry: FormatterRegistry, options: Pick<RunOptions, 'lineEnding' | 'encoding'>): string {
  const formatters = registry
    .getInitialized()
    .map((f) => f.fingerprint())
    .sort();
  return computeChecksum(JSON.stringify({
    formatters,
    lineEnding: options.lineEnding,
    encoding: options.encoding,
  }));
}

export class FormatRunner {
  private readonly registry: FormatterRegistry;
  private readonly options: RunOptions;

  constructor(registry: FormatterRegistry, options: RunOptions) {
    this.registry = registry;
    this.options = options;
  }

  /**
   * Format candidate files.
   * @throws ConfigError when no formatter is initialized; nothing is touched
   */
  async run(candidateFiles: string[]): Promise<RunReport> {
    const started = Date.now();

    if (this.registry.getInitialized().length === 0) {
      throw new ConfigError(
        ErrorCodes.NO_FORMATTER,
        'You must provide a Java or JavaScript formatter configuration.'
      );
    }

    const files = await this.dedupe(candidateFiles);
    const projectRoot = await canonicalPath(this.options.projectRoot);
    const cache = new HashCache(
      this.options.cachePath,
      computeRunFingerprint(this.registry, this.options),
      { inMemory: this.options.noCache === true, readOnly: this.options.dryRun === true }
    );
    await cache.load();

    const processor = new FileProcessor(cache, this.registry, {
      projectRoot,
      lineEnding: this.options.lineEnding,
      encoding: this.options.encoding,
      dryRun: this.options.dryRun,
    });
    const statistics = new RunStatistics();
    const results: FileResult[] = [];
    const concurrency = Math.max(1, this.options.concurrency);
    let next = 0;

    while (next < files.length) {
      if (this.options.signal?.aborted) {
        log.warn(`Run aborted, ${files.length - next} file(s) not processed`);
        break;
      }
      const batch = files.slice(next, next + concurrency);
      next += batch.length;

      // allSettled: one file's failure must not lose the others' results
      const settled = await Promise.allSettled(batch.map((file) => this.processFile(file, processor)));
      settled.forEach((entry, i) => {
        const result: FileResult = entry.status === 'fulfilled'
          ? entry.value
          : this.failure(batch[i], processor, entry.reason);
        if (result.outcome === null) {
          statistics.recordReadOnly();
        } else {
          statistics.record(result.outcome);
        }
        results.push(result);
      });
    }

    const cachePersisted = await cache.persist();

    return {
      statistics: statistics.snapshot(),
      results,
      notStarted: files.length - next,
      cachePersisted,
      durationMs: Date.now() - started,
    };
  }

  /**
   * Existence and writability checks, then the pipeline.
   */
  private async processFile(file: string, processor: FileProcessor): Promise<FileResult> {
    const relativePath = processor.relativePath(file);
    if (!(await fileExists(file))) {
      log.warn(`File not found: ${relativePath}`);
      return { file, relativePath, outcome: 'fail', reason: 'missing', formatter: null, message: 'File not found' };
    }
    if (!(await isWritable(file))) {
      log.debug(`Read-only file skipped: ${relativePath}`);
      return { file, relativePath, outcome: null, reason: 'read-only', formatter: null };
    }
    return processor.process(file);
  }

  private failure(file: string, processor: FileProcessor, reason: unknown): FileResult {
    const message = errorMessage(reason);
    log.warn(message);
    return {
      file,
      relativePath: processor.relativePath(file),
      outcome: 'fail',
      reason: 'read-error',
      formatter: null,
      message,
    };
  }

  /**
   * Absolute, canonical, de-duplicated paths in first-seen order.
   */
  private async dedupe(candidateFiles: string[]): Promise<string[]> {
    const seen = new Set<string>();
    const files: string[] = [];
    for (const candidate of candidateFiles) {
      const resolved = await canonicalPath(path.resolve(this.options.projectRoot, candidate));
      if (!seen.has(resolved)) {
        seen.add(resolved);
        files.push(resolved);
      }
    }
    return files;
  }
}
