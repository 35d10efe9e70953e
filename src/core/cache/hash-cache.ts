/**
 * @arch fmtkit.core.domain
 *
 * HashCache - persisted mapping from project-relative path to content digest.
 * Loaded once per run, mutated in memory, persisted once at the end.
 */
import { readFile, writeFileAtomic, fileExists } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import {
  CACHE_VERSION,
  CacheStoreSchema,
  type CacheStats,
} from './types.js';

const log = logger.child('cache');

export interface HashCacheOptions {
  /** Keep everything in memory: nothing is read or written */
  inMemory?: boolean;
  /** Load the store but never write it back */
  readOnly?: boolean;
}

/**
 * Digest cache with fail-soft loading and atomic persistence.
 * A run assumes exclusive ownership of the store; there is no locking.
 */
export class HashCache {
  private readonly storePath: string;
  private readonly fingerprint: string;
  private readonly inMemory: boolean;
  private readonly readOnly: boolean;
  private files = new Map<string, string>();
  private stats: Omit<CacheStats, 'totalCached'> = {
    hits: 0,
    misses: 0,
    fullInvalidation: false,
  };

  /**
   * @param storePath Absolute path of the store file
   * @param fingerprint Formatting configuration fingerprint; a store written
   *   under a different fingerprint is discarded on load
   */
  constructor(storePath: string, fingerprint: string, options: HashCacheOptions = {}) {
    this.storePath = storePath;
    this.fingerprint = fingerprint;
    this.inMemory = options.inMemory ?? false;
    this.readOnly = options.readOnly ?? false;
  }

  /**
   * Load the store from disk. Never throws: a missing store yields an empty
   * cache, an unreadable or corrupt one an empty cache plus a warning.
   */
  async load(): Promise<void> {
    this.files = new Map();
    if (this.inMemory) return;

    if (!(await fileExists(this.storePath))) {
      log.debug(`No cache store at ${this.storePath}`);
      return;
    }

    let content: string;
    try {
      content = await readFile(this.storePath);
    } catch (error) {
      log.warn(`Cannot load file hash cache ${this.storePath}: ${errorMessage(error)}`);
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch { /* corrupt JSON */
      log.warn(`Ignoring corrupt file hash cache ${this.storePath}`);
      return;
    }

    const parsed = CacheStoreSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`Ignoring corrupt file hash cache ${this.storePath}`);
      return;
    }

    if (parsed.data.version !== CACHE_VERSION || parsed.data.fingerprint !== this.fingerprint) {
      this.stats.fullInvalidation = true;
      log.info('Formatting configuration changed, all files will be checked again');
      return;
    }

    this.files = new Map(Object.entries(parsed.data.files));
    log.debug(`Loaded ${this.files.size} cached digest(s)`);
  }

  /**
   * Digest recorded for a path, or null.
   */
  get(relativePath: string): string | null {
    return this.files.get(relativePath) ?? null;
  }

  /**
   * Check a digest against the recorded one, counting hits and misses.
   */
  matches(relativePath: string, digest: string): boolean {
    if (this.files.get(relativePath) === digest) {
      this.stats.hits++;
      return true;
    }
    this.stats.misses++;
    return false;
  }

  /**
   * Record a digest, overwriting any prior entry.
   */
  put(relativePath: string, digest: string): void {
    this.files.set(relativePath, digest);
  }

  /**
   * Write the whole mapping atomically.
   * Failure is logged and reported through the return value; losing the
   * cache only costs extra work on the next run.
   */
  async persist(): Promise<boolean> {
    if (this.inMemory || this.readOnly) return false;

    const sorted = [...this.files.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const store = {
      version: CACHE_VERSION,
      fingerprint: this.fingerprint,
      updatedAt: new Date().toISOString(),
      files: Object.fromEntries(sorted),
    };

    try {
      await writeFileAtomic(this.storePath, `${JSON.stringify(store, null, 2)}\n`);
      log.debug(`Stored ${this.files.size} digest(s) in ${this.storePath}`);
      return true;
    } catch (error) {
      log.warn(`Cannot store file hash cache ${this.storePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  size(): number {
    return this.files.size;
  }

  clear(): void {
    this.files.clear();
  }

  getStats(): CacheStats {
    return { ...this.stats, totalCached: this.files.size };
  }
}
