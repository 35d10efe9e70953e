/**
 * @arch fmtkit.core.types
 *
 * Types for the persistent digest cache.
 * The store lives in <target_directory>/fmtkit-cache.json.
 */
import { z } from 'zod';

/**
 * On-disk cache structure.
 * `files` maps a project-relative path to the hex digest of the file's
 * content after the last run formatted (or confirmed) it.
 */
export const CacheStoreSchema = z.object({
  version: z.string(),
  /** Formatting configuration fingerprint - invalidates all entries if changed */
  fingerprint: z.string(),
  updatedAt: z.string(),
  files: z.record(z.string(), z.string()),
});

export type CacheStore = z.infer<typeof CacheStoreSchema>;

/**
 * Cache statistics for logging.
 */
export interface CacheStats {
  /** Lookups whose digest matched the current content */
  hits: number;
  /** Lookups with no entry or a different digest */
  misses: number;
  /** Entries currently held */
  totalCached: number;
  /** Whether the stored fingerprint or version differed (full invalidation) */
  fullInvalidation: boolean;
}

/**
 * Cache version for format compatibility.
 */
export const CACHE_VERSION = '1';

/**
 * Cache store file name inside the target directory.
 */
export const CACHE_FILENAME = 'fmtkit-cache.json';
