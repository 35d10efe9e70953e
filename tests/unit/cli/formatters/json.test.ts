/**
 * @arch fmtkit.test.unit
 */
/**
 * Tests for the JSON run summary.
 */
import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import type { RunReport } from '../../../../src/core/run/types.js';

describe('JsonFormatter', () => {
  const report: RunReport = {
    statistics: { successCount: 1, failCount: 1, skippedCount: 0, readOnlyCount: 1 },
    results: [
      { file: '/p/a.js', relativePath: 'a.js', outcome: 'success', reason: 'formatted', formatter: 'javascript' },
      {
        file: '/p/b.js',
        relativePath: 'b.js',
        outcome: 'fail',
        reason: 'format-error',
        formatter: 'javascript',
        message: 'Code cannot be formatted: Unexpected token',
      },
      { file: '/p/c.js', relativePath: 'c.js', outcome: null, reason: 'read-only', formatter: null },
    ],
    notStarted: 0,
    cachePersisted: true,
    durationMs: 120,
  };

  it('should serialize statistics and files', () => {
    const parsed: unknown = JSON.parse(new JsonFormatter({ dryRun: true }).format(report));

    expect(parsed).toEqual({
      dry_run: true,
      statistics: { success: 1, fail: 1, skipped: 0, read_only: 1 },
      files: [
        { path: 'a.js', outcome: 'success', reason: 'formatted', formatter: 'javascript' },
        {
          path: 'b.js',
          outcome: 'fail',
          reason: 'format-error',
          formatter: 'javascript',
          message: 'Code cannot be formatted: Unexpected token',
        },
        { path: 'c.js', outcome: 'read-only', reason: 'read-only', formatter: null },
      ],
      not_started: 0,
      cache_persisted: true,
      duration_ms: 120,
    });
  });
});
