/**
 * @arch fmtkit.core.domain
 */
import type { FormatOutcome } from '../processing/types.js';

export interface RunCounts {
  successCount: number;
  failCount: number;
  skippedCount: number;
  readOnlyCount: number;
}

/**
 * Run counters. Each file is recorded exactly once; counters only grow.
 */
export class RunStatistics {
  private counts: RunCounts = {
    successCount: 0,
    failCount: 0,
    skippedCount: 0,
    readOnlyCount: 0,
  };

  record(outcome: FormatOutcome): void {
    switch (outcome) {
      case 'success':
        this.counts.successCount++;
        break;
      case 'fail':
        this.counts.failCount++;
        break;
      case 'skipped':
        this.counts.skippedCount++;
        break;
    }
  }

  recordReadOnly(): void {
    this.counts.readOnlyCount++;
  }

  total(): number {
    const c = this.counts;
    return c.successCount + c.failCount + c.skippedCount + c.readOnlyCount;
  }

  snapshot(): RunCounts {
    return { ...this.counts };
  }
}
