import { FailureRecord } from '../core/types';

/**
 * Counters for one batch invocation
 */
export class RunStats {
  translatedCount = 0;
  skippedCount = 0;
  readonly failures: FailureRecord[] = [];
  private readonly written = new Set<string>();

  get failedCount(): number {
    return this.failures.length;
  }

  /** Output paths written during this batch, in write order */
  get outputPaths(): string[] {
    return [...this.written];
  }

  recordOutput(filePath: string): void {
    this.written.add(filePath);
  }

  recordFailure(failure: FailureRecord): void {
    this.failures.push(failure);
  }

  /**
   * Fold another batch's stats into this one
   */
  merge(other: RunStats): this {
    this.translatedCount += other.translatedCount;
    this.skippedCount += other.skippedCount;
    this.failures.push(...other.failures);
    for (const filePath of other.outputPaths) {
      this.written.add(filePath);
    }
    return this;
  }
}
