import type { BranchFailure } from '@logsweep/core';

/**
 * Failures recorded during one scan, in the order they were reported. All
 * tasks share one event loop, so appends never interleave.
 */
export class ScanErrors {
  private readonly failures: BranchFailure[] = [];

  add(failure: BranchFailure): void {
    this.failures.push(failure);
  }

  get count(): number {
    return this.failures.length;
  }

  list(): readonly BranchFailure[] {
    return [...this.failures];
  }

  toJSON(): Array<Record<string, unknown>> {
    return this.failures.map((failure) => failure.toJSON());
  }
}
