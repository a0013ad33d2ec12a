export interface ProgressSnapshot {
  projectsTotal: number;
  projectsScanned: number;
  chunksEmitted: number;
  errorCount: number;
  percentComplete: number;
  message: string;
}

export class ScanProgress {
  private projectsTotal = 0;

  private projectsScanned = 0;

  private chunksEmitted = 0;

  private errorCount = 0;

  start(projectsTotal: number): void {
    this.projectsTotal = projectsTotal;
    this.projectsScanned = 0;
    this.chunksEmitted = 0;
    this.errorCount = 0;
  }

  /** Counts a finished project, failed or not, with the chunks it emitted. */
  completeProject(chunks: number, failed: boolean): void {
    this.projectsScanned += 1;
    this.chunksEmitted += chunks;
    if (failed) {
      this.errorCount += 1;
    }
  }

  /** Counts chunks from a project that stopped on cancellation; it is not scanned. */
  recordChunks(chunks: number): void {
    this.chunksEmitted += chunks;
  }

  snapshot(): ProgressSnapshot {
    const percentComplete =
      this.projectsTotal === 0 ? 100 : Math.floor((this.projectsScanned / this.projectsTotal) * 100);
    return {
      projectsTotal: this.projectsTotal,
      projectsScanned: this.projectsScanned,
      chunksEmitted: this.chunksEmitted,
      errorCount: this.errorCount,
      percentComplete,
      message: `scanned ${this.projectsScanned}/${this.projectsTotal} projects`,
    };
  }
}
