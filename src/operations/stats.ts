/**
 * Immutable view of the counters of an `OperationStats` accumulator.
 */
export type OperationStatsSnapshot = Readonly<{
  filesProcessed: number;
  directoriesProcessed: number;
  successfulOperations: number;
  failedOperations: number;
}>;

/**
 * Run-scoped counters updated by every operation of the manager that owns it.
 */
export class OperationStats {
  private filesProcessed = 0;
  private directoriesProcessed = 0;
  private successfulOperations = 0;
  private failedOperations = 0;

  countFile(): void {
    this.filesProcessed += 1;
  }

  countDirectory(): void {
    this.directoriesProcessed += 1;
  }

  countSuccess(): void {
    this.successfulOperations += 1;
  }

  countFailure(): void {
    this.failedOperations += 1;
  }

  reset(): void {
    this.filesProcessed = 0;
    this.directoriesProcessed = 0;
    this.successfulOperations = 0;
    this.failedOperations = 0;
  }

  snapshot(): OperationStatsSnapshot {
    return Object.freeze({
      filesProcessed: this.filesProcessed,
      directoriesProcessed: this.directoriesProcessed,
      successfulOperations: this.successfulOperations,
      failedOperations: this.failedOperations,
    });
  }
}
