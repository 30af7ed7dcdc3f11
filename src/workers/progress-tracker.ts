/**
 * Progress Tracker
 *
 * Counts successful tasks for one batch run. Increments happen between
 * suspension points on the event loop, so the final count is exact no
 * matter how workers interleave. A new run takes a new tracker.
 */
export class ProgressTracker {
  readonly total: number;
  private completedCount: number;

  constructor(total: number) {
    if (!Number.isInteger(total) || total < 1) {
      throw new RangeError(`Progress total must be a positive integer, got ${total}`);
    }
    this.total = total;
    this.completedCount = 0;
  }

  get completed(): number {
    return this.completedCount;
  }

  /**
   * Count one success and return the new value
   */
  recordSuccess(): number {
    if (this.completedCount >= this.total) {
      throw new RangeError(
        `Cannot record more than ${this.total} successes`,
      );
    }
    this.completedCount++;
    return this.completedCount;
  }

  percentage(): number {
    return (100 * this.completedCount) / this.total;
  }
}
