/**
 * Millisecond clock that never goes backwards and never repeats a value,
 * so timestamp-derived artifact paths stay unique within a process.
 */
export class MonotonicClock {
  private last = 0;

  constructor(private readonly wallClock: () => number = Date.now) {}

  nowMs(): number {
    const wall = this.wallClock();
    this.last = wall > this.last ? wall : this.last + 1;
    return this.last;
  }
}
