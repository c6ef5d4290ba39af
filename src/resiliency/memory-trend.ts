import type { LeakSignal } from './types.js';

/**
 * Sliding window of memory samples (MB), oldest first.
 *
 * Once the window is full, a sample more than `thresholdMb` above the
 * oldest retained sample is reported as a possible leak. The baseline is
 * therefore "about `capacity` check intervals ago".
 */
export class MemoryTrendTracker {
  private readonly window: number[] = [];
  readonly capacity: number;
  readonly thresholdMb: number;

  constructor(options: { capacity: number; thresholdMb: number; history?: readonly number[] }) {
    if (options.capacity < 2) {
      throw new RangeError(`Memory window capacity must be at least 2, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.thresholdMb = options.thresholdMb;
    for (const sample of (options.history ?? []).slice(-this.capacity)) {
      this.window.push(sample);
    }
  }

  observe(sampleMb: number): LeakSignal | null {
    this.window.push(sampleMb);
    if (this.window.length > this.capacity) {
      this.window.shift();
    }
    if (this.window.length < this.capacity) {
      return null;
    }

    const oldestMb = this.window[0];
    const growthMb = sampleMb - oldestMb;
    if (growthMb > this.thresholdMb) {
      return { growthMb, oldestMb, latestMb: sampleMb, windowSize: this.window.length };
    }
    return null;
  }

  get size(): number {
    return this.window.length;
  }

  get latest(): number | undefined {
    return this.window[this.window.length - 1];
  }

  samples(): number[] {
    return [...this.window];
  }
}
