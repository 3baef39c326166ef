export const DEFAULT_HISTORY_LENGTH = 10;

/**
 * Fixed-capacity sliding window over numeric samples. The oldest sample is
 * evicted first once the window is full.
 */
export class MovingAverage {
  private readonly samples: number[] = [];

  constructor(readonly capacity = DEFAULT_HISTORY_LENGTH) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Moving average capacity must be a positive integer (received ${capacity})`);
    }
  }

  get size() {
    return this.samples.length;
  }

  push(sample: number) {
    if (!Number.isFinite(sample)) {
      throw new RangeError(`Sample must be a finite number (received ${sample})`);
    }

    this.samples.push(sample);
    if (this.samples.length > this.capacity) {
      this.samples.shift();
    }
  }

  current(): number | null {
    if (this.samples.length === 0) {
      return null;
    }
    let total = 0;
    for (const sample of this.samples) {
      total += sample;
    }
    return total / this.samples.length;
  }

  values(): number[] {
    return [...this.samples];
  }

  clear() {
    this.samples.length = 0;
  }
}
