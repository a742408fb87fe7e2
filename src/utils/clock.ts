/**
 * Wall clock that never repeats or goes backwards within one process.
 * Prediction entities are ordered by the instants it hands out.
 */
export class MonotonicClock {
  private last = 0;

  constructor(private readonly source: () => number = Date.now) {}

  next(): Date {
    const now = this.source();
    this.last = now > this.last ? now : this.last + 1;
    return new Date(this.last);
  }
}

/** ISO-8601 without the millisecond part, e.g. `2024-01-15T10:00:00Z`. */
export const toIsoSeconds = (date: Date): string => date.toISOString().replace(/\.\d{3}Z$/, 'Z');
