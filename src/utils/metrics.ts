import { JobKind } from '../types';

export type JobOutcome = 'completed' | 'failed' | 'skipped' | 'deferred';

interface Sample {
  value: number;
  timestamp: number;
}

export interface MetricsSnapshot {
  outcomes: Record<JobOutcome, number>;
  averageDurationMs: Record<JobKind, number | null>;
}

const MAX_SAMPLES = 500;

export class MetricsCollector {
  private samples: Map<string, Sample[]>;
  private outcomes: Record<JobOutcome, number>;

  constructor() {
    this.samples = new Map();
    this.outcomes = { completed: 0, failed: 0, skipped: 0, deferred: 0 };
  }

  recordJobDuration(kind: JobKind, durationMs: number) {
    this.record(`job_duration_${kind}`, durationMs);
  }

  recordOutcome(outcome: JobOutcome) {
    this.outcomes[outcome] += 1;
  }

  snapshot(): MetricsSnapshot {
    return {
      outcomes: { ...this.outcomes },
      averageDurationMs: {
        analyze: this.average('job_duration_analyze'),
        predict: this.average('job_duration_predict'),
      },
    };
  }

  private record(key: string, value: number) {
    const series = this.samples.get(key) ?? [];
    series.push({ value, timestamp: Date.now() });
    if (series.length > MAX_SAMPLES) series.shift();
    this.samples.set(key, series);
  }

  private average(key: string): number | null {
    const series = this.samples.get(key);
    if (!series || series.length === 0) return null;
    const total = series.reduce((sum, sample) => sum + sample.value, 0);
    return Math.round(total / series.length);
  }
}
