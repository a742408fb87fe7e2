import { DataPoint, Forecast } from '../types';
import { IntelligencePlugin } from './IntelligencePlugin';
import { PLUGIN_NAMES } from '../utils/constants';
import { toIsoSeconds } from '../utils/clock';

const HOUR_MS = 60 * 60 * 1000;

const median = (values: number[]): number => {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
};

/**
 * Flat forecast at the mean of the most recent samples, stepped at the
 * median spacing of the history (hourly when there is a single sample).
 */
export class MovingAveragePredictor implements IntelligencePlugin {
  readonly name = PLUGIN_NAMES.MOVING_AVERAGE;
  readonly description = 'Mean of the most recent samples, projected flat';

  constructor(private readonly window = 6) {}

  async execute(samples: DataPoint[], horizon: number): Promise<Forecast> {
    if (samples.length === 0) {
      throw new Error('Need at least 1 historical data point');
    }

    const times = samples.map((point) => Date.parse(point.timestamp));
    if (times.some(Number.isNaN)) {
      throw new Error('Historical data contains an unparsable timestamp');
    }

    const recent = samples.slice(-this.window);
    const mean = recent.reduce((sum, point) => sum + point.value, 0) / recent.length;
    const value = Math.round(mean * 100) / 100;

    const gaps = times.slice(1).map((time, index) => time - times[index]);
    const step = gaps.length > 0 ? median(gaps) : HOUR_MS;
    const lastTime = times[times.length - 1];

    const predictions: DataPoint[] = Array.from({ length: horizon }, (_, index) => ({
      timestamp: toIsoSeconds(new Date(lastTime + (index + 1) * step)),
      value,
    }));

    return {
      predictions,
      confidence: Math.round(Math.max(0.3, 0.8 - horizon / 200) * 100) / 100,
      model: this.name,
      metadata: { window: recent.length, stepMs: step },
    };
  }
}
