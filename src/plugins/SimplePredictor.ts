import { DataPoint, Forecast } from '../types';
import { IntelligencePlugin } from './IntelligencePlugin';
import { PLUGIN_NAMES } from '../utils/constants';
import { toIsoSeconds } from '../utils/clock';

const HOUR_MS = 60 * 60 * 1000;

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * Linear trend extrapolation in hourly steps from the last sample.
 *
 * trend = (last - first) / sampleCount; confidence decays with the horizon
 * and never drops below 0.5.
 */
export class SimplePredictor implements IntelligencePlugin {
  readonly name = PLUGIN_NAMES.SIMPLE_PREDICTOR;
  readonly description = 'Linear trend extrapolation over the submitted history';

  async execute(samples: DataPoint[], horizon: number): Promise<Forecast> {
    if (samples.length < 2) {
      throw new Error('Need at least 2 historical data points');
    }

    const values = samples.map((point) => point.value);
    const first = values[0];
    const last = values[values.length - 1];
    const trend = (last - first) / values.length;
    const lastTimestamp = Date.parse(samples[samples.length - 1].timestamp);
    if (Number.isNaN(lastTimestamp)) {
      throw new Error(`Unparsable timestamp: ${samples[samples.length - 1].timestamp}`);
    }

    const predictions: DataPoint[] = [];
    for (let hour = 1; hour <= horizon; hour++) {
      predictions.push({
        timestamp: toIsoSeconds(new Date(lastTimestamp + hour * HOUR_MS)),
        value: round(last + trend * hour, 2),
      });
    }

    return {
      predictions,
      confidence: round(Math.max(0.5, 0.9 - horizon / 100), 2),
      model: this.name,
      metadata: {
        trend: round(trend, 4),
        dataPoints: samples.length,
      },
    };
  }
}
