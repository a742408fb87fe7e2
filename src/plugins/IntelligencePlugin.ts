import { DataPoint, Forecast } from '../types';

/**
 * Uniform contract for analysis capabilities.
 *
 * Implementations are stateless across calls and never touch the job
 * store or queue. `execute` must resolve with exactly `horizon` forecast
 * points; the runner rejects anything else.
 */
export interface IntelligencePlugin {
  readonly name: string;
  readonly description: string;
  execute(samples: DataPoint[], horizon: number): Promise<Forecast>;
}
