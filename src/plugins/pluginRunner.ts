import { DataPoint, Forecast } from '../types';
import { IntelligencePlugin } from './IntelligencePlugin';
import { JobError, PluginContractError, PluginExecutionError, PluginTimeoutError } from '../jobs/errors';
import { withTimeout } from '../utils/retry';

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/**
 * Check a plugin's output against the contract. The sequence is never
 * truncated or padded.
 */
export function validateForecast(pluginName: string, forecast: unknown, horizon: number): Forecast {
  if (!isRecord(forecast)) {
    throw new PluginContractError(pluginName, 'result is not an object');
  }

  const { predictions, model, confidence, metadata } = forecast;
  if (!Array.isArray(predictions)) {
    throw new PluginContractError(pluginName, 'predictions is not an array');
  }
  if (predictions.length !== horizon) {
    throw new PluginContractError(pluginName, `expected ${horizon} forecast points, got ${predictions.length}`);
  }

  const points: DataPoint[] = predictions.map((point: unknown, index) => {
    if (!isRecord(point)) {
      throw new PluginContractError(pluginName, `point ${index} is not an object`);
    }
    const { timestamp, value } = point;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new PluginContractError(pluginName, `point ${index} has a non-finite value`);
    }
    if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) {
      throw new PluginContractError(pluginName, `point ${index} has an invalid timestamp`);
    }
    return { timestamp, value };
  });

  if (typeof model !== 'string') {
    throw new PluginContractError(pluginName, 'model is not a string');
  }
  if (typeof confidence !== 'number' || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new PluginContractError(pluginName, `confidence ${String(confidence)} is outside [0, 1]`);
  }

  return {
    predictions: points,
    model,
    confidence,
    ...(isRecord(metadata) ? { metadata } : {}),
  };
}

/**
 * Execute a plugin within a time budget and classify every way it can fail.
 *
 * A plugin that overruns is reported as timed out; its promise is left to
 * settle on its own since plugins cannot be preempted.
 */
export async function runPlugin(
  plugin: IntelligencePlugin,
  samples: DataPoint[],
  horizon: number,
  timeoutMs: number,
): Promise<Forecast> {
  let forecast: unknown;
  try {
    forecast = await withTimeout(
      Promise.resolve().then(() => plugin.execute(samples, horizon)),
      timeoutMs,
      () => new PluginTimeoutError(plugin.name, timeoutMs),
    );
  } catch (error) {
    if (error instanceof JobError) throw error;
    throw new PluginExecutionError(plugin.name, error);
  }

  return validateForecast(plugin.name, forecast, horizon);
}
