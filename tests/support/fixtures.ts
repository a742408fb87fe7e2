import { AppConfig, loadConfig } from '../../src/config/app.config';
import { DataPoint, Job, JobStatus, NewJob } from '../../src/types';
import { JobStore } from '../../src/services/JobStore';

const HOUR_MS = 60 * 60 * 1000;

/** Hourly samples starting at 2024-01-15T00:00:00Z. */
export const hourlySeries = (values: number[], start = '2024-01-15T00:00:00Z'): DataPoint[] => {
  const origin = Date.parse(start);
  return values.map((value, index) => ({
    timestamp: new Date(origin + index * HOUR_MS).toISOString(),
    value,
  }));
};

export const newJob = (overrides: Partial<NewJob> = {}): NewJob => ({
  tenantId: 'tenant-a',
  kind: 'predict',
  pluginName: 'simple_predictor',
  payload: {
    entityId: 'urn:ngsi-ld:Sensor:sensor-123',
    attribute: 'temperature',
    historicalData: hourlySeries([20, 21, 22, 23]),
    predictionHorizon: 24,
    priority: 0,
  },
  ...overrides,
});

export const testConfig = (env: Record<string, string> = {}): AppConfig =>
  loadConfig({
    NODE_ENV: 'test',
    QUEUE_DRIVER: 'memory',
    WORKER_COUNT: '2',
    DEQUEUE_TIMEOUT_MS: '20',
    VISIBILITY_TIMEOUT_MS: '5000',
    PLUGIN_TIMEOUT_MS: '1000',
    BROKER_TIMEOUT_MS: '100',
    BROKER_MAX_ATTEMPTS: '2',
    BROKER_BACKOFF_MS: '1',
    BROKER_MAX_BACKOFF_MS: '5',
    INTAKE_RETRY_ATTEMPTS: '3',
    INTAKE_RETRY_BACKOFF_MS: '1',
    ...env,
  });

/**
 * Poll until `check` returns a value or the deadline passes.
 */
export async function waitFor<T>(check: () => Promise<T | undefined>, timeoutMs = 2000): Promise<T> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const value = await check();
    if (value !== undefined) return value;
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

export const waitForStatus = (
  store: JobStore,
  tenantId: string,
  jobId: string,
  statuses: JobStatus[] = ['completed', 'failed'],
): Promise<Job> =>
  waitFor(async () => {
    const job = await store.get(jobId, tenantId);
    return statuses.includes(job.status) ? job : undefined;
  });
