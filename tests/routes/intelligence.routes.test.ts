import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import type { Redis } from 'ioredis';
import { createApp } from '../../src/app';
import { ServiceContext, closeServiceContext, createServiceContext } from '../../src/config/context';
import { InMemoryContextBroker } from '../support/InMemoryContextBroker';
import { createTestRedis } from '../support/redis';
import { hourlySeries, testConfig, waitForStatus } from '../support/fixtures';
import { jobSchemas } from '../../src/middlewares/validation.middleware';

const PREFIX = '/api/intelligence';

const predictBody = {
  entity_id: 'urn:ngsi-ld:Sensor:sensor-123',
  attribute: 'temperature',
  historical_data: hourlySeries([20, 21, 22, 23]),
  prediction_horizon: 24,
};

describe('Intelligence REST API', () => {
  let redis: Redis;
  let context: ServiceContext;
  let server: Server;
  let http: AxiosInstance;

  const asTenant = (tenantId: string) => ({ headers: { 'X-Tenant-ID': tenantId } });

  beforeEach(async () => {
    redis = createTestRedis();
    await redis.flushall();
    context = createServiceContext(testConfig(), { redis, broker: new InMemoryContextBroker() });

    const app = createApp(context, { distributedRateLimit: false });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('API did not bind a TCP port');

    http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await closeServiceContext(context);
    jest.restoreAllMocks();
  });

  describe('POST /predict', () => {
    it('accepts a job and answers 202 with its id', async () => {
      const res = await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));

      expect(res.status).toBe(202);
      expect(res.data.success).toBe(true);
      expect(res.data.data.status).toBe('pending');
      expect(typeof res.data.data.job_id).toBe('string');
    });

    it('requires the tenant header', async () => {
      const res = await http.post(`${PREFIX}/predict`, predictBody);

      expect(res.status).toBe(400);
      expect(res.data).toEqual({ success: false, message: 'Missing X-Tenant-ID header', kind: 'ValidationError', errors: [] });
    });

    it('rejects a horizon outside 1..168', async () => {
      const res = await http.post(`${PREFIX}/predict`, { ...predictBody, prediction_horizon: 0 }, asTenant('tenant-a'));

      expect(res.status).toBe(400);
      expect(res.data.kind).toBe('ValidationError');
      expect(res.data.errors).toContain('prediction_horizon: Number must be greater than or equal to 1');
    });

    it('rejects history that is not in ascending time order', async () => {
      const history = [...predictBody.historical_data].reverse();
      const res = await http.post(`${PREFIX}/predict`, { ...predictBody, historical_data: history }, asTenant('tenant-a'));

      expect(res.status).toBe(400);
      expect(res.data.errors).toContain('historical_data.1.timestamp: timestamps must be strictly ascending');
    });

    it('rejects a malformed plugin name but accepts an unknown one', async () => {
      const malformed = await http.post(`${PREFIX}/predict`, { ...predictBody, plugin: 'Bad Name' }, asTenant('tenant-a'));
      const unknown = await http.post(`${PREFIX}/predict`, { ...predictBody, plugin: 'nonexistent' }, asTenant('tenant-a'));

      expect(malformed.status).toBe(400);
      expect(malformed.data.errors).toContain('plugin: plugin names use lowercase letters, digits, _ and -');
      expect(unknown.status).toBe(202);
    });

    it('rejects malformed JSON', async () => {
      const res = await http.post(`${PREFIX}/predict`, '{"entity_id":', {
        headers: { 'X-Tenant-ID': 'tenant-a', 'Content-Type': 'application/json' },
      });

      expect(res.status).toBe(400);
      expect(res.data.message).toBe('Malformed JSON body');
    });

    it('applies defaults for horizon, plugin and priority', async () => {
      const { prediction_horizon: _omitted, ...body } = predictBody;
      const created = await http.post(`${PREFIX}/analyze`, body, asTenant('tenant-a'));
      const res = await http.get(`${PREFIX}/jobs/${created.data.data.job_id}`, asTenant('tenant-a'));

      expect(res.data.data).toMatchObject({
        kind: 'analyze',
        plugin: 'simple_predictor',
        prediction_horizon: 24,
        status: 'pending',
      });
    });

    it('validates the body once, in the middleware', async () => {
      const parse = jest.spyOn(jobSchemas.request, 'parse');
      const safeParse = jest.spyOn(jobSchemas.request, 'safeParseAsync');

      const res = await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));

      expect(res.status).toBe(202);
      expect(safeParse).toHaveBeenCalledTimes(1);
      expect(parse).not.toHaveBeenCalled();
    });

    it('answers 503 when the store stays unreachable', async () => {
      const create = jest.spyOn(context.store, 'create').mockRejectedValue(new Error('ECONNREFUSED'));

      const res = await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));

      expect(res.status).toBe(503);
      expect(res.data.message).toBe('Could not create predict job: ECONNREFUSED');
      expect(create).toHaveBeenCalledTimes(3);
    });
  });

  describe('GET /jobs/:jobId', () => {
    it('reports the completed result once a worker has run', async () => {
      context.workers.start();
      const created = await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));
      const jobId: string = created.data.data.job_id;
      await waitForStatus(context.store, 'tenant-a', jobId);

      const res = await http.get(`${PREFIX}/jobs/${jobId}`, asTenant('tenant-a'));

      expect(res.status).toBe(200);
      expect(res.data.data.status).toBe('completed');
      expect(res.data.data.result.predictions).toHaveLength(24);
      expect(res.data.data.error).toBeNull();
    });

    it('does not reveal jobs to another tenant', async () => {
      const created = await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));
      const jobId: string = created.data.data.job_id;

      const res = await http.get(`${PREFIX}/jobs/${jobId}`, asTenant('tenant-b'));

      expect(res.status).toBe(404);
      expect(res.data).toEqual({ success: false, message: `Job ${jobId} not found`, kind: 'JobNotFound' });
    });
  });

  describe('DELETE /jobs/:jobId', () => {
    it('flags a pending job for cancellation', async () => {
      const created = await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));

      const res = await http.delete(`${PREFIX}/jobs/${created.data.data.job_id}`, asTenant('tenant-a'));

      expect(res.status).toBe(200);
      expect(res.data.data.cancel_requested).toBe(true);
      expect(res.data.data.status).toBe('pending');
    });

    it('refuses to cancel a finished job', async () => {
      const created = await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));
      const jobId: string = created.data.data.job_id;
      await context.store.transition(jobId, 'tenant-a', { type: 'claim', workerId: 'w1', leaseMs: 1000 });
      await context.store.transition(jobId, 'tenant-a', {
        type: 'complete',
        result: { predictions: [], model: 'simple_predictor', confidence: 0.5 },
      });

      const res = await http.delete(`${PREFIX}/jobs/${jobId}`, asTenant('tenant-a'));

      expect(res.status).toBe(409);
      expect(res.data.message).toBe(`Job ${jobId} cannot move from completed to failed`);
    });
  });

  describe('GET /jobs', () => {
    it('lists the pending jobs of the calling tenant only', async () => {
      await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));
      await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-a'));
      await http.post(`${PREFIX}/predict`, predictBody, asTenant('tenant-b'));

      const res = await http.get(`${PREFIX}/jobs?status=pending`, asTenant('tenant-a'));

      expect(res.status).toBe(200);
      expect(res.data.data).toHaveLength(2);
    });

    it('only supports the pending filter', async () => {
      const res = await http.get(`${PREFIX}/jobs?status=running`, asTenant('tenant-a'));
      expect(res.status).toBe(400);
    });
  });

  describe('POST /webhook/n8n', () => {
    it('creates a job from fields nested in data', async () => {
      const res = await http.post(
        `${PREFIX}/webhook/n8n`,
        {
          analysis_type: 'predict',
          data: {
            entity_id: 'urn:ngsi-ld:Sensor:sensor-9',
            attribute: 'humidity',
            historical_data: hourlySeries([50, 52]),
            prediction_horizon: 6,
          },
        },
        asTenant('tenant-a'),
      );

      expect(res.status).toBe(202);
      expect(res.data.message).toBe('predict job created from webhook');

      const job = await http.get(`${PREFIX}/jobs/${res.data.data.job_id}`, asTenant('tenant-a'));
      expect(job.data.data).toMatchObject({
        kind: 'predict',
        entity_id: 'urn:ngsi-ld:Sensor:sensor-9',
        attribute: 'humidity',
        prediction_horizon: 6,
      });
    });

    it('requires an entity and attribute somewhere in the payload', async () => {
      const res = await http.post(`${PREFIX}/webhook/n8n`, { data: { historical_data: hourlySeries([1, 2]) } }, asTenant('tenant-a'));

      expect(res.status).toBe(400);
      expect(res.data.kind).toBe('ValidationError');
    });
  });

  describe('GET /plugins', () => {
    it('lists registered plugins without a tenant header', async () => {
      const res = await http.get(`${PREFIX}/plugins`);

      expect(res.status).toBe(200);
      expect(res.data.data.map((plugin: { name: string }) => plugin.name)).toEqual(['moving_average', 'simple_predictor']);
    });
  });

  describe('GET /health', () => {
    it('reports ok when store and queue answer', async () => {
      const res = await http.get('/health');

      expect(res.status).toBe(200);
      expect(res.data.status).toBe('ok');
      expect(res.data.checks).toEqual({
        store: true,
        queue: { waiting: 0, active: 0, completed: 0, failed: 0 },
        workers: 0,
        jobs: {
          outcomes: { completed: 0, failed: 0, skipped: 0, deferred: 0 },
          averageDurationMs: { analyze: null, predict: null },
        },
      });
    });

    it('reports job outcomes and durations recorded by the workers', async () => {
      context.metrics.recordOutcome('completed');
      context.metrics.recordOutcome('failed');
      context.metrics.recordJobDuration('predict', 40);
      context.metrics.recordJobDuration('predict', 61);

      const res = await http.get('/health');

      expect(res.data.checks.jobs).toEqual({
        outcomes: { completed: 1, failed: 1, skipped: 0, deferred: 0 },
        averageDurationMs: { analyze: null, predict: 51 },
      });
    });

    it('reports degraded when the store is down', async () => {
      jest.spyOn(context.store, 'ping').mockRejectedValue(new Error('ECONNREFUSED'));

      const res = await http.get('/health');

      expect(res.status).toBe(503);
      expect(res.data.status).toBe('degraded');
      expect(res.data.checks.store).toBe(false);
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await http.get('/nope');
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ success: false, message: 'Route not found' });
  });
});
