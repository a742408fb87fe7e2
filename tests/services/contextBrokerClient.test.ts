import express, { Request } from 'express';
import { Server } from 'http';
import { BrokerRequestError, OrionContextBrokerClient, parseStoredEntity } from '../../src/services/ContextBrokerClient';
import { buildPredictionEntity } from '../../src/services/PredictionPublisher';
import { PublishInput } from '../../src/types';

const CONTEXT_URL = 'http://context.test/ngsi-context.jsonld';
const ENTITY_ID = 'urn:ngsi-ld:Prediction:tenant-a:sensor-123-temperature';

const input: PublishInput = {
  tenantId: 'tenant-a',
  entityId: 'urn:ngsi-ld:Sensor:sensor-123',
  attribute: 'temperature',
  forecast: { predictions: [{ timestamp: '2024-01-15T13:00:00Z', value: 21.5 }], model: 'simple_predictor', confidence: 0.9 },
  sourceJobId: 'job-1',
};

interface RecordedRequest {
  method: string;
  path: string;
  query: Request['query'];
  headers: Request['headers'];
  body: unknown;
}

/**
 * Orion-LD stand-in: stores upserted entities per tenant and can be told
 * to answer the next request with a fixed status.
 */
const startFakeOrion = async () => {
  const app = express();
  const entities = new Map<string, unknown>();
  const requests: RecordedRequest[] = [];
  let forcedStatus: number | null = null;

  app.use(express.json({ type: ['application/json', 'application/ld+json'] }));
  app.use((req, res, next) => {
    requests.push({ method: req.method, path: req.path, query: req.query, headers: req.headers, body: req.body });
    if (forcedStatus !== null) {
      const status = forcedStatus;
      forcedStatus = null;
      res.status(status).json({ title: 'forced' });
      return;
    }
    next();
  });

  app.get('/ngsi-ld/v1/entities/:id', (req, res) => {
    const entity = entities.get(`${req.header('ngsild-tenant')}|${req.params.id}`);
    if (!entity) {
      res.status(404).json({ title: 'Entity Not Found' });
      return;
    }
    res.json(entity);
  });

  app.post('/ngsi-ld/v1/entityOperations/upsert', (req, res) => {
    const batch: unknown = req.body;
    if (Array.isArray(batch)) {
      for (const entity of batch) {
        const parsed = parseStoredEntity(entity);
        entities.set(`${req.header('ngsild-tenant')}|${parsed.id}`, entity);
      }
    }
    res.status(204).end();
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Fake Orion did not bind a TCP port');
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    requests,
    failNext: (status: number) => {
      forcedStatus = status;
    },
    close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
  };
};

describe('OrionContextBrokerClient', () => {
  let orion: Awaited<ReturnType<typeof startFakeOrion>>;
  let client: OrionContextBrokerClient;

  beforeEach(async () => {
    orion = await startFakeOrion();
    client = new OrionContextBrokerClient({ baseUrl: orion.baseUrl, contextUrl: CONTEXT_URL, timeoutMs: 1000 });
  });

  afterEach(async () => {
    await orion.close();
  });

  it('returns null for an entity the broker does not have', async () => {
    expect(await client.getEntity('tenant-a', ENTITY_ID)).toBeNull();
  });

  it('upserts with tenant headers and reads the entity back', async () => {
    const entity = buildPredictionEntity(input, new Date('2024-01-15T12:00:00.000Z'));
    await client.upsertEntity('tenant-a', entity);

    const upsert = orion.requests[0];
    expect(upsert.method).toBe('POST');
    expect(upsert.path).toBe('/ngsi-ld/v1/entityOperations/upsert');
    expect(upsert.query).toEqual({ options: 'replace' });
    expect(upsert.headers['content-type']).toBe('application/ld+json');
    expect(upsert.headers['ngsild-tenant']).toBe('tenant-a');
    expect(upsert.headers['fiware-service']).toBe('tenant-a');
    expect(upsert.headers['fiware-servicepath']).toBe('/');
    expect(upsert.body).toEqual([{ ...entity, '@context': [CONTEXT_URL] }]);

    expect(await client.getEntity('tenant-a', ENTITY_ID)).toEqual({
      id: ENTITY_ID,
      generatedAt: '2024-01-15T12:00:00.000Z',
    });
    const read = orion.requests[1];
    expect(read.path).toBe(`/ngsi-ld/v1/entities/${encodeURIComponent(ENTITY_ID)}`);
    expect(read.headers.link).toBe(
      `<${CONTEXT_URL}>; rel="http://www.w3.org/ns/json-ld#context"; type="application/ld+json"`,
    );
  });

  it('scopes entities by tenant', async () => {
    await client.upsertEntity('tenant-a', buildPredictionEntity(input, new Date('2024-01-15T12:00:00.000Z')));

    expect(await client.getEntity('tenant-b', ENTITY_ID)).toBeNull();
  });

  it('marks server errors as retryable', async () => {
    orion.failNext(503);

    const error = await client.getEntity('tenant-a', ENTITY_ID).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BrokerRequestError);
    expect(error).toMatchObject({ status: 503, retryable: true });
  });

  it('marks client errors as final', async () => {
    orion.failNext(400);

    const error = await client
      .upsertEntity('tenant-a', buildPredictionEntity(input, new Date()))
      .catch((err: unknown) => err);
    expect(error).toMatchObject({ status: 400, retryable: false });
  });

  it('treats a partial batch failure as final', async () => {
    orion.failNext(207);

    await expect(client.upsertEntity('tenant-a', buildPredictionEntity(input, new Date()))).rejects.toMatchObject({
      status: 207,
      retryable: false,
    });
  });
});

describe('parseStoredEntity', () => {
  it('reads generatedAt in its normalized and simplified forms', () => {
    expect(
      parseStoredEntity({
        id: ENTITY_ID,
        generatedAt: { type: 'Property', value: { '@type': 'DateTime', '@value': '2024-01-15T12:00:00Z' } },
      }),
    ).toEqual({ id: ENTITY_ID, generatedAt: '2024-01-15T12:00:00Z' });
    expect(parseStoredEntity({ id: ENTITY_ID, generatedAt: '2024-01-15T12:00:00Z' })).toEqual({
      id: ENTITY_ID,
      generatedAt: '2024-01-15T12:00:00Z',
    });
    expect(parseStoredEntity({ id: ENTITY_ID })).toEqual({ id: ENTITY_ID, generatedAt: null });
  });
});
