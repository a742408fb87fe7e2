import axios, { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { DataPoint } from '../types';
import { NGSI_LD } from '../utils/constants';
import { errorMessage } from '../utils/retry';

interface Property<T> {
  type: 'Property';
  value: T;
}

interface DateTimeValue {
  '@type': 'DateTime';
  '@value': string;
}

/**
 * NGSI-LD representation of one forecast for an (entity, attribute) pair.
 */
export interface PredictionEntity {
  '@context'?: string[];
  id: string;
  type: typeof NGSI_LD.ENTITY_TYPE;
  refEntity: { type: 'Relationship'; object: string };
  predictedAttribute: Property<string>;
  predictions: Property<DataPoint[]>;
  model: Property<string>;
  confidence: Property<number> & { unitCode: string };
  generatedAt: Property<DateTimeValue>;
  sourceJobId: Property<string>;
}

/**
 * Minimal view of whatever the broker returns for an existing entity:
 * only `generatedAt` matters for ordering writes.
 */
export interface StoredEntity {
  id: string;
  generatedAt: string | null;
}

export interface ContextBrokerClient {
  getEntity(tenantId: string, entityId: string): Promise<StoredEntity | null>;
  upsertEntity(tenantId: string, entity: PredictionEntity): Promise<void>;
}

/**
 * Failed broker request. `retryable` is false for client errors that a
 * retry cannot fix.
 */
export class BrokerRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = 'BrokerRequestError';
    Object.setPrototypeOf(this, BrokerRequestError.prototype);
  }
}

const generatedAtSchema = z.union([
  z.object({ value: z.object({ '@value': z.string() }) }).transform((p) => p.value['@value']),
  z.object({ value: z.string() }).transform((p) => p.value),
  z.string(),
]);

const storedEntitySchema = z.object({
  id: z.string(),
  generatedAt: generatedAtSchema.optional(),
});

export const parseStoredEntity = (body: unknown): StoredEntity => {
  const parsed = storedEntitySchema.parse(body);
  return { id: parsed.id, generatedAt: parsed.generatedAt ?? null };
};

export interface OrionClientOptions {
  baseUrl: string;
  contextUrl: string;
  timeoutMs: number;
}

/**
 * 🛰️ Orion-LD client. Tenancy travels in `NGSILD-Tenant` (with the
 * `Fiware-Service` pair for older deployments), never in the REST API's
 * tenant header.
 */
export class OrionContextBrokerClient implements ContextBrokerClient {
  private readonly http: AxiosInstance;

  constructor(private readonly options: OrionClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
    });
  }

  async getEntity(tenantId: string, entityId: string): Promise<StoredEntity | null> {
    try {
      const response = await this.http.get<unknown>(
        `${NGSI_LD.ENTITIES_PATH}/${encodeURIComponent(entityId)}`,
        {
          headers: {
            ...this.tenantHeaders(tenantId),
            Accept: NGSI_LD.CONTENT_TYPE,
            Link: `<${this.options.contextUrl}>; rel="${NGSI_LD.CONTEXT_REL}"; type="${NGSI_LD.CONTENT_TYPE}"`,
          },
          validateStatus: (status) => status === 200 || status === 404,
        },
      );
      if (response.status === 404) return null;
      return parseStoredEntity(response.data);
    } catch (error) {
      throw this.toRequestError(`read ${entityId}`, error);
    }
  }

  async upsertEntity(tenantId: string, entity: PredictionEntity): Promise<void> {
    const body: PredictionEntity[] = [{ ...entity, '@context': [this.options.contextUrl] }];

    try {
      const response = await this.http.post<unknown>(NGSI_LD.UPSERT_PATH, body, {
        params: { options: 'replace' },
        headers: {
          ...this.tenantHeaders(tenantId),
          'Content-Type': NGSI_LD.CONTENT_TYPE,
        },
      });
      // 207 means some entity in the batch was rejected.
      if (response.status === 207) {
        throw new BrokerRequestError(
          `Broker rejected ${entity.id}: ${JSON.stringify(response.data)}`,
          207,
          false,
        );
      }
    } catch (error) {
      if (error instanceof BrokerRequestError) throw error;
      throw this.toRequestError(`upsert ${entity.id}`, error);
    }
  }

  private tenantHeaders(tenantId: string): Record<string, string> {
    return {
      'NGSILD-Tenant': tenantId,
      'Fiware-Service': tenantId,
      'Fiware-ServicePath': '/',
    };
  }

  private toRequestError(operation: string, error: unknown): BrokerRequestError {
    if (error instanceof BrokerRequestError) return error;
    if (isAxiosError(error)) {
      const status = error.response?.status ?? null;
      const retryable = status === null || status >= 500 || status === 429 || status === 408;
      return new BrokerRequestError(`Broker ${operation} failed: ${error.message}`, status, retryable);
    }
    if (error instanceof z.ZodError) {
      return new BrokerRequestError(`Broker ${operation} returned an unexpected body`, null, false);
    }
    return new BrokerRequestError(`Broker ${operation} failed: ${errorMessage(error)}`, null, true);
  }
}
