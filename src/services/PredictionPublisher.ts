import { PublishAck, PublishInput } from '../types';
import { BrokerRequestError, ContextBrokerClient, PredictionEntity } from './ContextBrokerClient';
import { BrokerWriteError } from '../jobs/errors';
import { NGSI_LD } from '../utils/constants';
import { MonotonicClock } from '../utils/clock';
import { logger } from '../utils/logger';
import { errorMessage, withRetry } from '../utils/retry';

export interface PredictionPublisherOptions {
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
}

/**
 * Stable entity id for a (tenant, entity, attribute) key. Only the last
 * `:` segment of the source entity id is kept.
 */
export const buildPredictionEntityId = (tenantId: string, entityId: string, attribute: string): string => {
  const localId = entityId.split(':').pop() || entityId;
  return `${NGSI_LD.ID_PREFIX}:${tenantId}:${localId}-${attribute}`;
};

export const buildPredictionEntity = (input: PublishInput, generatedAt: Date): PredictionEntity => ({
  id: buildPredictionEntityId(input.tenantId, input.entityId, input.attribute),
  type: NGSI_LD.ENTITY_TYPE,
  refEntity: { type: 'Relationship', object: input.entityId },
  predictedAttribute: { type: 'Property', value: input.attribute },
  predictions: { type: 'Property', value: input.forecast.predictions },
  model: { type: 'Property', value: input.forecast.model },
  confidence: {
    type: 'Property',
    value: input.forecast.confidence,
    unitCode: NGSI_LD.DIMENSIONLESS_UNIT,
  },
  generatedAt: {
    type: 'Property',
    value: { '@type': 'DateTime', '@value': generatedAt.toISOString() },
  },
  sourceJobId: { type: 'Property', value: input.sourceJobId },
});

const isRetryable = (error: unknown): boolean => !(error instanceof BrokerRequestError) || error.retryable;

/**
 * 📡 Writes forecasts into the context broker.
 *
 * Every attempt stamps the entity with a fresh instant from a monotonic
 * clock and only writes when the broker holds nothing newer, so a
 * redelivered or reordered job can never roll back a fresher prediction.
 */
export class PredictionPublisher {
  constructor(
    private readonly broker: ContextBrokerClient,
    private readonly options: PredictionPublisherOptions,
    private readonly clock: MonotonicClock = new MonotonicClock(),
  ) {}

  async publish(input: PublishInput): Promise<PublishAck> {
    const entityId = buildPredictionEntityId(input.tenantId, input.entityId, input.attribute);
    let attempts = 0;

    try {
      return await withRetry(
        async (attempt) => {
          attempts = attempt;
          return this.attempt(input, entityId);
        },
        {
          maxAttempts: this.options.maxAttempts,
          initialDelayMs: this.options.backoffMs,
          maxDelayMs: this.options.maxBackoffMs,
          shouldRetry: isRetryable,
          onRetry: (error, attempt, delayMs) =>
            logger.warn(
              `[Job ${input.sourceJobId}] 🔁 Broker write ${attempt} for ${entityId} failed (${errorMessage(error)}), retrying in ${delayMs}ms`,
            ),
        },
      );
    } catch (error) {
      logger.error(`[Job ${input.sourceJobId}] 💥 Giving up on ${entityId} after ${attempts} attempt(s)`);
      throw new BrokerWriteError(entityId, attempts, error);
    }
  }

  private async attempt(input: PublishInput, entityId: string): Promise<PublishAck> {
    const generatedAt = this.clock.next();
    const existing = await this.broker.getEntity(input.tenantId, entityId);

    if (existing?.generatedAt) {
      const storedAt = Date.parse(existing.generatedAt);
      if (!Number.isNaN(storedAt) && storedAt >= generatedAt.getTime()) {
        logger.info(`[Job ${input.sourceJobId}] ⏭️ ${entityId} already holds a newer prediction, skipping write`);
        return { entityId, generatedAt: existing.generatedAt, written: false };
      }
    }

    await this.broker.upsertEntity(input.tenantId, buildPredictionEntity(input, generatedAt));
    logger.info(`[Job ${input.sourceJobId}] 📡 Upserted ${entityId} (${input.forecast.predictions.length} points)`);
    return { entityId, generatedAt: generatedAt.toISOString(), written: true };
  }
}
