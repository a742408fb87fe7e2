import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import {
  DataPoint,
  Job,
  JobFailure,
  JobResult,
  JobStatus,
  JobTransition,
  NewJob,
  TERMINAL_STATUSES,
} from '../types';
import { InvalidTransitionError, JobLeaseHeldError } from '../jobs/errors';

const dataPointSchema: z.ZodType<DataPoint> = z.object({
  timestamp: z.string(),
  value: z.number(),
});

const jobResultSchema: z.ZodType<JobResult> = z.object({
  predictions: z.array(dataPointSchema),
  model: z.string(),
  confidence: z.number(),
  metadata: z.record(z.unknown()).optional(),
  brokerEntityId: z.string().optional(),
  publishedAt: z.string().optional(),
});

const jobFailureSchema: z.ZodType<JobFailure> = z.object({
  kind: z.enum([
    'ValidationError',
    'PluginNotFound',
    'PluginContractError',
    'PluginTimeout',
    'PluginExecutionError',
    'BrokerWriteError',
    'JobNotFound',
    'Cancelled',
  ]),
  message: z.string(),
});

/**
 * Shape of a job record as persisted. Parsing on every read keeps a
 * corrupted or foreign value from flowing into the worker.
 */
export const jobRecordSchema: z.ZodType<Job> = z.object({
  id: z.string(),
  tenantId: z.string(),
  kind: z.enum(['analyze', 'predict']),
  pluginName: z.string(),
  payload: z.object({
    entityId: z.string(),
    attribute: z.string(),
    historicalData: z.array(dataPointSchema),
    predictionHorizon: z.number().int().positive(),
    priority: z.number().int(),
  }),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  result: jobResultSchema.nullable(),
  error: jobFailureSchema.nullable(),
  attempts: z.number().int().nonnegative(),
  claimedBy: z.string().nullable(),
  leaseExpiresAt: z.string().nullable(),
  cancelRequested: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const parseJobRecord = (raw: string): Job => jobRecordSchema.parse(JSON.parse(raw));

export const isTerminal = (status: JobStatus): boolean => TERMINAL_STATUSES.includes(status);

export const buildJob = (input: NewJob, now: Date): Job => {
  const timestamp = now.toISOString();
  return {
    id: uuidv4(),
    tenantId: input.tenantId,
    kind: input.kind,
    pluginName: input.pluginName,
    payload: input.payload,
    status: 'pending',
    result: null,
    error: null,
    attempts: 0,
    claimedBy: null,
    leaseExpiresAt: null,
    cancelRequested: false,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
};

/**
 * Apply one lifecycle transition.
 *
 * pending → running → completed | failed. A `claim` on a running job is a
 * re-claim after redelivery and only succeeds once the previous lease has
 * expired. Anything else throws `InvalidTransitionError`.
 */
export function applyTransition(job: Job, transition: JobTransition, now: Date): Job {
  const updatedAt = now.toISOString();

  switch (transition.type) {
    case 'claim': {
      if (job.status === 'running' && job.leaseExpiresAt && Date.parse(job.leaseExpiresAt) > now.getTime()) {
        throw new JobLeaseHeldError(job.id, job.claimedBy, job.leaseExpiresAt);
      }
      if (job.status !== 'pending' && job.status !== 'running') {
        throw new InvalidTransitionError(job.id, job.status, 'running');
      }
      return {
        ...job,
        status: 'running',
        attempts: job.attempts + 1,
        claimedBy: transition.workerId,
        leaseExpiresAt: new Date(now.getTime() + transition.leaseMs).toISOString(),
        updatedAt,
      };
    }

    case 'complete': {
      if (job.status !== 'running') {
        throw new InvalidTransitionError(job.id, job.status, 'completed');
      }
      return {
        ...job,
        status: 'completed',
        result: transition.result,
        error: null,
        leaseExpiresAt: null,
        updatedAt,
      };
    }

    case 'fail': {
      if (job.status !== 'running') {
        throw new InvalidTransitionError(job.id, job.status, 'failed');
      }
      return {
        ...job,
        status: 'failed',
        result: null,
        error: transition.error,
        leaseExpiresAt: null,
        updatedAt,
      };
    }
  }
}

/**
 * Public representation returned by the REST API.
 */
export interface JobView {
  id: string;
  kind: Job['kind'];
  plugin: string;
  status: JobStatus;
  entity_id: string;
  attribute: string;
  prediction_horizon: number;
  attempts: number;
  cancel_requested: boolean;
  created_at: string;
  updated_at: string;
  result: JobResult | null;
  error: JobFailure | null;
}

export const toJobView = (job: Job): JobView => ({
  id: job.id,
  kind: job.kind,
  plugin: job.pluginName,
  status: job.status,
  entity_id: job.payload.entityId,
  attribute: job.payload.attribute,
  prediction_horizon: job.payload.predictionHorizon,
  attempts: job.attempts,
  cancel_requested: job.cancelRequested,
  created_at: job.createdAt,
  updated_at: job.updatedAt,
  result: job.result,
  error: job.error,
});
