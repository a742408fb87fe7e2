import { MetricsSnapshot } from '../utils/metrics';

// ============================================================================
// Job Types
// ============================================================================

export type JobKind = 'analyze' | 'predict';
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed'];

export type JobErrorKind =
  | 'ValidationError'
  | 'PluginNotFound'
  | 'PluginContractError'
  | 'PluginTimeout'
  | 'PluginExecutionError'
  | 'BrokerWriteError'
  | 'JobNotFound'
  | 'Cancelled';

/** One (timestamp, value) sample, used for both history and forecasts. */
export interface DataPoint {
  timestamp: string;
  value: number;
}

export interface JobPayload {
  entityId: string;
  attribute: string;
  historicalData: DataPoint[];
  predictionHorizon: number;
  priority: number;
}

export interface JobFailure {
  kind: JobErrorKind;
  message: string;
}

export interface JobResult extends Forecast {
  brokerEntityId?: string;
  publishedAt?: string;
}

export interface Job {
  id: string;
  tenantId: string;
  kind: JobKind;
  pluginName: string;
  payload: JobPayload;
  status: JobStatus;
  result: JobResult | null;
  error: JobFailure | null;
  attempts: number;
  claimedBy: string | null;
  leaseExpiresAt: string | null;
  cancelRequested: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface NewJob {
  tenantId: string;
  kind: JobKind;
  pluginName: string;
  payload: JobPayload;
}

export type JobTransition =
  | { type: 'claim'; workerId: string; leaseMs: number }
  | { type: 'complete'; result: JobResult }
  | { type: 'fail'; error: JobFailure };

// ============================================================================
// Queue Types
// ============================================================================

/** What travels through the queue: a reference, never the payload. */
export interface JobRef {
  jobId: string;
  tenantId: string;
  priority: number;
}

export interface Delivery {
  deliveryId: string;
  jobId: string;
  tenantId: string;
  deliveryCount: number;
}

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
}

// ============================================================================
// Plugin Types
// ============================================================================

export interface Forecast {
  predictions: DataPoint[];
  model: string;
  confidence: number;
  metadata?: Record<string, unknown>;
}

export interface PluginInfo {
  name: string;
  description: string;
}

// ============================================================================
// Broker Types
// ============================================================================

export interface PublishInput {
  tenantId: string;
  entityId: string;
  attribute: string;
  forecast: Forecast;
  sourceJobId: string;
}

export interface PublishAck {
  entityId: string;
  generatedAt: string;
  written: boolean;
}

// ============================================================================
// Health Types
// ============================================================================

export interface HealthReport {
  status: 'ok' | 'degraded';
  timestamp: string;
  uptime: number;
  checks: {
    store: boolean;
    queue: QueueStats | null;
    workers: number;
    jobs: MetricsSnapshot;
  };
}
