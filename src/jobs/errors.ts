import { ApiError, ServiceUnavailableError } from '../middlewares/errorHandler.middleware';
import { JobErrorKind, JobFailure, JobStatus } from '../types';
import { errorMessage } from '../utils/retry';

/**
 * Errors that end up in a job's `error` field. Each carries the classified
 * kind reported to pollers.
 */
export class JobError extends ApiError {
  public readonly kind: JobErrorKind;

  constructor(kind: JobErrorKind, statusCode: number, message: string) {
    super(statusCode, message, true);
    this.name = 'JobError';
    this.kind = kind;
    Object.setPrototypeOf(this, JobError.prototype);
  }

  toFailure(): JobFailure {
    return { kind: this.kind, message: this.message };
  }
}

export class JobNotFoundError extends JobError {
  constructor(jobId: string) {
    super('JobNotFound', 404, `Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
    Object.setPrototypeOf(this, JobNotFoundError.prototype);
  }
}

export class PluginNotFoundError extends JobError {
  constructor(pluginName: string) {
    super('PluginNotFound', 404, `Plugin not found: ${pluginName}`);
    this.name = 'PluginNotFoundError';
    Object.setPrototypeOf(this, PluginNotFoundError.prototype);
  }
}

export class PluginContractError extends JobError {
  constructor(pluginName: string, detail: string) {
    super('PluginContractError', 422, `Plugin ${pluginName} broke its contract: ${detail}`);
    this.name = 'PluginContractError';
    Object.setPrototypeOf(this, PluginContractError.prototype);
  }
}

export class PluginTimeoutError extends JobError {
  constructor(pluginName: string, timeoutMs: number) {
    super('PluginTimeout', 504, `Plugin ${pluginName} exceeded its ${timeoutMs}ms budget`);
    this.name = 'PluginTimeoutError';
    Object.setPrototypeOf(this, PluginTimeoutError.prototype);
  }
}

export class PluginExecutionError extends JobError {
  constructor(pluginName: string, cause: unknown) {
    super('PluginExecutionError', 500, `Plugin ${pluginName} failed: ${errorMessage(cause)}`);
    this.name = 'PluginExecutionError';
    Object.setPrototypeOf(this, PluginExecutionError.prototype);
  }
}

export class BrokerWriteError extends JobError {
  constructor(entityId: string, attempts: number, cause: unknown) {
    super(
      'BrokerWriteError',
      502,
      `Could not write ${entityId} to the context broker after ${attempts} attempt(s): ${errorMessage(cause)}`,
    );
    this.name = 'BrokerWriteError';
    Object.setPrototypeOf(this, BrokerWriteError.prototype);
  }
}

export class JobCancelledError extends JobError {
  constructor(jobId: string) {
    super('Cancelled', 409, `Job ${jobId} was cancelled before execution`);
    this.name = 'JobCancelledError';
    Object.setPrototypeOf(this, JobCancelledError.prototype);
  }
}

/**
 * A status change the lifecycle does not allow (backward move or second
 * terminal state).
 */
export class InvalidTransitionError extends ApiError {
  public readonly from: JobStatus;
  public readonly to: JobStatus;

  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(409, `Job ${jobId} cannot move from ${from} to ${to}`, true);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/**
 * The job is running under another worker whose lease is still valid.
 */
export class JobLeaseHeldError extends ApiError {
  constructor(jobId: string, holder: string | null, expiresAt: string | null) {
    super(409, `Job ${jobId} is leased by ${holder ?? 'another worker'} until ${expiresAt ?? 'unknown'}`, true);
    this.name = 'JobLeaseHeldError';
    Object.setPrototypeOf(this, JobLeaseHeldError.prototype);
  }
}

export class StoreUnavailableError extends ServiceUnavailableError {
  constructor(message: string) {
    super(message);
    this.name = 'StoreUnavailableError';
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

/**
 * Classify anything thrown while a job runs.
 */
export const toJobFailure = (error: unknown): JobFailure => {
  if (error instanceof JobError) return error.toFailure();
  return { kind: 'PluginExecutionError', message: errorMessage(error) };
};
