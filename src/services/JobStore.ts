import type { Redis } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { Job, JobTransition, NewJob } from '../types';
import { applyTransition, buildJob, isTerminal, parseJobRecord } from '../models/Job';
import { InvalidTransitionError, JobNotFoundError, StoreUnavailableError } from '../jobs/errors';
import { logger } from '../utils/logger';
import { sleep } from '../utils/retry';

/**
 * Durable job records. Every read is scoped by tenant: a record owned by
 * another tenant is reported exactly like a missing one.
 */
export interface JobStore {
  create(input: NewJob): Promise<Job>;
  get(jobId: string, tenantId: string): Promise<Job>;
  transition(jobId: string, tenantId: string, transition: JobTransition): Promise<Job>;
  requestCancel(jobId: string, tenantId: string): Promise<Job>;
  listPending(tenantId?: string): Promise<Job[]>;
  ping(): Promise<boolean>;
}

const RELEASE_LOCK_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0
`;

/**
 * Delete `lockKey` only while it still holds `token`. Returns whether the
 * lock was released.
 */
export async function releaseLock(redis: Redis, lockKey: string, token: string): Promise<boolean> {
  const reply = await redis.eval(RELEASE_LOCK_SCRIPT, 1, lockKey, token);
  return reply === 1;
}

export interface RedisJobStoreOptions {
  keyPrefix?: string;
  retentionSeconds?: number;
  lockTtlMs?: number;
  lockAttempts?: number;
  lockRetryDelayMs?: number;
  now?: () => Date;
}

type ExecResult = [error: Error | null, result: unknown][] | null;

/**
 * 🗄️ Redis implementation.
 *
 * Layout (default prefix `intelligence:`):
 * - `job:{id}`             JSON record, expires after the retention period
 * - `pending`              sorted set of pending ids, scored by creation time
 * - `pending:{tenant}`     same, per tenant
 * - `lock:{id}`            short-lived mutex around read-modify-write
 */
export class RedisJobStore implements JobStore {
  private readonly keyPrefix: string;
  private readonly retentionSeconds: number;
  private readonly lockTtlMs: number;
  private readonly lockAttempts: number;
  private readonly lockRetryDelayMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly redis: Redis,
    options: RedisJobStoreOptions = {},
  ) {
    this.keyPrefix = options.keyPrefix ?? 'intelligence:';
    this.retentionSeconds = options.retentionSeconds ?? 7 * 24 * 60 * 60;
    this.lockTtlMs = options.lockTtlMs ?? 5000;
    this.lockAttempts = options.lockAttempts ?? 50;
    this.lockRetryDelayMs = options.lockRetryDelayMs ?? 20;
    this.now = options.now ?? (() => new Date());
  }

  async create(input: NewJob): Promise<Job> {
    const job = buildJob(input, this.now());
    const score = Date.parse(job.createdAt);

    const results: ExecResult = await this.redis
      .multi()
      .set(this.jobKey(job.id), JSON.stringify(job), 'EX', this.retentionSeconds)
      .zadd(this.pendingKey(), score, job.id)
      .zadd(this.pendingKey(job.tenantId), score, job.id)
      .exec();
    this.assertExec(results, `create job ${job.id}`);

    logger.info(`🆕 Created ${job.kind} job ${job.id} for tenant ${job.tenantId} (plugin ${job.pluginName})`);
    return job;
  }

  async get(jobId: string, tenantId: string): Promise<Job> {
    const raw = await this.redis.get(this.jobKey(jobId));
    if (!raw) throw new JobNotFoundError(jobId);

    const job = parseJobRecord(raw);
    if (job.tenantId !== tenantId) throw new JobNotFoundError(jobId);
    return job;
  }

  async transition(jobId: string, tenantId: string, transition: JobTransition): Promise<Job> {
    return this.withJobLock(jobId, async () => {
      const current = await this.get(jobId, tenantId);
      const next = applyTransition(current, transition, this.now());
      await this.save(current, next);

      logger.debug(`[Job ${jobId}] ${current.status} → ${next.status} (${transition.type})`);
      return next;
    });
  }

  async requestCancel(jobId: string, tenantId: string): Promise<Job> {
    return this.withJobLock(jobId, async () => {
      const current = await this.get(jobId, tenantId);
      if (isTerminal(current.status)) {
        throw new InvalidTransitionError(jobId, current.status, 'failed');
      }
      if (current.cancelRequested) return current;

      const next: Job = { ...current, cancelRequested: true, updatedAt: this.now().toISOString() };
      await this.save(current, next);

      logger.info(`🛑 Cancellation requested for job ${jobId}`);
      return next;
    });
  }

  async listPending(tenantId?: string): Promise<Job[]> {
    const ids = await this.redis.zrange(this.pendingKey(tenantId), 0, -1);
    if (ids.length === 0) return [];

    const raws = await this.redis.mget(...ids.map((id) => this.jobKey(id)));
    const jobs: Job[] = [];
    for (const raw of raws) {
      if (!raw) continue; // expired record still indexed
      const job = parseJobRecord(raw);
      if (job.status !== 'pending') continue;
      if (tenantId !== undefined && job.tenantId !== tenantId) continue;
      jobs.push(job);
    }
    return jobs;
  }

  async ping(): Promise<boolean> {
    return (await this.redis.ping()) === 'PONG';
  }

  private async save(previous: Job, next: Job): Promise<void> {
    const tx = this.redis.multi().set(this.jobKey(next.id), JSON.stringify(next), 'EX', this.retentionSeconds);
    if (previous.status === 'pending' && next.status !== 'pending') {
      tx.zrem(this.pendingKey(), next.id).zrem(this.pendingKey(next.tenantId), next.id);
    }
    const results: ExecResult = await tx.exec();
    this.assertExec(results, `save job ${next.id}`);
  }

  /**
   * Serialize read-modify-write on one job across every process sharing
   * this Redis instance.
   */
  private async withJobLock<T>(jobId: string, fn: () => Promise<T>): Promise<T> {
    const lockKey = this.lockKey(jobId);
    const token = uuidv4();

    let acquired = false;
    for (let attempt = 1; attempt <= this.lockAttempts; attempt++) {
      const reply = await this.redis.set(lockKey, token, 'PX', this.lockTtlMs, 'NX');
      if (reply === 'OK') {
        acquired = true;
        break;
      }
      await sleep(this.lockRetryDelayMs);
    }
    if (!acquired) {
      throw new StoreUnavailableError(`Timed out waiting for the lock on job ${jobId}`);
    }

    try {
      return await fn();
    } finally {
      // The lock may have expired and been re-taken.
      if (!(await releaseLock(this.redis, lockKey, token))) {
        logger.warn(`⚠️ Lock on job ${jobId} expired before release`);
      }
    }
  }

  private assertExec(results: ExecResult, operation: string): void {
    if (!results) {
      throw new StoreUnavailableError(`Redis transaction aborted during ${operation}`);
    }
    const failed = results.find(([error]) => error !== null);
    if (failed?.[0]) {
      throw new StoreUnavailableError(`Redis error during ${operation}: ${failed[0].message}`);
    }
  }

  private jobKey(jobId: string): string {
    return `${this.keyPrefix}job:${jobId}`;
  }

  private pendingKey(tenantId?: string): string {
    return tenantId === undefined ? `${this.keyPrefix}pending` : `${this.keyPrefix}pending:${tenantId}`;
  }

  private lockKey(jobId: string): string {
    return `${this.keyPrefix}lock:${jobId}`;
  }
}
