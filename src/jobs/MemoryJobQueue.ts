import { v4 as uuidv4 } from 'uuid';
import { Delivery, JobRef, QueueStats } from '../types';
import { JobQueue } from './JobQueue';
import { logger } from '../utils/logger';

interface Entry {
  ref: JobRef;
  seq: number;
  deliveryCount: number;
}

interface InFlight {
  entry: Entry;
  visibleAt: number;
}

export interface MemoryJobQueueOptions {
  visibilityTimeoutMs: number;
}

/**
 * In-process queue for deployments that run the API and the workers in
 * one process. Same delivery contract as the BullMQ driver: higher
 * priority first, FIFO within a priority, redelivery after the visibility
 * timeout.
 */
export class MemoryJobQueue implements JobQueue {
  private ready: Entry[] = [];
  private readonly inflight = new Map<string, InFlight>();
  private waiters: Array<() => void> = [];
  private seq = 0;
  private completed = 0;
  private closed = false;

  constructor(private readonly options: MemoryJobQueueOptions) {}

  async enqueue(ref: JobRef): Promise<void> {
    if (this.closed) throw new Error('Queue is closed');
    this.insert({ ref, seq: this.seq++, deliveryCount: 0 });
    this.wake();
  }

  async dequeue(timeoutMs: number): Promise<Delivery | null> {
    if (this.closed) throw new Error('Queue is closed');
    const deadline = Date.now() + timeoutMs;

    while (!this.closed) {
      this.reclaimExpired();

      const entry = this.ready.shift();
      if (entry) return this.deliver(entry);

      const remaining = deadline - Date.now();
      if (remaining <= 0) return null;
      await this.waitForWork(Math.min(remaining, this.nextVisibilityInMs()));
    }

    return null;
  }

  async ack(delivery: Delivery): Promise<void> {
    if (this.inflight.delete(delivery.deliveryId)) {
      this.completed += 1;
      return;
    }
    // Visibility ran out first; the redelivered copy settles it.
    logger.debug(`Late ack for job ${delivery.jobId} (delivery ${delivery.deliveryId})`);
  }

  async abandon(_delivery: Delivery): Promise<void> {
    // Left in flight on purpose: it resurfaces at its visibility deadline.
  }

  async stats(): Promise<QueueStats> {
    return {
      waiting: this.ready.length,
      active: this.inflight.size,
      completed: this.completed,
      failed: 0,
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.wake();
  }

  private deliver(entry: Entry): Delivery {
    const deliveryId = uuidv4();
    const delivered: Entry = { ...entry, deliveryCount: entry.deliveryCount + 1 };
    this.inflight.set(deliveryId, {
      entry: delivered,
      visibleAt: Date.now() + this.options.visibilityTimeoutMs,
    });

    return {
      deliveryId,
      jobId: entry.ref.jobId,
      tenantId: entry.ref.tenantId,
      deliveryCount: delivered.deliveryCount,
    };
  }

  private reclaimExpired(): void {
    const now = Date.now();
    for (const [deliveryId, flight] of this.inflight) {
      if (flight.visibleAt <= now) {
        this.inflight.delete(deliveryId);
        this.insert(flight.entry);
        logger.warn(`[Job ${flight.entry.ref.jobId}] 🚧 Visibility timeout expired, redelivering`);
      }
    }
  }

  private insert(entry: Entry): void {
    const index = this.ready.findIndex(
      (queued) =>
        queued.ref.priority < entry.ref.priority ||
        (queued.ref.priority === entry.ref.priority && queued.seq > entry.seq),
    );
    if (index === -1) this.ready.push(entry);
    else this.ready.splice(index, 0, entry);
  }

  private nextVisibilityInMs(): number {
    let next = Number.POSITIVE_INFINITY;
    const now = Date.now();
    for (const flight of this.inflight.values()) {
      next = Math.min(next, flight.visibleAt - now);
    }
    return Math.max(0, next);
  }

  private waitForWork(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters = this.waiters.filter((waiter) => waiter !== done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.waiters.push(done);
    });
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }
}
