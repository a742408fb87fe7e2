import { EventEmitter } from 'events';
import { Delivery } from '../types';
import { JobQueue } from './JobQueue';
import { JobProcessor } from './JobProcessor';
import { JobOutcome } from '../utils/metrics';
import { logger } from '../utils/logger';
import { errorMessage, sleep } from '../utils/retry';

export interface WorkerPoolOptions {
  size: number;
  dequeueTimeoutMs: number;
  errorBackoffMs: number;
  idPrefix?: string;
}

export interface ProcessedEvent {
  workerId: string;
  delivery: Delivery;
  outcome: JobOutcome;
}

/**
 * Fixed set of worker loops, each blocking on the queue independently.
 *
 * Emits `processed` with a `ProcessedEvent` after every settled delivery.
 */
export class WorkerPool extends EventEmitter {
  private loops: Promise<void>[] = [];
  private running = false;
  private readonly idPrefix: string;

  constructor(
    private readonly queue: JobQueue,
    private readonly processor: JobProcessor,
    private readonly options: WorkerPoolOptions,
  ) {
    super();
    this.idPrefix = options.idPrefix ?? `worker-${process.pid}`;
  }

  get size(): number {
    return this.options.size;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    for (let index = 1; index <= this.options.size; index++) {
      this.loops.push(this.runLoop(`${this.idPrefix}-${index}`));
    }
    logger.info(`🎯 ${this.options.size} worker(s) ready and waiting for jobs...`);
  }

  /**
   * Let every loop finish its current delivery, then resolve. A loop
   * blocked on an empty queue returns once its dequeue times out.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    await Promise.all(this.loops);
    this.loops = [];
    logger.info('✅ Workers stopped gracefully');
  }

  private async runLoop(workerId: string): Promise<void> {
    while (this.running) {
      let delivery: Delivery | null = null;
      try {
        delivery = await this.queue.dequeue(this.options.dequeueTimeoutMs);
        if (!delivery) continue;

        const outcome = await this.processor.process(delivery, workerId);
        if (outcome === 'deferred') {
          await this.queue.abandon(delivery);
        } else {
          await this.queue.ack(delivery);
        }

        const event: ProcessedEvent = { workerId, delivery, outcome };
        this.emit('processed', event);
      } catch (error) {
        logger.error(`⚠️ ${workerId} loop error: ${errorMessage(error)}`);
        if (delivery) await this.release(delivery);
        if (this.running) await sleep(this.options.errorBackoffMs);
      }
    }
  }

  private async release(delivery: Delivery): Promise<void> {
    try {
      await this.queue.abandon(delivery);
    } catch (error) {
      logger.error(`[Job ${delivery.jobId}] ⚠️ Could not release delivery: ${errorMessage(error)}`);
    }
  }
}
