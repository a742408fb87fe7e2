import { Delivery, JobRef, QueueStats } from '../types';

/**
 * At-least-once hand-off of job references.
 *
 * A dequeued reference stays owned by its consumer until `ack`. If it is
 * neither acknowledged nor abandoned before the visibility timeout, it is
 * delivered again, possibly to another worker.
 */
export interface JobQueue {
  enqueue(ref: JobRef): Promise<void>;
  /** Wait up to `timeoutMs` for a reference; `null` when none arrived. */
  dequeue(timeoutMs: number): Promise<Delivery | null>;
  ack(delivery: Delivery): Promise<void>;
  /**
   * Give up ownership without acknowledging. The reference comes back
   * once its visibility timeout runs out.
   */
  abandon(delivery: Delivery): Promise<void>;
  stats(): Promise<QueueStats>;
  close(): Promise<void>;
}
