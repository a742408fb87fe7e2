/* eslint-disable @typescript-eslint/no-misused-promises */
import { loadConfig } from '../config/app.config';
import { closeServiceContext, createServiceContext } from '../config/context';
import { ProcessedEvent } from './WorkerPool';
import { closeLogger, logger } from '../utils/logger';

/* ----------------------------------------------
   🧠 Standalone worker process
   Shares the store and queue with the API; runs no HTTP server.
---------------------------------------------- */
async function main(): Promise<void> {
  const config = loadConfig();
  if (config.queue.driver === 'memory') {
    throw new Error('QUEUE_DRIVER=memory cannot be shared with the API; run workers in the API process instead');
  }

  const context = createServiceContext(config);

  context.workers.on('processed', ({ delivery, outcome }: ProcessedEvent) =>
    logger.debug(`[Job ${delivery.jobId}] 🎯 Delivery settled: ${outcome}`),
  );

  await context.service.recoverPendingJobs();
  context.workers.start();

  /* ----------------------------------------------
     🔚 Graceful Shutdown
  ---------------------------------------------- */
  let shuttingDown = false;
  const shutdownWorker = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`🧹 Received ${signal}, shutting down workers...`);
    try {
      await closeServiceContext(context);
      logger.info('✅ Worker closed gracefully');
      await closeLogger();
      process.exit(0);
    } catch (err) {
      logger.error('💥 Error during worker shutdown:', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdownWorker('SIGINT'));
  process.on('SIGTERM', () => void shutdownWorker('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error('❌ Failed to start worker:', err);
  process.exit(1);
});
