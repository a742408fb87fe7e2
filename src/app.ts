/* eslint-disable @typescript-eslint/no-misused-promises */
import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { createServer, Server } from 'http';

// 🧱 Config
import { loadConfig } from './config/app.config';
import { ServiceContext, closeServiceContext, createServiceContext } from './config/context';

// 🧰 Middlewares
import { errorHandler } from './middlewares/errorHandler.middleware';
import { createRateLimitMiddleware } from './middlewares/rateLimit.middleware';

// 🚏 Routes
import { createIntelligenceRouter } from './routes/intelligence.routes';
import { createPluginRouter } from './routes/plugin.routes';

// 🧾 Utils
import { closeLogger, httpLogStream, logger } from './utils/logger';

export interface AppOptions {
  /** Keep rate-limit counters in Redis (shared across instances). */
  distributedRateLimit?: boolean;
}

/**
 * Build the Express application around an existing service context.
 */
export function createApp(context: ServiceContext, options: AppOptions = {}): Application {
  const { config, service } = context;
  const app = express();

  /** 🧱 Express & Security Middlewares */
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '5mb' }));
  app.use(compression());
  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined', { stream: httpLogStream }));
  }
  app.use(
    createRateLimitMiddleware({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.max,
      redis: options.distributedRateLimit === false ? undefined : context.redis,
    }),
  );

  // Health Check Route
  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await service.getHealth();
      res.status(report.status === 'ok' ? 200 : 503).json(report);
    } catch (error) {
      next(error);
    }
  });

  /** 🚏 Routes */
  app.use(`${config.apiPrefix}/plugins`, createPluginRouter(service));
  app.use(config.apiPrefix, createIntelligenceRouter(service));

  // 404 Handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      message: 'Route not found',
    });
  });

  /** 🧩 Global Error Handler */
  app.use(errorHandler);

  return app;
}

export class IntelligenceServer {
  private readonly httpServer: Server;
  private shuttingDown = false;

  constructor(private readonly context: ServiceContext) {
    this.httpServer = createServer(createApp(context));
  }

  /** 🚀 Start HTTP server (and in-process workers when configured) */
  public async start(): Promise<void> {
    const { config } = this.context;

    if (config.workers.runInApi) {
      await this.context.service.recoverPendingJobs();
      this.context.workers.start();
    }

    await new Promise<void>((resolve) => {
      this.httpServer.listen(config.port, () => resolve());
    });
    logger.info(`🚀 Intelligence service running on port ${config.port}`);
    logger.info(`📊 Environment: ${config.nodeEnv}`);
    logger.info(`🔗 API Base: http://localhost:${config.port}${config.apiPrefix}`);

    // Handle graceful shutdowns
    process.on('SIGTERM', () => void this.gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void this.gracefulShutdown('SIGINT'));
  }

  /** 🛑 Graceful Shutdown */
  public async gracefulShutdown(signal: string): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    logger.info(`🛑 Received ${signal}, initiating graceful shutdown...`);

    try {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info('✅ HTTP server closed');

      await closeServiceContext(this.context);

      logger.info('🟢 Shutdown complete. Exiting process...');
      await closeLogger();
      process.exit(0);
    } catch (err) {
      logger.error('💥 Error during shutdown:', err);
      process.exit(1);
    }
  }
}

// 🧠 Initialize & Launch
if (require.main === module) {
  (async () => {
    const context = createServiceContext(loadConfig());
    const server = new IntelligenceServer(context);
    await server.start();
  })().catch((err: unknown) => {
    logger.error('❌ Failed to start server:', err);
    process.exit(1);
  });
}
