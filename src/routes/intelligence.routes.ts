/* eslint-disable @typescript-eslint/no-misused-promises */
import { Router, Response, NextFunction } from 'express';
import { JobKind, NewJob } from '../types';
import { IntelligenceService } from '../services/IntelligenceService';
import { toJobView } from '../models/Job';
import { TenantRequest, requireTenantId, tenantMiddleware } from '../middlewares/tenant.middleware';
import { JobRequestBody, WebhookBody, jobSchemas, validate } from '../middlewares/validation.middleware';
import { logger } from '../utils/logger';

const toNewJob = (tenantId: string, kind: JobKind, body: JobRequestBody): NewJob => ({
  tenantId,
  kind,
  pluginName: body.plugin,
  payload: {
    entityId: body.entity_id,
    attribute: body.attribute,
    historicalData: body.historical_data,
    predictionHorizon: body.prediction_horizon,
    priority: body.priority,
  },
});

export const createIntelligenceRouter = (service: IntelligenceService): Router => {
  const router = Router();

  const submit =
    (kind: JobKind, message: string) => async (req: TenantRequest, res: Response, next: NextFunction) => {
      try {
        const tenantId = requireTenantId(req);
        // Parsed and defaulted by `validate` upstream.
        const body: JobRequestBody = req.body;
        const job = await service.submitJob(toNewJob(tenantId, kind, body));

        res.status(202).json({
          success: true,
          message,
          data: { job_id: job.id, status: job.status },
        });
      } catch (error) {
        next(error);
      }
    };

  /**
   * @route   POST /analyze
   * @desc    Queue an analysis job; poll GET /jobs/:jobId for the result
   */
  router.post('/analyze', tenantMiddleware, validate(jobSchemas.request), submit('analyze', 'Analysis job created'));

  /**
   * @route   POST /predict
   * @desc    Queue a prediction job; the forecast is also written to the context broker
   */
  router.post(
    '/predict',
    tenantMiddleware,
    validate(jobSchemas.request),
    submit('predict', 'Prediction job created. Results will be written to the context broker.'),
  );

  /**
   * @route   POST /webhook/n8n
   * @desc    Workflow trigger; fields may arrive at the top level or inside `data`
   */
  router.post('/webhook/n8n', tenantMiddleware, validate(jobSchemas.webhook), async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = requireTenantId(req);
      const webhook: WebhookBody = req.body;
      const body = jobSchemas.request.parse({
        ...webhook.data,
        entity_id: webhook.entity_id ?? webhook.data.entity_id,
        attribute: webhook.attribute ?? webhook.data.attribute,
      });

      const job = await service.submitJob(toNewJob(tenantId, webhook.analysis_type, body));
      logger.info(`🪝 Webhook queued ${webhook.analysis_type} job ${job.id}`);

      res.status(202).json({
        success: true,
        message: `${webhook.analysis_type} job created from webhook`,
        data: { job_id: job.id, status: job.status },
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @route   GET /jobs?status=pending
   * @desc    Pending jobs of the calling tenant, oldest first
   */
  router.get('/jobs', tenantMiddleware, async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const tenantId = requireTenantId(req);
      jobSchemas.listQuery.parse(req.query);
      const jobs = await service.listPendingJobs(tenantId);

      res.json({
        success: true,
        data: jobs.map(toJobView),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @route   GET /jobs/:jobId
   * @desc    Job status, with the result or the error once terminal
   */
  router.get('/jobs/:jobId', tenantMiddleware, async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const job = await service.getJob(requireTenantId(req), req.params.jobId);
      res.json({
        success: true,
        data: toJobView(job),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @route   DELETE /jobs/:jobId
   * @desc    Request cancellation; honoured before the plugin runs
   */
  router.delete('/jobs/:jobId', tenantMiddleware, async (req: TenantRequest, res: Response, next: NextFunction) => {
    try {
      const job = await service.cancelJob(requireTenantId(req), req.params.jobId);
      res.json({
        success: true,
        message: 'Cancellation requested',
        data: toJobView(job),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
