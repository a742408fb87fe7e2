import { z, ZodSchema } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { DEFAULT_PLUGIN, PREDICTION_HORIZON } from '../utils/constants';

/**
 * Validate `req.body` against a zod schema and replace it with the parsed
 * value, defaults applied. Failures go to the error handler as `ZodError`.
 */
export const validate = (schema: ZodSchema) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    const parsed = await schema.safeParseAsync(req.body);
    if (!parsed.success) {
      next(parsed.error);
      return;
    }
    req.body = parsed.data;
    next();
  };
};

const isoTimestamp = z
  .string()
  .min(1)
  .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO-8601 timestamp');

const dataPointSchema = z.object({
  timestamp: isoTimestamp,
  value: z.number().finite(),
});

const historicalDataSchema = z
  .array(dataPointSchema)
  .min(1, 'at least one historical data point is required')
  .superRefine((points, ctx) => {
    for (let index = 1; index < points.length; index++) {
      if (Date.parse(points[index].timestamp) <= Date.parse(points[index - 1].timestamp)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'timestamp'],
          message: 'timestamps must be strictly ascending',
        });
        return;
      }
    }
  });

// Common validation schemas
export const jobSchemas = {
  request: z.object({
    entity_id: z.string().trim().min(1, 'entity_id is required'),
    attribute: z.string().trim().min(1, 'attribute is required'),
    historical_data: historicalDataSchema,
    prediction_horizon: z
      .number()
      .int()
      .min(PREDICTION_HORIZON.MIN)
      .max(PREDICTION_HORIZON.MAX)
      .default(PREDICTION_HORIZON.DEFAULT),
    plugin: z
      .string()
      .trim()
      .regex(/^[a-z0-9_-]+$/, 'plugin names use lowercase letters, digits, _ and -')
      .default(DEFAULT_PLUGIN),
    priority: z.number().int().default(0),
  }),

  webhook: z.object({
    entity_id: z.string().trim().min(1).optional(),
    attribute: z.string().trim().min(1).optional(),
    analysis_type: z.enum(['analyze', 'predict']).default('predict'),
    data: z.record(z.unknown()).default({}),
  }),

  listQuery: z.object({
    status: z.literal('pending').default('pending'),
  }),
};

export type JobRequestBody = z.infer<typeof jobSchemas.request>;
export type WebhookBody = z.infer<typeof jobSchemas.webhook>;
