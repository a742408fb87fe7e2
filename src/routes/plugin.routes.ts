import { Router } from 'express';
import { IntelligenceService } from '../services/IntelligenceService';

export const createPluginRouter = (service: IntelligenceService): Router => {
  const pluginRouter = Router();

  // @route   GET /plugins
  // @desc    Registered plugins
  // @access  Public
  pluginRouter.get('/', (_req, res) => {
    res.json({
      success: true,
      data: service.listPlugins(),
    });
  });

  return pluginRouter;
};
