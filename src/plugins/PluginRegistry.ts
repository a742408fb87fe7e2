import { IntelligencePlugin } from './IntelligencePlugin';
import { SimplePredictor } from './SimplePredictor';
import { MovingAveragePredictor } from './MovingAveragePredictor';
import { PluginInfo } from '../types';
import { PluginNotFoundError } from '../jobs/errors';
import { logger } from '../utils/logger';

/**
 * Static catalogue of plugins keyed by name.
 */
export class PluginRegistry {
  private readonly plugins = new Map<string, IntelligencePlugin>();

  register(plugin: IntelligencePlugin): this {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin already registered: ${plugin.name}`);
    }
    this.plugins.set(plugin.name, plugin);
    logger.debug(`🧩 Registered plugin ${plugin.name}`);
    return this;
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  resolve(name: string): IntelligencePlugin {
    const plugin = this.plugins.get(name);
    if (!plugin) throw new PluginNotFoundError(name);
    return plugin;
  }

  list(): PluginInfo[] {
    return [...this.plugins.values()]
      .map((plugin) => ({ name: plugin.name, description: plugin.description }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}

export const createDefaultRegistry = (): PluginRegistry =>
  new PluginRegistry().register(new SimplePredictor()).register(new MovingAveragePredictor());
