import { README_PLUGIN_MONIKER } from '../../constants/index.js';
import { DistConfigError } from '../../utils/errors.js';
import { createReadmePlugin } from '../readme/readme-plugin.js';
import type { PluginFactory } from './plugin.js';

/**
 * Maps dist.yml monikers to plugin factories.
 */
export class PluginRegistry {
  private readonly factories = new Map<string, PluginFactory>();

  register(moniker: string, factory: PluginFactory): this {
    this.factories.set(moniker, factory);
    return this;
  }

  has(moniker: string): boolean {
    return this.factories.has(moniker);
  }

  get(moniker: string): PluginFactory {
    const factory = this.factories.get(moniker);
    if (!factory) {
      throw new DistConfigError(
        `Unknown plugin '${moniker}'. Available plugins: ${[...this.factories.keys()].join(', ')}`,
        { moniker }
      );
    }
    return factory;
  }
}

export function createDefaultPluginRegistry(): PluginRegistry {
  return new PluginRegistry().register(README_PLUGIN_MONIKER, createReadmePlugin);
}
