import { resolve } from 'path';
import type { Logger } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { NameResolutionCache } from '../readme/name-resolution.js';
import { BuildFileSet } from './file-set.js';
import type { BuildPlugin } from './plugin.js';
import { WatchRegistry } from './watch-registry.js';

export interface BuildContextOptions {
  rootDir: string;
  distName: string;
  version: string;
  mainModule?: string;
  logger?: Logger;
}

/**
 * Module path a distribution name implies: `Foo-Bar` → `lib/Foo/Bar.pm`.
 */
export function defaultMainModule(distName: string): string {
  return `lib/${distName.split('-').join('/')}${FILE_PATTERNS.MODULE_EXTENSION}`;
}

/**
 * State of one build or release run: the file set, the configured plugins
 * and the per-run caches plugins share. Create a fresh one for every run.
 */
export class BuildContext {
  readonly rootDir: string;
  readonly distName: string;
  readonly version: string;
  readonly files = new BuildFileSet();
  readonly nameCache = new NameResolutionCache();
  readonly watchRegistry = new WatchRegistry();
  readonly logger: Logger;

  private readonly mainModule?: string;
  private readonly pluginList: BuildPlugin[] = [];

  constructor(options: BuildContextOptions) {
    this.rootDir = resolve(options.rootDir);
    this.distName = options.distName;
    this.version = options.version;
    this.mainModule = options.mainModule;
    this.logger = options.logger ?? defaultLogger;
  }

  get plugins(): readonly BuildPlugin[] {
    return this.pluginList;
  }

  addPlugin(plugin: BuildPlugin): void {
    this.pluginList.push(plugin);
  }

  mainModuleName(): string {
    return this.mainModule ?? defaultMainModule(this.distName);
  }
}
