import { existsSync } from 'fs';
import { extname, join } from 'path';
import type {
  BuildHook,
  FormatId,
  Logger,
  PluginConfig,
  ReadmeLocation,
  ReadmeOptions,
  ReadmePhase
} from '../../types/index.js';
import { BUILD_HOOKS, FILE_PATTERNS, README_DEFAULTS, README_LOCATIONS, README_PHASES } from '../../constants/index.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import { lookupFormat } from './formats.js';
import { resolveFromName, type NameResolutionCache } from './name-resolution.js';

const OPTION_KEYS: readonly (keyof ReadmeOptions)[] = [
  'type',
  'filename',
  'source_filename',
  'location',
  'phase',
  'build_hook'
];

function isOptionKey(key: string): key is keyof ReadmeOptions {
  return OPTION_KEYS.some(option => option === key);
}

/**
 * Read plugin options from a dist.yml entry. Values must be strings (numbers
 * and booleans are stringified); unknown keys are reported and skipped.
 */
export function parseReadmeOptions(raw: Record<string, unknown>, logger: Logger): ReadmeOptions {
  const options: ReadmeOptions = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isOptionKey(key)) {
      logger.warn(`Ignoring unknown option '${key}'`);
      continue;
    }
    if (typeof value === 'string') {
      options[key] = value.trim();
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      options[key] = String(value);
    } else {
      throw new InvalidConfigurationError(`Option '${key}' must be a string`, { option: key });
    }
  }
  return options;
}

function pickEnum<T extends string>(option: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new InvalidConfigurationError(
      `Invalid ${option} '${value}'. Expected one of: ${allowed.join(', ')}`,
      { option, value }
    );
  }
  return match;
}

export interface ReadmeConfigEnvironment {
  nameCache: NameResolutionCache;
  rootDir: string;
  mainModuleName(): string;
  /** Existence check for paths under the project root */
  fileExists?: (path: string) => boolean;
}

/**
 * Effective configuration of one ReadmeAnyFromPod instance.
 *
 * Each field is resolved on first read and kept: explicit option, then what
 * the instance name implies (type and location only), then the default.
 * Options are copied when the config is created, so later edits to the
 * caller's object change nothing.
 */
export class ReadmeConfig implements PluginConfig {
  private readonly options: Readonly<ReadmeOptions>;

  private resolvedType?: FormatId;
  private resolvedFilename?: string;
  private resolvedSourceFilename?: string;
  private resolvedLocation?: ReadmeLocation;
  private resolvedPhase?: ReadmePhase;
  private resolvedBuildHook?: BuildHook;

  constructor(
    readonly pluginName: string,
    options: ReadmeOptions,
    private readonly env: ReadmeConfigEnvironment
  ) {
    this.options = Object.freeze({ ...options });
  }

  get type(): FormatId {
    this.resolvedType ??= lookupFormat(
      this.options.type ?? resolveFromName(this.pluginName, this.env.nameCache).type ?? README_DEFAULTS.TYPE
    ).id;
    return this.resolvedType;
  }

  get filename(): string {
    this.resolvedFilename ??= this.options.filename || lookupFormat(this.type).outputFilename;
    return this.resolvedFilename;
  }

  get sourceFilename(): string {
    this.resolvedSourceFilename ??= this.options.source_filename || this.defaultSourceFilename();
    return this.resolvedSourceFilename;
  }

  get location(): ReadmeLocation {
    this.resolvedLocation ??=
      this.options.location !== undefined
        ? pickEnum('location', this.options.location, README_LOCATIONS)
        : resolveFromName(this.pluginName, this.env.nameCache).location ?? README_DEFAULTS.LOCATION;
    return this.resolvedLocation;
  }

  get phase(): ReadmePhase {
    this.resolvedPhase ??= pickEnum('phase', this.options.phase ?? README_DEFAULTS.PHASE, README_PHASES);
    return this.resolvedPhase;
  }

  get buildHook(): BuildHook {
    this.resolvedBuildHook ??= pickEnum(
      'build_hook',
      this.options.build_hook ?? README_DEFAULTS.BUILD_HOOK,
      BUILD_HOOKS
    );
    return this.resolvedBuildHook;
  }

  /**
   * The main module, or its `.pod` sibling when one exists in the project root.
   */
  private defaultSourceFilename(): string {
    const moduleName = this.env.mainModuleName();
    const extension = extname(moduleName);
    const podName = `${extension ? moduleName.slice(0, -extension.length) : moduleName}${FILE_PATTERNS.POD_EXTENSION}`;
    const fileExists = this.env.fileExists ?? existsSync;
    return podName !== moduleName && fileExists(join(this.env.rootDir, podName)) ? podName : moduleName;
  }

  /**
   * Reject contradictory settings and warn about risky ones. Resolves the
   * enumerated fields as a side effect.
   */
  validate(logger: Logger): void {
    const { location, phase, type, buildHook } = this;
    logger.debug('Resolved README settings', { type, location, phase, buildHook });

    if (location === 'build' && phase === 'release') {
      throw new InvalidConfigurationError('You cannot use location=build with phase=release!', {
        plugin: this.pluginName
      });
    }

    if (location === 'build' && type === 'pod') {
      logger.warn(
        'You are creating a .pod directly in the build - be aware that this will be installed like a .pm file and as a manpage'
      );
    }
  }

  toJSON(): PluginConfig {
    return {
      type: this.type,
      filename: this.filename,
      sourceFilename: this.sourceFilename,
      location: this.location,
      phase: this.phase,
      buildHook: this.buildHook
    };
  }
}
