/**
 * Common types and interfaces for the readme-from-pod build host and plugin
 */

// README formats and placement
export type FormatId = 'pod' | 'text' | 'markdown' | 'gfm' | 'html';
export type ReadmeLocation = 'build' | 'root';
export type ReadmePhase = 'build' | 'release';

/**
 * Which build hook writes a `location = build` README.
 * `munge` re-runs when the source is edited later; `installer` writes once, late.
 */
export type BuildHook = 'munge' | 'installer';

/**
 * Options a ReadmeAnyFromPod entry may carry in dist.yml.
 * Keys keep the snake_case spelling users write in the project file.
 */
export interface ReadmeOptions {
  type?: string;
  filename?: string;
  source_filename?: string;
  location?: string;
  phase?: string;
  build_hook?: string;
}

export interface PluginConfig {
  type: FormatId;
  filename: string;
  sourceFilename: string;
  location: ReadmeLocation;
  phase: ReadmePhase;
  buildHook: BuildHook;
}

// dist.yml types

export interface PluginEntry {
  moniker: string;
  name: string;
  options: Record<string, unknown>;
}

export interface DistYml {
  name: string;
  version: string;
  main_module?: string;
  build_dir?: string;
  /** Declared text encoding per file path, relative to the project root */
  encodings?: Record<string, string>;
  plugins: PluginEntry[];
}

// Command option types

/**
 * Base interface for all command options
 */
export interface BaseCommandOptions {
  workingDir?: string;
  verbose?: boolean;
}

export interface BuildCommandOptions extends BaseCommandOptions {
  archive?: boolean;
}

export type ReleaseCommandOptions = BaseCommandOptions;

export interface RenderCommandOptions extends BaseCommandOptions {
  type?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
