import type { BuildContext } from './build-context.js';

/**
 * Build plugin contracts. A plugin takes part in a phase by implementing the
 * matching hook interface; hooks run in declared plugin order.
 */

export interface BuildPlugin {
  /** Kind of plugin, the part before ` / ` in dist.yml */
  readonly moniker: string;
  /** Instance name, the moniker itself unless dist.yml gives one */
  readonly pluginName: string;
}

type HookResult = void | Promise<void>;

export interface AfterBuildEvent {
  buildDir: string;
}

export interface AfterReleaseEvent {
  archivePath: string;
}

export interface FileGatherer {
  onGatherFiles(): HookResult;
}

export interface FilePruner {
  onPruneFiles(): HookResult;
}

export interface FileMunger {
  onMungeFiles(): HookResult;
}

export interface InstallerSetup {
  onSetupInstaller(): HookResult;
}

export interface AfterBuildHook {
  onAfterBuild(event: AfterBuildEvent): HookResult;
}

export interface AfterReleaseHook {
  onAfterRelease(event: AfterReleaseEvent): HookResult;
}

export type PluginFactory = (
  pluginName: string,
  options: Record<string, unknown>,
  context: BuildContext
) => BuildPlugin;

function hasHook(plugin: BuildPlugin, hook: string): boolean {
  return hook in plugin && typeof Reflect.get(plugin, hook) === 'function';
}

export function isFileGatherer(plugin: BuildPlugin): plugin is BuildPlugin & FileGatherer {
  return hasHook(plugin, 'onGatherFiles');
}

export function isFilePruner(plugin: BuildPlugin): plugin is BuildPlugin & FilePruner {
  return hasHook(plugin, 'onPruneFiles');
}

export function isFileMunger(plugin: BuildPlugin): plugin is BuildPlugin & FileMunger {
  return hasHook(plugin, 'onMungeFiles');
}

export function isInstallerSetup(plugin: BuildPlugin): plugin is BuildPlugin & InstallerSetup {
  return hasHook(plugin, 'onSetupInstaller');
}

export function isAfterBuildHook(plugin: BuildPlugin): plugin is BuildPlugin & AfterBuildHook {
  return hasHook(plugin, 'onAfterBuild');
}

export function isAfterReleaseHook(plugin: BuildPlugin): plugin is BuildPlugin & AfterReleaseHook {
  return hasHook(plugin, 'onAfterRelease');
}
