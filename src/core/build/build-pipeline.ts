import { isJunk } from 'junk';
import { basename, join, resolve } from 'path';
import type { DistYml, Logger } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { parseDistYml } from '../../utils/dist-yml.js';
import { DEFAULT_ENCODING } from '../../utils/encoding.js';
import { readBytes, remove, walkFiles, writeBytes } from '../../utils/fs.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { createDistArchive, type ArchiveInfo } from '../../utils/tarball.js';
import { BuildContext } from './build-context.js';
import { BuildFile } from './file-set.js';
import {
  isAfterBuildHook,
  isAfterReleaseHook,
  isFileGatherer,
  isFileMunger,
  isFilePruner,
  isInstallerSetup,
  type BuildPlugin
} from './plugin.js';
import { createDefaultPluginRegistry, type PluginRegistry } from './plugin-registry.js';

export interface BuildOptions {
  workingDir?: string;
  /** Pack the build directory into `<name>-<version>.tar.gz` (default true) */
  archive?: boolean;
  logger?: Logger;
  registry?: PluginRegistry;
}

export interface BuildResult {
  context: BuildContext;
  buildDir: string;
  archive?: ArchiveInfo;
}

export interface ReleaseResult extends BuildResult {
  archive: ArchiveInfo;
}

type HookResult = void | Promise<void>;

async function runPhase<P extends BuildPlugin>(
  context: BuildContext,
  phase: string,
  select: (plugin: BuildPlugin) => plugin is P,
  invoke: (plugin: P) => HookResult
): Promise<void> {
  for (const plugin of context.plugins) {
    if (select(plugin)) {
      context.logger.debug(`${phase}: ${plugin.pluginName}`);
      await invoke(plugin);
    }
  }
}

export function buildDirName(dist: DistYml): string {
  return dist.build_dir ?? `${dist.name}-${dist.version}`;
}

export function archiveName(dist: DistYml): string {
  return `${dist.name}-${dist.version}${FILE_PATTERNS.ARCHIVE_EXTENSION}`;
}

/**
 * Create the run context and instantiate every configured plugin. Plugin
 * configuration errors surface here, before any file is gathered.
 */
export function createBuildContext(
  rootDir: string,
  dist: DistYml,
  logger: Logger = defaultLogger,
  registry: PluginRegistry = createDefaultPluginRegistry()
): BuildContext {
  const context = new BuildContext({
    rootDir,
    distName: dist.name,
    version: dist.version,
    mainModule: dist.main_module,
    logger
  });

  for (const entry of dist.plugins) {
    const factory = registry.get(entry.moniker);
    context.addPlugin(factory(entry.name, entry.options, context));
  }
  return context;
}

/**
 * Add the project tree to the file set as raw bytes. Dot files, node_modules,
 * junk files, dist.yml and earlier builds or archives of this distribution
 * stay out.
 */
export async function gatherProjectFiles(context: BuildContext, dist: DistYml): Promise<void> {
  const buildDir = buildDirName(dist);
  const skip = (relativePath: string, isDirectory: boolean): boolean => {
    const name = basename(relativePath);
    if (name.startsWith('.') || name === 'node_modules' || isJunk(name)) {
      return true;
    }
    if (relativePath === buildDir || relativePath === FILE_PATTERNS.DIST_YML) {
      return true;
    }
    const topLevel = !relativePath.includes('/');
    return topLevel && name.startsWith(`${dist.name}-`) && (isDirectory || name.endsWith(FILE_PATTERNS.ARCHIVE_EXTENSION));
  };

  for await (const relativePath of walkFiles(context.rootDir, skip)) {
    const declared = dist.encodings?.[relativePath];
    const bytes = await readBytes(join(context.rootDir, relativePath));
    context.files.insert(
      new BuildFile(relativePath, bytes, declared ?? DEFAULT_ENCODING, 'gather')
    );
  }
  context.logger.debug(`Gathered ${context.files.size} files from ${context.rootDir}`);
}

async function writeBuildDir(context: BuildContext, buildDir: string): Promise<void> {
  await remove(buildDir);
  for (const file of context.files.list()) {
    await writeBytes(join(buildDir, file.name), file.toBytes());
  }
  context.logger.debug(`Wrote ${context.files.size} files to ${buildDir}`);
}

/**
 * Run one build of `dist` rooted at `rootDir`: gather, prune, munge, set up
 * the installer, write the build directory, run after-build hooks, archive.
 */
export async function buildDistribution(rootDir: string, dist: DistYml, options: BuildOptions = {}): Promise<BuildResult> {
  const context = createBuildContext(rootDir, dist, options.logger, options.registry);
  const buildDir = join(context.rootDir, buildDirName(dist));

  await gatherProjectFiles(context, dist);
  await runPhase(context, 'gather', isFileGatherer, plugin => plugin.onGatherFiles());
  await runPhase(context, 'prune', isFilePruner, plugin => plugin.onPruneFiles());
  await runPhase(context, 'munge', isFileMunger, plugin => plugin.onMungeFiles());
  await runPhase(context, 'installer', isInstallerSetup, plugin => plugin.onSetupInstaller());

  await writeBuildDir(context, buildDir);
  await runPhase(context, 'after build', isAfterBuildHook, plugin => plugin.onAfterBuild({ buildDir }));
  context.logger.info(`Built ${dist.name}-${dist.version} in ${buildDir}`);

  if (options.archive === false) {
    return { context, buildDir };
  }
  const archive = await createDistArchive(buildDir, join(context.rootDir, archiveName(dist)), context.logger);
  context.logger.info(`Wrote ${archive.path}`);
  return { context, buildDir, archive };
}

/**
 * Build and archive, then run after-release hooks with the archive.
 */
export async function releaseDistribution(rootDir: string, dist: DistYml, options: BuildOptions = {}): Promise<ReleaseResult> {
  const result = await buildDistribution(rootDir, dist, options);
  const archive =
    result.archive ?? (await createDistArchive(result.buildDir, join(result.context.rootDir, archiveName(dist)), result.context.logger));

  await runPhase(result.context, 'after release', isAfterReleaseHook, plugin =>
    plugin.onAfterRelease({ archivePath: archive.path })
  );
  result.context.logger.info(`Released ${basename(archive.path)}`);
  return { ...result, archive };
}

function projectRoot(options: BuildOptions): string {
  return resolve(options.workingDir ?? process.cwd());
}

export async function runBuild(options: BuildOptions = {}): Promise<BuildResult> {
  const rootDir = projectRoot(options);
  const dist = await parseDistYml(join(rootDir, FILE_PATTERNS.DIST_YML));
  return buildDistribution(rootDir, dist, options);
}

export async function runRelease(options: BuildOptions = {}): Promise<ReleaseResult> {
  const rootDir = projectRoot(options);
  const dist = await parseDistYml(join(rootDir, FILE_PATTERNS.DIST_YML));
  return releaseDistribution(rootDir, dist, options);
}
