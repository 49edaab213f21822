import { join } from 'path';
import type { Logger, ReadmeOptions } from '../../types/index.js';
import { PLACEHOLDER_CONTENT, README_PLUGIN_MONIKER } from '../../constants/index.js';
import { DEFAULT_ENCODING } from '../../utils/encoding.js';
import { FileSystemError, TargetFileMissingError } from '../../utils/errors.js';
import { exists, writeBytes } from '../../utils/fs.js';
import { createPluginLogger } from '../../utils/logger.js';
import type { BuildContext } from '../build/build-context.js';
import { BuildFile } from '../build/file-set.js';
import type {
  AfterBuildHook,
  AfterReleaseHook,
  BuildPlugin,
  FileGatherer,
  FileMunger,
  FilePruner,
  InstallerSetup,
  PluginFactory
} from '../build/plugin.js';
import { ContentPipeline, createSourceSnapshot, type SourceSnapshot } from './content-pipeline.js';
import { lookupFormat } from './formats.js';
import { parseReadmeOptions, ReadmeConfig } from './readme-config.js';

export type ReadmeState = 'idle' | 'registered' | 'content-generated' | 'watching' | 'regenerated';

/**
 * Generates a README from the POD of the distribution's main module.
 *
 * With `location = build` a placeholder joins the file set while files are
 * gathered, and the real content is written while files are munged. If some
 * later plugin edits the source afterwards, the README is generated again.
 * With `location = root` the file is written into the project root after the
 * build (or after the release) and kept out of the build itself.
 */
export class ReadmeAnyFromPod
  implements BuildPlugin, FileGatherer, FilePruner, FileMunger, InstallerSetup, AfterBuildHook, AfterReleaseHook
{
  readonly moniker: string = README_PLUGIN_MONIKER;
  readonly config: ReadmeConfig;

  private readonly log: Logger;
  private readonly snapshot: SourceSnapshot = createSourceSnapshot();
  private currentState: ReadmeState = 'idle';
  private subscribed = false;
  private regenerating = false;
  private regenerations = 0;

  constructor(
    readonly pluginName: string,
    options: ReadmeOptions,
    private readonly context: BuildContext
  ) {
    this.log = createPluginLogger(context.logger, pluginName);
    this.config = new ReadmeConfig(pluginName, options, {
      nameCache: context.nameCache,
      rootDir: context.rootDir,
      mainModuleName: () => context.mainModuleName()
    });
    this.config.validate(this.log);
  }

  get state(): ReadmeState {
    return this.currentState;
  }

  get regenerationCount(): number {
    return this.regenerations;
  }

  /**
   * Register the README early so plugins that need the full file list see it.
   * A README already in the tree is used as-is.
   */
  onGatherFiles(): void {
    if (this.config.location !== 'build') {
      return;
    }

    const filename = this.config.filename;
    if (this.context.files.find(filename)) {
      this.log.debug(`${filename} is already part of the build`);
    } else {
      this.context.files.insert(new BuildFile(filename, PLACEHOLDER_CONTENT, DEFAULT_ENCODING, this.pluginName));
    }
    this.currentState = 'registered';
  }

  /**
   * A root README must not ride into the next build from the project tree,
   * unless another instance is producing the same file inside the build.
   */
  onPruneFiles(): void {
    if (this.config.location !== 'root') {
      return;
    }

    const filename = this.config.filename;
    const builtElsewhere = this.context.plugins.some(
      plugin =>
        plugin !== this &&
        plugin instanceof ReadmeAnyFromPod &&
        plugin.config.location === 'build' &&
        plugin.config.filename === filename
    );
    if (builtElsewhere) {
      return;
    }

    for (const file of this.context.files.list()) {
      if (file.name === filename) {
        this.log.debug(`pruning ${file.name}`);
        this.context.files.remove(file);
      }
    }
  }

  onMungeFiles(): void {
    if (this.config.location === 'build' && this.config.buildHook === 'munge') {
      this.writeToBuild(true);
    }
  }

  onSetupInstaller(): void {
    if (this.config.location === 'build' && this.config.buildHook === 'installer') {
      this.writeToBuild(false);
    }
  }

  async onAfterBuild(): Promise<void> {
    if (this.config.phase === 'build') {
      await this.writeToRoot();
    }
  }

  async onAfterRelease(): Promise<void> {
    if (this.config.phase === 'release') {
      await this.writeToRoot();
    }
  }

  /**
   * README text for the current state of the source file.
   */
  getReadmeContent(): string {
    return this.pipeline().generate().text;
  }

  private pipeline(): ContentPipeline {
    return new ContentPipeline(
      this.context.files,
      this.config.sourceFilename,
      lookupFormat(this.config.type),
      this.snapshot
    );
  }

  private findTarget(): BuildFile {
    const target = this.context.files.find(this.config.filename);
    if (!target) {
      throw new TargetFileMissingError(this.config.filename);
    }
    return target;
  }

  private writeToBuild(watch: boolean): void {
    const target = this.findTarget();
    if (watch) {
      this.watchSource(target);
    }

    this.log.debug(`updating contents of ${target.name} in dist`);
    target.setContent(this.getReadmeContent());
    this.currentState = watch ? 'watching' : 'content-generated';
  }

  private watchSource(target: BuildFile): void {
    if (this.subscribed) {
      return;
    }
    const source = this.pipeline().sourceFile();
    this.context.watchRegistry.subscribe(source, changed => this.regenerate(changed, target));
    this.subscribed = true;
  }

  private regenerate(changed: BuildFile, target: BuildFile): void {
    if (this.regenerating || !this.pipeline().isStale()) {
      return;
    }

    this.log.info(`someone tried to munge ${changed.name} after we read from it. Making modifications again...`);
    this.regenerating = true;
    try {
      target.setContent(this.getReadmeContent());
      this.regenerations++;
      this.currentState = 'regenerated';
    } finally {
      this.regenerating = false;
    }
  }

  private async writeToRoot(): Promise<void> {
    if (this.config.location !== 'root') {
      return;
    }

    const filename = this.config.filename;
    this.log.debug(`updating contents of ${filename} in root`);
    const bytes = this.pipeline().generateBytes(filename);
    const destination = join(this.context.rootDir, filename);

    if (await exists(destination)) {
      this.log.info(`overriding ${filename} in root`);
    }
    try {
      await writeBytes(destination, bytes);
    } catch (error) {
      throw new FileSystemError(`Failed to write ${destination}: ${error}`, { destination });
    }
    this.currentState = 'content-generated';
  }
}

export const createReadmePlugin: PluginFactory = (pluginName, options, context) =>
  new ReadmeAnyFromPod(pluginName, parseReadmeOptions(options, createPluginLogger(context.logger, pluginName)), context);
