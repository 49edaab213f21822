import { Command } from 'commander';
import { BuildCommandOptions, CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runBuild } from '../core/build/build-pipeline.js';

async function buildCommand(options: BuildCommandOptions): Promise<CommandResult<string>> {
  const result = await runBuild({
    workingDir: options.workingDir,
    archive: options.archive
  });
  return { success: true, data: result.archive?.path ?? result.buildDir };
}

export function setupBuildCommand(program: Command): void {
  program
    .command('build')
    .description(
      'Build the distribution described by dist.yml.\n' +
      'Usage:\n' +
      '  podreadme build               # Build and archive\n' +
      '  podreadme build --no-archive  # Only write the build directory'
    )
    .option('--no-archive', 'skip creating the .tar.gz archive')
    .action(withErrorHandling(async (options: BuildCommandOptions, command: Command) => {
      const result = await buildCommand({ ...command.optsWithGlobals(), ...options });
      if (!result.success) {
        throw new Error(result.error || 'Build failed');
      }
    }));
}
