import { Command } from 'commander';
import { CommandResult, ReleaseCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runRelease } from '../core/build/build-pipeline.js';

async function releaseCommand(options: ReleaseCommandOptions): Promise<CommandResult<string>> {
  const result = await runRelease({ workingDir: options.workingDir });
  return { success: true, data: result.archive.path };
}

export function setupReleaseCommand(program: Command): void {
  program
    .command('release')
    .description('Build and archive the distribution, then run after-release hooks')
    .action(withErrorHandling(async (options: ReleaseCommandOptions, command: Command) => {
      const result = await releaseCommand({ ...command.optsWithGlobals(), ...options });
      if (!result.success) {
        throw new Error(result.error || 'Release failed');
      }
    }));
}
