import { Command } from 'commander';
import { resolve } from 'path';
import { CommandResult, RenderCommandOptions } from '../types/index.js';
import { README_DEFAULTS } from '../constants/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { readTextFile } from '../utils/fs.js';
import { convertMarkup, createSourceSnapshot, extractMarkup } from '../core/readme/content-pipeline.js';
import { allFormatIds, lookupFormat } from '../core/readme/formats.js';

async function renderCommand(file: string, options: RenderCommandOptions): Promise<CommandResult<string>> {
  const format = lookupFormat(options.type ?? README_DEFAULTS.TYPE);
  const source = await readTextFile(resolve(options.workingDir ?? process.cwd(), file));
  const markup = extractMarkup(source, createSourceSnapshot());
  return { success: true, data: convertMarkup(markup, format) };
}

export function setupRenderCommand(program: Command): void {
  program
    .command('render')
    .argument('<file>', 'source file whose POD should be rendered')
    .description('Print the README a source file would produce, without building')
    .option('-t, --type <type>', `README type (${allFormatIds().join(', ')})`)
    .action(withErrorHandling(async (file: string, options: RenderCommandOptions, command: Command) => {
      const result = await renderCommand(file, { ...command.optsWithGlobals(), ...options });
      if (!result.success || result.data === undefined) {
        throw new Error(result.error || 'Render failed');
      }
      process.stdout.write(result.data);
    }));
}
