import { Command } from 'commander';
import { VERSION } from '../constants.js';
import { selectConverter } from '../lib/converter.js';
import { generateManPage, type GenerateResult } from '../lib/generator.js';
import type { InstallResult } from '../lib/installer.js';
import { collapsePath } from '../lib/paths.js';
import { withSpinner } from '../ui/index.js';
import type { CliContext, ContextProvider, GenerateOptions } from '../types.js';
import { performInstall } from './install.js';

export interface GenerateOutcome extends GenerateResult {
  installed?: InstallResult;
}

export const runGenerate = async (
  target: string,
  readme: string | undefined,
  options: GenerateOptions,
  ctx: CliContext
): Promise<GenerateOutcome> => {
  const { logger, config } = ctx;
  const converter =
    ctx.converter ?? selectConverter(config.converter, { template: options.template, version: VERSION });

  const result = await generateManPage({
    target,
    readme,
    converter,
    logger,
    renderCheck: options.renderCheck ?? config.validation.renderCheck,
    renderer: config.renderer,
    during: (label, fn) => withSpinner(ctx.output, label, fn),
  });

  logger.success(`Generated ${collapsePath(result.page)}`);

  if (!options.install) {
    return result;
  }

  const installed = await performInstall(result.page, result.target, { user: options.user }, ctx);
  return { ...result, installed };
};

export const createGenerateCommand = (getContext: ContextProvider): Command =>
  new Command('generate')
    .description('Generate <target>.1 from a README')
    .argument('<target>', 'Command or script to document')
    .argument('[readme]', 'README to convert (default: README.md beside the target)')
    .option('-i, --install', 'Install the page after generating it')
    .option('-u, --user', 'With --install, install for the current user even when running as root')
    .option('--template', 'Use the built-in template converter instead of the AI command')
    .option('--render-check', 'Render the page with the configured renderer before writing it')
    .action(async (target: string, readme: string | undefined, options: GenerateOptions) => {
      await runGenerate(target, readme, options, await getContext());
    });
