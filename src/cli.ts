import { Command } from 'commander';
import { DESCRIPTION, APP_NAME, VERSION } from './constants.js';
import { createGenerateCommand, createInstallCommand, createValidateCommand } from './commands/index.js';
import { loadConfig as loadConfigFromDisk, type LoadedConfig } from './lib/config.js';
import type { Converter } from './lib/converter.js';
import { collapsePath } from './lib/paths.js';
import { createLogger, createTheme, customHelp, defaultOutput, type OutputConfig, type Verbosity } from './ui/index.js';
import type { CliContext } from './types.js';

export interface ProgramOptions {
  /** Replaces the cosmiconfig lookup */
  loadConfig?: () => Promise<LoadedConfig>;
  converter?: Converter;
  euid?: number;
}

export const createProgram = (options: ProgramOptions = {}): Command => {
  const program = new Command();
  // -v and -q override each other; whichever comes last on the command line wins
  let verbosity: Verbosity = 'normal';

  const colorEnabled = (): boolean => program.opts().color !== false && defaultOutput.color;

  program
    .name(APP_NAME)
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Display version number')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only show warnings and errors')
    .option('--no-color', 'Disable colored output')
    .helpOption('-h, --help', 'Display this help message')
    .configureOutput({
      outputError: (str, write) => write(createTheme(colorEnabled()).colors.error(str)),
    })
    .addHelpText('beforeAll', () => customHelp(VERSION, colorEnabled()))
    .showHelpAfterError(false);

  program.on('option:verbose', () => {
    verbosity = 'verbose';
  });
  program.on('option:quiet', () => {
    verbosity = 'quiet';
  });

  const getContext = async (): Promise<CliContext> => {
    const output: OutputConfig = { verbosity, color: colorEnabled() };
    const logger = createLogger(output);
    const loaded = await (options.loadConfig ?? loadConfigFromDisk)();

    if (loaded.filepath) {
      logger.debug(`Using configuration from ${collapsePath(loaded.filepath)}`);
    }

    return {
      output,
      logger,
      config: loaded.config,
      converter: options.converter,
      euid: options.euid,
    };
  };

  program.addCommand(createGenerateCommand(getContext));
  program.addCommand(createInstallCommand(getContext));
  program.addCommand(createValidateCommand(getContext));

  return program;
};
