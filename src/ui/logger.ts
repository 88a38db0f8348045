import { createTheme, defaultOutput, type OutputConfig, type Theme } from './theme.js';

export interface Logger {
  info: (msg: string) => void;
  success: (msg: string) => void;
  warning: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
  blank: () => void;
  dim: (msg: string) => void;
  heading: (msg: string) => void;
  readonly output: OutputConfig;
  readonly theme: Theme;
}

/**
 * Create a logger bound to one output configuration.
 * Warnings and errors are always written to stderr; quiet mode drops
 * everything else, and debug lines need verbose mode or DEBUG.
 */
export const createLogger = (output: OutputConfig = defaultOutput): Logger => {
  const theme = createTheme(output.color);
  const { colors: c, icons } = theme;
  const chatty = output.verbosity !== 'quiet';
  const verbose = output.verbosity === 'verbose' || Boolean(process.env.DEBUG);

  return {
    output,
    theme,

    info: (msg: string) => {
      if (chatty) console.log(icons.info, msg);
    },

    success: (msg: string) => {
      if (chatty) console.log(icons.success, msg);
    },

    warning: (msg: string) => {
      console.error(icons.warning, msg);
    },

    error: (msg: string) => {
      console.error(icons.error, msg);
    },

    debug: (msg: string) => {
      if (verbose) console.log(icons.debug, theme.chalk.gray(msg));
    },

    blank: () => {
      if (chatty) console.log();
    },

    dim: (msg: string) => {
      if (chatty) console.log(c.muted(msg));
    },

    heading: (msg: string) => {
      if (chatty) console.log(c.brandBold(msg));
    },
  };
};
