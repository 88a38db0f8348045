import ora, { type Ora } from 'ora';
import { createTheme, type OutputConfig } from './theme.js';

export interface SpinnerInstance {
  start: () => void;
  succeed: (text?: string) => void;
  fail: (text?: string) => void;
}

/**
 * Spinner on stderr, silent in quiet mode.
 */
export const createSpinner = (output: OutputConfig, text: string): SpinnerInstance => {
  const { colors: c } = createTheme(output.color);
  const spinner: Ora = ora({
    text,
    color: 'cyan',
    spinner: 'dots',
    isSilent: output.verbosity === 'quiet',
  });

  return {
    start: () => {
      spinner.start();
    },
    succeed: (doneText?: string) => {
      spinner.succeed(doneText ? c.success(doneText) : undefined);
    },
    fail: (failText?: string) => {
      spinner.fail(failText ? c.error(failText) : undefined);
    },
  };
};

export const withSpinner = async <T>(output: OutputConfig, text: string, fn: () => Promise<T>): Promise<T> => {
  const spinner = createSpinner(output, text);
  spinner.start();

  try {
    const result = await fn();
    spinner.succeed(text);
    return result;
  } catch (error) {
    spinner.fail(text);
    throw error;
  }
};
