/**
 * Design tokens for the manpage CLI.
 * Colors are bound to an explicit chalk instance so that `--no-color`
 * travels with the output configuration instead of global state.
 */

import { Chalk, chalkStderr, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import figures from 'figures';

// ─────────────────────────────────────────────────────────────────────────────
// Output Configuration
// ─────────────────────────────────────────────────────────────────────────────

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export interface OutputConfig {
  verbosity: Verbosity;
  color: boolean;
}

export const defaultOutput: OutputConfig = {
  verbosity: 'normal',
  color: chalkStderr.level > 0,
};

// ─────────────────────────────────────────────────────────────────────────────
// Theme
// ─────────────────────────────────────────────────────────────────────────────

export interface ThemeColors {
  brand: ChalkInstance;
  brandBold: ChalkInstance;
  success: ChalkInstance;
  warning: ChalkInstance;
  error: ChalkInstance;
  info: ChalkInstance;
  muted: ChalkInstance;
  bold: ChalkInstance;
}

export interface ThemeIcons {
  success: string;
  error: string;
  warning: string;
  info: string;
  debug: string;
}

export interface Theme {
  chalk: ChalkInstance;
  colors: ThemeColors;
  icons: ThemeIcons;
}

export const createTheme = (color: boolean = defaultOutput.color): Theme => {
  // Forced color on a dumb terminal still gets basic ANSI
  const level: ColorSupportLevel = color ? (chalkStderr.level === 0 ? 1 : chalkStderr.level) : 0;
  const chalk = new Chalk({ level });

  const colors: ThemeColors = {
    brand: chalk.cyan,
    brandBold: chalk.bold.cyan,
    success: chalk.green,
    warning: chalk.yellow,
    error: chalk.red,
    info: chalk.blue,
    muted: chalk.dim,
    bold: chalk.bold,
  };

  const icons: ThemeIcons = {
    success: colors.success(figures.tick),
    error: colors.error(figures.cross),
    warning: colors.warning(figures.warning),
    info: colors.info(figures.info),
    debug: chalk.gray('⚙'),
  };

  return { chalk, colors, icons };
};

// ─────────────────────────────────────────────────────────────────────────────
// Text Formatting Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Format a count with proper pluralization: "3 warnings" */
export const formatCount = (n: number, singular: string, plural?: string): string => {
  const word = n === 1 ? singular : plural || `${singular}s`;
  return `${n} ${word}`;
};
