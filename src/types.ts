import type { Converter } from './lib/converter.js';
import type { ManpageConfig } from './schemas/config.schema.js';
import type { Logger } from './ui/logger.js';
import type { OutputConfig } from './ui/theme.js';

export interface GenerateOptions {
  install?: boolean;
  user?: boolean;
  template?: boolean;
  renderCheck?: boolean;
}

export interface InstallCommandOptions {
  user?: boolean;
}

export interface ValidateOptions {
  render?: boolean;
}

/**
 * Everything a command needs for one invocation, built once per run
 */
export interface CliContext {
  output: OutputConfig;
  logger: Logger;
  config: ManpageConfig;
  /** Replaces the configured converter */
  converter?: Converter;
  /** Effective uid used to pick the install context; the process's own when unset */
  euid?: number;
}

export type ContextProvider = () => Promise<CliContext>;
