import { createTheme, type Theme } from './ui/theme.js';

export class ManpageError extends Error {
  constructor(
    message: string,
    public code: string,
    public suggestions?: string[]
  ) {
    super(message);
    this.name = 'ManpageError';
  }
}

export class NotFoundError extends ManpageError {
  constructor(path: string, what = 'File', suggestions?: string[]) {
    super(`${what} not found: ${path}`, 'NOT_FOUND', suggestions ?? ['Check that the path is correct']);
    this.name = 'NotFoundError';
  }
}

export class MissingReadmeError extends NotFoundError {
  constructor(path: string, explicit: boolean) {
    super(
      path,
      'README',
      explicit
        ? ['Check the README path passed on the command line']
        : [
            'Add a README.md next to the command',
            'Or pass the README explicitly: `manpage generate <target> <readme>`',
          ]
    );
    this.code = 'MISSING_README';
    this.name = 'MissingReadmeError';
  }
}

export class InvalidTargetError extends ManpageError {
  constructor(path: string, kind: string) {
    super(`Target is not a regular file: ${path} (${kind})`, 'INVALID_TARGET', [
      'Point manpage at the script or binary being documented',
    ]);
    this.name = 'InvalidTargetError';
  }
}

export class ConversionError extends ManpageError {
  constructor(message: string, details?: string) {
    super(`Conversion failed: ${message}`, 'CONVERSION_FAILED', details ? [details] : undefined);
    this.name = 'ConversionError';
  }
}

export class ValidationError extends ManpageError {
  constructor(message: string, details?: string[]) {
    super(`Validation failed: ${message}`, 'VALIDATION_FAILED', details);
    this.name = 'ValidationError';
  }
}

export class InstallError extends ManpageError {
  constructor(message: string, suggestions?: string[]) {
    super(
      `Install failed: ${message}`,
      'INSTALL_FAILED',
      suggestions ?? ['Run with sudo for a system-wide install', 'Or pass --user to install for the current user']
    );
    this.name = 'InstallError';
  }
}

export class ConfigError extends ManpageError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', [
      'Check .manpagerc in the current directory',
    ]);
    this.name = 'ConfigError';
  }
}

export class CommandNotFoundError extends ManpageError {
  constructor(public command: string) {
    super(`Command not found: ${command}`, 'COMMAND_NOT_FOUND', [`Install ${command} or check your PATH`]);
    this.name = 'CommandNotFoundError';
  }
}

/**
 * Non-fatal: reported after a successful install, never thrown to the top.
 */
export class DatabaseUpdateWarning extends ManpageError {
  constructor(message: string) {
    super(`Man database not updated: ${message}`, 'DATABASE_UPDATE_WARNING', [
      'Run `mandb` manually to refresh the man page index',
    ]);
    this.name = 'DatabaseUpdateWarning';
  }
}

/**
 * Print an error to stderr and return the process exit code.
 */
export const reportError = (error: unknown, theme: Theme = createTheme()): number => {
  const { colors: c } = theme;

  if (error instanceof ManpageError) {
    console.error(c.error('x'), error.message);
    if (error.suggestions && error.suggestions.length > 0) {
      console.error();
      console.error(c.muted('Suggestions:'));
      error.suggestions.forEach((s) => console.error(c.muted(`  → ${s}`)));
    }
    return 1;
  }

  if (error instanceof Error) {
    console.error(c.error('x'), 'An unexpected error occurred:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
    return 1;
  }

  console.error(c.error('x'), 'An unknown error occurred');
  return 1;
};

export const handleError = (error: unknown): never => {
  process.exit(reportError(error));
};
