import { chmod } from 'fs/promises';
import { homedir } from 'os';
import { basename, join } from 'path';
import { copy } from 'fs-extra/esm';
import { INSTALLED_PAGE_MODE, MAN_DB_UPDATERS, USER_MAN_ROOT } from '../constants.js';
import { CommandNotFoundError, DatabaseUpdateWarning, InstallError, NotFoundError } from '../errors.js';
import { runCommand } from './exec.js';
import { isFile, isOnSearchPath } from './paths.js';
import {
  getInstallDirectory,
  installDirectoryFor,
  type InstallContext,
  type InstallDirectoryOverrides,
} from './resolver.js';

export interface InstallOptions {
  context: InstallContext;
  directories?: InstallDirectoryOverrides;
  /** Installed file name; defaults to the page's own name */
  pageName?: string;
}

export interface InstallResult {
  source: string;
  destination: string;
  context: InstallContext;
}

export interface DatabaseUpdateResult {
  /** Updater that ran successfully, if any */
  updater?: string;
  warning?: DatabaseUpdateWarning;
}

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Copy a page into the install directory for the context, mode 644.
 */
export const installManPage = async (page: string, options: InstallOptions): Promise<InstallResult> => {
  if (!(await isFile(page))) {
    throw new NotFoundError(page, 'Man page', [
      'Generate it first: `manpage generate <target>`',
    ]);
  }

  const dir = await installDirectoryFor(options.context, options.directories);
  const destination = join(dir, options.pageName ?? basename(page));

  try {
    await copy(page, destination, { overwrite: true });
    await chmod(destination, INSTALLED_PAGE_MODE);
  } catch (error) {
    throw new InstallError(`cannot copy ${basename(page)} to ${dir}: ${errorText(error)}`);
  }

  return { source: page, destination, context: options.context };
};

/**
 * Refresh the man page index. Only the system index is rebuilt; failures come
 * back as a warning and never abort the install.
 */
export const updateManDatabase = async (context: InstallContext): Promise<DatabaseUpdateResult> => {
  if (context !== 'system') {
    return {};
  }

  // The first updater present wins; the next is only a fallback for a missing one
  for (const updater of MAN_DB_UPDATERS) {
    try {
      const result = await runCommand(updater, []);
      if (result.exitCode === 0) {
        return { updater };
      }
      const stderr = result.stderr.trim();
      return {
        warning: new DatabaseUpdateWarning(
          `${updater} exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`
        ),
      };
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        continue;
      }
      return { warning: new DatabaseUpdateWarning(`${updater}: ${errorText(error)}`) };
    }
  }

  return { warning: new DatabaseUpdateWarning(`none of ${MAN_DB_UPDATERS.join(', ')} is available`) };
};

/**
 * Whether `man` will look in the per-user man root. Undefined when `manpath`
 * is not available to ask.
 */
export const isUserManRootOnManPath = async (): Promise<boolean | undefined> => {
  const root = join(homedir(), USER_MAN_ROOT);
  try {
    const result = await runCommand('manpath', []);
    if (result.exitCode !== 0) return undefined;
    return isOnSearchPath(result.stdout.trim(), root);
  } catch (error) {
    if (error instanceof CommandNotFoundError) return undefined;
    throw error;
  }
};

/**
 * Path of an installed page for a context, if it is there.
 */
export const findInstalledPage = async (
  pageName: string,
  context: InstallContext,
  directories?: InstallDirectoryOverrides
): Promise<string | undefined> => {
  const candidate = join(getInstallDirectory(context, directories), pageName);
  return (await isFile(candidate)) ? candidate : undefined;
};
