import { homedir } from 'os';
import { basename, dirname, join } from 'path';
import { realpath, stat } from 'fs/promises';
import { ensureDir } from 'fs-extra/esm';
import type { Stats } from 'fs';
import {
  MAN_EXTENSION,
  README_CANDIDATES,
  SYSTEM_MAN_DIR,
  USER_MAN_DIR,
} from '../constants.js';
import {
  InstallError,
  InvalidTargetError,
  ManpageError,
  MissingReadmeError,
  NotFoundError,
} from '../errors.js';
import { expandPath, isFile } from './paths.js';

export type InstallContext = 'system' | 'user';

export interface InstallDirectoryOverrides {
  systemDir?: string;
  userDir?: string;
}

export interface InstallContextOptions {
  /** Install for the current user even when running privileged */
  forceUser?: boolean;
}

const describeFileType = (stats: Stats): string => {
  if (stats.isDirectory()) return 'directory';
  if (stats.isCharacterDevice()) return 'character device';
  if (stats.isBlockDevice()) return 'block device';
  if (stats.isFIFO()) return 'named pipe';
  if (stats.isSocket()) return 'socket';
  return 'special file';
};

const errorCode = (error: unknown): unknown => {
  return error instanceof Error && 'code' in error ? error.code : undefined;
};

const isMissing = (error: unknown): boolean => {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
};

const unresolvable = (path: string, error: unknown): ManpageError => {
  const code = errorCode(error);
  const reason = typeof code === 'string' ? code : error instanceof Error ? error.message : String(error);
  return new ManpageError(`Cannot resolve ${path} (${reason})`, 'UNRESOLVABLE_PATH', [
    code === 'ELOOP' ? 'The path contains a symlink loop' : 'Check the permissions along the path',
  ]);
};

/**
 * Resolve a command path to its canonical absolute location, following
 * symlinks. The name is kept byte for byte; nothing is split on whitespace.
 */
export const resolveTarget = async (input: string): Promise<string> => {
  if (input.trim().length === 0) {
    throw new NotFoundError(input, 'Target', ['Pass the path of the command to document']);
  }

  const expanded = expandPath(input);
  let canonical: string;
  try {
    canonical = await realpath(expanded);
  } catch (error) {
    if (isMissing(error)) {
      throw new NotFoundError(expanded, 'Target', [
        'Check that the command path is correct',
        'Relative paths are resolved from the current directory',
      ]);
    }
    throw unresolvable(expanded, error);
  }

  const stats = await stat(canonical);
  if (!stats.isFile()) {
    throw new InvalidTargetError(canonical, describeFileType(stats));
  }

  return canonical;
};

/**
 * Locate the README for a target. An explicit path always wins over the
 * directory search; the search only looks in the target's own directory.
 */
export const resolveReadme = async (target: string, explicit?: string): Promise<string> => {
  if (explicit !== undefined) {
    const expanded = expandPath(explicit);
    let canonical: string;
    try {
      canonical = await realpath(expanded);
    } catch (error) {
      if (isMissing(error)) {
        throw new MissingReadmeError(expanded, true);
      }
      throw unresolvable(expanded, error);
    }
    if (!(await isFile(canonical))) {
      throw new MissingReadmeError(canonical, true);
    }
    return canonical;
  }

  const dir = dirname(target);
  for (const name of README_CANDIDATES) {
    const candidate = join(dir, name);
    if (await isFile(candidate)) {
      try {
        return await realpath(candidate);
      } catch (error) {
        throw unresolvable(candidate, error);
      }
    }
  }

  throw new MissingReadmeError(join(dir, README_CANDIDATES[0]), false);
};

const currentEuid = (): number | undefined => {
  return typeof process.geteuid === 'function' ? process.geteuid() : undefined;
};

/**
 * Decide where pages go for this invocation. Recomputed every run.
 */
export const determineInstallContext = (
  options: InstallContextOptions = {},
  euid: number | undefined = currentEuid()
): InstallContext => {
  if (options.forceUser) {
    return 'user';
  }
  return euid === 0 ? 'system' : 'user';
};

export const getInstallDirectory = (
  context: InstallContext,
  overrides: InstallDirectoryOverrides = {}
): string => {
  if (context === 'system') {
    return expandPath(overrides.systemDir ?? SYSTEM_MAN_DIR);
  }
  return expandPath(overrides.userDir ?? join(homedir(), USER_MAN_DIR));
};

/**
 * Install directory for a context, created when absent.
 */
export const installDirectoryFor = async (
  context: InstallContext,
  overrides: InstallDirectoryOverrides = {}
): Promise<string> => {
  const dir = getInstallDirectory(context, overrides);
  try {
    await ensureDir(dir);
  } catch (error) {
    throw new InstallError(
      `cannot create ${dir}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return dir;
};

export const getPageName = (target: string): string => {
  return `${basename(target)}${MAN_EXTENSION}`;
};

/**
 * Generated pages live next to the README they were made from.
 */
export const getOutputPath = (target: string, readme: string): string => {
  return join(dirname(readme), getPageName(target));
};
