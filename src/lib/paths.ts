import { homedir } from 'os';
import { join, isAbsolute, resolve } from 'path';
import { stat, access } from 'fs/promises';
import { constants } from 'fs';

export const expandPath = (path: string): string => {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith('$HOME/')) {
    return join(homedir(), path.slice(6));
  }
  return isAbsolute(path) ? path : resolve(path);
};

export const collapsePath = (path: string): string => {
  const home = homedir();
  if (path === home || path.startsWith(home + '/')) {
    return '~' + path.slice(home.length);
  }
  return path;
};

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
};

export const isDirectory = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
};

export const isFile = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
};

/**
 * Check that a directory list (PATH, MANPATH) contains a directory
 */
export const isOnSearchPath = (searchPath: string, dir: string): boolean => {
  const wanted = resolve(dir);
  return searchPath
    .split(':')
    .filter((entry) => entry.trim().length > 0)
    .some((entry) => resolve(entry.trim()) === wanted);
};
