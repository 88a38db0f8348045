import { describe, it, expect, vi } from 'vitest';
import { vol } from 'memfs';
import { resolve } from 'path';
import { TEST_HOME } from '../setup.js';

vi.mock('fs/promises', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return memfs.fs.promises;
});

vi.mock('fs', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return memfs.fs;
});

vi.mock('os', async (importOriginal) => {
  const original = await importOriginal<typeof import('os')>();
  return {
    ...original,
    homedir: () => TEST_HOME,
  };
});

import {
  expandPath,
  collapsePath,
  pathExists,
  isDirectory,
  isFile,
  isOnSearchPath,
} from '../../src/lib/paths.js';

describe('paths', () => {
  describe('expandPath', () => {
    it('should expand ~ to home directory', () => {
      expect(expandPath('~')).toBe(TEST_HOME);
      expect(expandPath('~/bin/tool')).toBe(`${TEST_HOME}/bin/tool`);
    });

    it('should expand $HOME to home directory', () => {
      expect(expandPath('$HOME/bin/tool')).toBe(`${TEST_HOME}/bin/tool`);
    });

    it('should return absolute paths unchanged', () => {
      expect(expandPath('/usr/local/bin')).toBe('/usr/local/bin');
    });

    it('should resolve relative paths from the working directory', () => {
      expect(expandPath('bin/tool')).toBe(resolve('bin/tool'));
    });

    it('should keep spaces in names', () => {
      expect(expandPath('/opt/my tool/my cmd')).toBe('/opt/my tool/my cmd');
    });
  });

  describe('collapsePath', () => {
    it('should collapse home directory to ~', () => {
      expect(collapsePath(`${TEST_HOME}/.local/share/man/man1/tool.1`)).toBe('~/.local/share/man/man1/tool.1');
      expect(collapsePath(TEST_HOME)).toBe('~');
    });

    it('should not collapse a sibling that shares the prefix', () => {
      expect(collapsePath(`${TEST_HOME}-other/tool`)).toBe(`${TEST_HOME}-other/tool`);
    });

    it('should return non-home paths unchanged', () => {
      expect(collapsePath('/usr/local/bin')).toBe('/usr/local/bin');
    });
  });

  describe('file checks', () => {
    it('should tell files from directories', async () => {
      vol.fromJSON({ '/work/tool': '#!/bin/sh\n' });

      expect(await pathExists('/work/tool')).toBe(true);
      expect(await isFile('/work/tool')).toBe(true);
      expect(await isDirectory('/work/tool')).toBe(false);
      expect(await isDirectory('/work')).toBe(true);
      expect(await isFile('/work')).toBe(false);
    });

    it('should report missing paths as absent', async () => {
      expect(await pathExists('/nowhere')).toBe(false);
      expect(await isFile('/nowhere')).toBe(false);
      expect(await isDirectory('/nowhere')).toBe(false);
    });
  });

  describe('isOnSearchPath', () => {
    it('should find a directory in a colon separated list', () => {
      expect(isOnSearchPath('/usr/share/man:/test-home/.local/share/man', '/test-home/.local/share/man')).toBe(true);
    });

    it('should compare normalized paths', () => {
      expect(isOnSearchPath('/usr/share/man:/test-home/.local/share/man/', '/test-home/.local/share/man')).toBe(true);
    });

    it('should ignore empty entries', () => {
      expect(isOnSearchPath('::/usr/share/man:', '/test-home/.local/share/man')).toBe(false);
    });
  });
});
