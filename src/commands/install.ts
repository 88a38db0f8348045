import { Command } from 'commander';
import { dirname, join } from 'path';
import { MissingReadmeError } from '../errors.js';
import { USER_MAN_ROOT } from '../constants.js';
import {
  installManPage,
  isUserManRootOnManPath,
  updateManDatabase,
  type InstallResult,
} from '../lib/installer.js';
import { collapsePath, expandPath, isFile } from '../lib/paths.js';
import {
  determineInstallContext,
  getOutputPath,
  getPageName,
  resolveReadme,
  resolveTarget,
} from '../lib/resolver.js';
import type { CliContext, ContextProvider, InstallCommandOptions } from '../types.js';

/**
 * Install a page for a resolved target, then refresh the index. Database and
 * MANPATH problems are reported as warnings only.
 */
export const performInstall = async (
  page: string,
  target: string,
  options: InstallCommandOptions,
  ctx: CliContext
): Promise<InstallResult> => {
  const { logger } = ctx;
  const context = determineInstallContext({ forceUser: options.user }, ctx.euid);
  logger.debug(`Install context: ${context}`);

  const result = await installManPage(page, {
    context,
    directories: ctx.config.install,
    pageName: getPageName(target),
  });
  logger.success(`Installed ${collapsePath(result.destination)}`);

  const database = await updateManDatabase(context);
  if (database.warning) {
    logger.warning(database.warning.message);
  } else if (database.updater) {
    logger.debug(`Man database updated with ${database.updater}`);
  }

  if (context === 'user' && !ctx.config.install.userDir) {
    const onManPath = await isUserManRootOnManPath();
    if (onManPath === false) {
      logger.warning(`~/${USER_MAN_ROOT} may not be in MANPATH`);
      logger.dim(`  Add to ~/.bashrc: export MANPATH="$HOME/${USER_MAN_ROOT}:$MANPATH"`);
    }
  }

  return result;
};

/**
 * Where `generate` would have written the page: beside the target's README,
 * or beside the target itself when that is where the page is.
 */
export const locateGeneratedPage = async (target: string): Promise<string> => {
  const besideTarget = join(dirname(target), getPageName(target));
  let readme: string;
  try {
    readme = await resolveReadme(target);
  } catch (error) {
    if (error instanceof MissingReadmeError) {
      return besideTarget;
    }
    throw error;
  }

  const besideReadme = getOutputPath(target, readme);
  return (await isFile(besideReadme)) ? besideReadme : besideTarget;
};

export const runInstall = async (
  target: string,
  page: string | undefined,
  options: InstallCommandOptions,
  ctx: CliContext
): Promise<InstallResult> => {
  const resolved = await resolveTarget(target);
  const source = page ? expandPath(page) : await locateGeneratedPage(resolved);
  ctx.logger.debug(`Page: ${source}`);
  return performInstall(source, resolved, options, ctx);
};

export const createInstallCommand = (getContext: ContextProvider): Command =>
  new Command('install')
    .description('Install a generated man page')
    .argument('<target>', 'Command the page documents')
    .argument('[page]', 'Page to install (default: <target>.1 where generate wrote it)')
    .option('-u, --user', 'Install for the current user even when running as root')
    .action(async (target: string, page: string | undefined, options: InstallCommandOptions) => {
      await runInstall(target, page, options, await getContext());
    });
