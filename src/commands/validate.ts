import { Command } from 'commander';
import { basename } from 'path';
import { NotFoundError, ValidationError } from '../errors.js';
import { readManPage, summarizeIssues, validatePage, type ManPage, type ValidationReport } from '../lib/validator.js';
import { expandPath } from '../lib/paths.js';
import { formatCount } from '../ui/index.js';
import type { Logger } from '../ui/index.js';
import type { CliContext, ContextProvider, ValidateOptions } from '../types.js';

const printReport = (report: ValidationReport, logger: Logger): void => {
  logger.heading(`Validating: ${report.page}`);

  for (const found of report.issues) {
    const details = found.details?.trimEnd();
    const label = details
      ? `${report.page}: ${found.message}\n${details.replace(/^/gm, '    ')}`
      : `${report.page}: ${found.message}`;

    if (found.severity === 'error') {
      logger.error(label);
    } else if (found.severity === 'warning') {
      logger.warning(label);
    } else {
      logger.debug(label);
    }
  }

  if (report.ok) {
    logger.success(`${report.page}: ${formatCount(report.summary.warnings, 'warning')}`);
  }
  logger.blank();
};

// A missing page counts as a failed page; the rest are still checked
const checkPage = async (path: string, options: ValidateOptions, ctx: CliContext): Promise<ValidationReport> => {
  const expanded = expandPath(path);
  let page: ManPage;
  try {
    page = await readManPage(expanded);
  } catch (error) {
    if (error instanceof NotFoundError) {
      return summarizeIssues(basename(expanded), [
        { severity: 'error', code: 'not-found', message: 'file not found', details: expanded },
      ]);
    }
    throw error;
  }
  return validatePage(page, {
    render: options.render !== false,
    renderer: ctx.config.renderer,
  });
};

export const runValidate = async (
  pages: string[],
  options: ValidateOptions,
  ctx: CliContext
): Promise<ValidationReport[]> => {
  const reports: ValidationReport[] = [];

  for (const path of pages) {
    const report = await checkPage(path, options, ctx);
    printReport(report, ctx.logger);
    reports.push(report);
  }

  const errors = reports.reduce((sum, report) => sum + report.summary.errors, 0);
  const warnings = reports.reduce((sum, report) => sum + report.summary.warnings, 0);
  ctx.logger.info(`Summary: ${formatCount(errors, 'error')}, ${formatCount(warnings, 'warning')}`);

  const failed = reports.filter((report) => !report.ok);
  if (failed.length > 0) {
    throw new ValidationError(
      `${formatCount(failed.length, 'page')} with errors`,
      failed.map((report) => `${report.page}: ${formatCount(report.summary.errors, 'error')}`)
    );
  }

  return reports;
};

export const createValidateCommand = (getContext: ContextProvider): Command =>
  new Command('validate')
    .description('Check man pages for structure, section order and rendering')
    .argument('<pages...>', 'Man page files to check')
    .option('--no-render', 'Skip the external renderer')
    .action(async (pages: string[], options: ValidateOptions) => {
      await runValidate(pages, options, await getContext());
    });
