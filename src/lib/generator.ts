import { readFile, writeFile } from 'fs/promises';
import { basename } from 'path';
import { ConversionError, ValidationError } from '../errors.js';
import type { Logger } from '../ui/logger.js';
import { normalizeConverterOutput, type Converter } from './converter.js';
import { getOutputPath, resolveReadme, resolveTarget } from './resolver.js';
import {
  checkSectionOrder,
  hasTitleHeader,
  renderCheck,
  summarizeIssues,
  validateStructure,
  type ManPage,
  type RendererConfig,
  type ValidationReport,
} from './validator.js';

export interface GenerateRequest {
  target: string;
  readme?: string;
  converter: Converter;
  logger: Logger;
  /** Render the page before it is written; needs `renderer` */
  renderCheck?: boolean;
  renderer?: RendererConfig;
  /** Wraps the conversion call, e.g. to show a spinner */
  during?: <T>(label: string, fn: () => Promise<T>) => Promise<T>;
}

export interface GenerateResult {
  target: string;
  readme: string;
  page: string;
  content: string;
  report: ValidationReport;
}

const passthrough = <T>(_label: string, fn: () => Promise<T>): Promise<T> => fn();

/**
 * resolve -> convert -> check -> write. The page is only written once the
 * converter succeeded and its output carries a title header.
 */
export const generateManPage = async (request: GenerateRequest): Promise<GenerateResult> => {
  const { logger } = request;
  const during = request.during ?? passthrough;

  const target = await resolveTarget(request.target);
  logger.debug(`Target: ${target}`);

  const readme = await resolveReadme(target, request.readme);
  logger.debug(`README: ${readme}`);

  const commandName = basename(target);
  const output = getOutputPath(target, readme);
  const readmeText = await readFile(readme, 'utf-8');
  if (readmeText.trim().length === 0) {
    logger.debug('README is empty; passing it to the converter as-is');
  }

  logger.info(`Generating man page for ${commandName} with ${request.converter.name}`);
  const raw = await during(`Converting ${basename(readme)}`, () =>
    request.converter.convert({ commandName, readmeText, readmePath: readme })
  );

  const content = normalizeConverterOutput(raw);
  if (content.length === 0) {
    throw new ConversionError(`${request.converter.name} returned empty output`);
  }

  const page: ManPage = { name: basename(output), content };
  if (!hasTitleHeader(content)) {
    throw new ValidationError(`${page.name} has no title header (.TH)`, [
      'The converter did not produce a man page',
      'Re-run generate, or try --template',
    ]);
  }

  const issues = [...validateStructure(page).issues, ...checkSectionOrder(page)];

  if (request.renderCheck && request.renderer) {
    logger.debug(`Rendering with ${request.renderer.command}`);
    const rendered = await renderCheck(page, request.renderer);
    if (!rendered.ok) {
      const details = rendered.error.details?.trim();
      throw new ValidationError(`${page.name}: ${rendered.error.message}`, details ? [details] : undefined);
    }
    issues.push(...rendered.warnings);
  }

  await writeFile(output, content, 'utf-8');
  logger.debug(`Wrote ${output}`);

  const report = summarizeIssues(page.name, issues);
  for (const found of report.issues) {
    logger.warning(`${page.name}: ${found.message}`);
  }

  return { target, readme, page: output, content, report };
};
