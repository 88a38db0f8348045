import { readFile } from 'fs/promises';
import { basename } from 'path';
import { MAX_LINE_LENGTH, SECTION_NAMES } from '../constants.js';
import { CommandNotFoundError, NotFoundError } from '../errors.js';
import { runCommand, type ExecResult } from './exec.js';
import { isFile } from './paths.js';

export type IssueSeverity = 'error' | 'warning' | 'info';

export interface ValidationIssue {
  severity: IssueSeverity;
  code: string;
  message: string;
  /** Verbatim diagnostic text from an external tool */
  details?: string;
}

export interface ValidationSummary {
  errors: number;
  warnings: number;
  infos: number;
}

export interface ValidationReport {
  page: string;
  issues: ValidationIssue[];
  summary: ValidationSummary;
  ok: boolean;
}

export interface ManPage {
  /** Display name, usually the file's basename */
  name: string;
  content: string;
}

export interface RendererConfig {
  command: string;
  args: string[];
  /** Extra arguments for a second, stricter pass whose diagnostics become warnings */
  warningArgs: string[];
}

export type RenderResult = { ok: true; warnings: ValidationIssue[] } | { ok: false; error: ValidationIssue };

export interface ValidatePageOptions {
  render?: boolean;
  renderer?: RendererConfig;
}

const TITLE_HEADER = /^\.TH(\s|$)/;
const SECTION_HEADER = /^\.SH(\s+(.*))?$/;

const issue = (severity: IssueSeverity, code: string, message: string, details?: string): ValidationIssue => {
  return details === undefined ? { severity, code, message } : { severity, code, message, details };
};

export const summarizeIssues = (page: string, issues: ValidationIssue[]): ValidationReport => {
  const summary: ValidationSummary = {
    errors: issues.filter((i) => i.severity === 'error').length,
    warnings: issues.filter((i) => i.severity === 'warning').length,
    infos: issues.filter((i) => i.severity === 'info').length,
  };
  return { page, issues, summary, ok: summary.errors === 0 };
};

const splitLines = (content: string): string[] => {
  return content.replace(/\r\n/g, '\n').split('\n');
};

/**
 * Strip quotes and the usual escapes from a macro argument
 */
export const plainText = (troff: string): string => {
  return troff
    .replace(/\\f[BIRP]|\\f\(..|\\&/g, '')
    .replace(/\\-/g, '-')
    .replace(/\\e/g, '\\')
    .replace(/"/g, '')
    .replace(/\s+/g, ' ')
    .trim();
};

export const hasTitleHeader = (content: string): boolean => {
  return splitLines(content).some((line) => TITLE_HEADER.test(line));
};

/**
 * Section headers in file order. `.SH` with no argument takes its title from
 * the following line.
 */
export const extractSections = (content: string): string[] => {
  const lines = splitLines(content);
  const sections: string[] = [];
  for (let i = 0; i < lines.length; i++) {
    const match = SECTION_HEADER.exec(lines[i]);
    if (!match) continue;
    const title = match[2] ?? lines[i + 1] ?? '';
    const name = plainText(title).toUpperCase();
    if (name.length > 0) sections.push(name);
  }
  return sections;
};

export const sectionRank = (section: string): number => {
  const normalized = section === 'AUTHORS' ? 'AUTHOR' : section;
  return SECTION_NAMES.indexOf(normalized);
};

export const validateStructure = (page: ManPage): ValidationReport => {
  const issues: ValidationIssue[] = [];
  const sections = new Set(extractSections(page.content));

  if (!hasTitleHeader(page.content)) {
    issues.push(issue('error', 'missing-title-header', 'missing title header'));
  }
  if (!sections.has('NAME')) {
    issues.push(issue('error', 'missing-name', 'missing NAME section'));
  }
  if (!sections.has('SYNOPSIS')) {
    issues.push(issue('warning', 'missing-synopsis', 'missing SYNOPSIS section'));
  }
  if (!sections.has('DESCRIPTION')) {
    issues.push(issue('warning', 'missing-description', 'missing DESCRIPTION section'));
  }

  return summarizeIssues(page.name, issues);
};

/**
 * One warning per known section ranked below the highest rank seen before it.
 * Unknown sections do not take part.
 */
export const checkSectionOrder = (page: ManPage): ValidationIssue[] => {
  const warnings: ValidationIssue[] = [];
  let highest = -1;

  for (const section of extractSections(page.content)) {
    const rank = sectionRank(section);
    if (rank < 0) continue;
    if (rank < highest) {
      warnings.push(issue('warning', 'section-order', `section '${section}' appears out of standard order`));
    }
    highest = Math.max(highest, rank);
  }

  return warnings;
};

/**
 * Name of the page as declared by its title header
 */
export const extractTitleName = (content: string): string | undefined => {
  const header = splitLines(content).find((line) => TITLE_HEADER.test(line));
  if (!header) return undefined;
  const args = header.slice(3).trim();
  const quoted = /^"([^"]*)"/.exec(args);
  const name = quoted ? quoted[1] : args.split(/\s+/)[0];
  const plain = plainText(name ?? '');
  return plain.length > 0 ? plain : undefined;
};

export const validateContent = (page: ManPage): ValidationIssue[] => {
  const issues: ValidationIssue[] = [];
  const lines = splitLines(page.content);

  if (hasTitleHeader(page.content)) {
    const titleName = extractTitleName(page.content);
    if (!titleName) {
      issues.push(issue('error', 'title-without-name', 'cannot extract command name from title header'));
    } else {
      const nameIndex = lines.findIndex((line) => /^\.SH\s+"?NAME"?\s*$/.test(line));
      const nameLine = nameIndex >= 0 ? lines[nameIndex + 1] : undefined;
      if (nameLine && !plainText(nameLine).toLowerCase().includes(titleName.toLowerCase())) {
        issues.push(issue('warning', 'name-mismatch', `NAME section doesn't reference command '${titleName}'`));
      }
    }
  }

  const trailing = lines.filter((line) => /[ \t]$/.test(line)).length;
  if (trailing > 0) {
    issues.push(issue('warning', 'trailing-whitespace', `contains trailing whitespace on ${trailing} line(s)`));
  }

  const long = lines.filter((line) => line.length > MAX_LINE_LENGTH).length;
  if (long > 0) {
    issues.push(issue('info', 'long-lines', `contains ${long} line(s) longer than ${MAX_LINE_LENGTH} characters`));
  }

  return issues;
};

/**
 * Render the page with an external formatter. The formatter's own diagnostics
 * are attached untouched.
 */
export const renderCheck = async (page: ManPage, renderer: RendererConfig): Promise<RenderResult> => {
  let result: ExecResult;
  try {
    result = await runCommand(renderer.command, renderer.args, { input: page.content });
  } catch (error) {
    if (error instanceof CommandNotFoundError) {
      return {
        ok: false,
        error: issue('error', 'renderer-missing', `renderer not found: ${renderer.command}`),
      };
    }
    throw error;
  }

  if (result.exitCode !== 0) {
    return {
      ok: false,
      error: issue('error', 'render-failed', 'render failed', result.stderr),
    };
  }

  const warnings: ValidationIssue[] = [];
  if (result.stderr.trim().length > 0) {
    warnings.push(issue('warning', 'render-warnings', 'renderer warnings', result.stderr));
  } else if (renderer.warningArgs.length > 0) {
    const strict = await runCommand(renderer.command, [...renderer.warningArgs, ...renderer.args], {
      input: page.content,
    });
    if (strict.stderr.trim().length > 0) {
      warnings.push(issue('warning', 'render-warnings', 'renderer warnings', strict.stderr));
    }
  }

  return { ok: true, warnings };
};

export const validatePage = async (page: ManPage, options: ValidatePageOptions = {}): Promise<ValidationReport> => {
  const issues = [
    ...validateStructure(page).issues,
    ...checkSectionOrder(page),
    ...validateContent(page),
  ];

  if (options.render && options.renderer) {
    const rendered = await renderCheck(page, options.renderer);
    if (rendered.ok) {
      issues.push(...rendered.warnings);
    } else {
      issues.push(rendered.error);
    }
  }

  return summarizeIssues(page.name, issues);
};

export const readManPage = async (path: string): Promise<ManPage> => {
  if (!(await isFile(path))) {
    throw new NotFoundError(path, 'Man page');
  }
  return { name: basename(path), content: await readFile(path, 'utf-8') };
};
