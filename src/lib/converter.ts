import { SECTION_ORDER } from '../constants.js';
import { CommandNotFoundError, ConversionError } from '../errors.js';
import type { ConverterStrategy } from '../schemas/config.schema.js';
import { runCommand, type ExecResult } from './exec.js';
import { createTemplateConverter } from './template.js';

export interface ConversionRequest {
  /** Basename of the documented command, as it will appear in the page */
  commandName: string;
  readmeText: string;
  readmePath: string;
}

/**
 * Turns README markdown into troff man-page source.
 */
export interface Converter {
  readonly name: string;
  convert: (request: ConversionRequest) => Promise<string>;
}

export interface CommandConverterConfig {
  command: string;
  args: string[];
}

const SECTION_LIST = SECTION_ORDER.map((section) => (section === 'AUTHOR' ? 'AUTHOR(S)' : section)).join(', ');

export const buildPrompt = (commandName: string): string => {
  return [
    `Convert the README on standard input into a UNIX man page for the command "${commandName}" in section 1.`,
    'Use troff man macros only. Start with a .TH title header line.',
    `Use only the sections that apply from this list, in this order: ${SECTION_LIST}.`,
    'NAME, SYNOPSIS and DESCRIPTION are required.',
    'Escape hyphens in option names as \\- and backslashes as \\e.',
    'Output the raw man page only: no markdown, no code fences, no commentary.',
  ].join('\n');
};

const FENCE_PATTERN = /^\s*```[\w-]*\s*\n([\s\S]*?)\n\s*```\s*$/;

/**
 * Strip a markdown fence wrapped around the whole page and end the text with
 * exactly one newline. Empty output stays empty.
 */
export const normalizeConverterOutput = (text: string): string => {
  const fenced = FENCE_PATTERN.exec(text);
  const body = (fenced ? fenced[1] : text).replace(/\r\n/g, '\n').trimEnd();
  return body.trim().length === 0 ? '' : `${body}\n`;
};

/**
 * Converter backed by an external command (an AI CLI by default). The prompt
 * goes last on the argument list and the README is piped to stdin.
 */
export const createCommandConverter = (config: CommandConverterConfig): Converter => ({
  name: config.command,
  convert: async ({ commandName, readmeText }) => {
    let result: ExecResult;
    try {
      result = await runCommand(config.command, [...config.args, buildPrompt(commandName)], {
        input: readmeText,
      });
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new ConversionError(
          `converter command not found: ${config.command}`,
          'Install it, set converter.command in .manpagerc, or pass --template'
        );
      }
      throw error;
    }

    if (result.exitCode !== 0) {
      throw new ConversionError(
        `${config.command} exited with code ${result.exitCode}`,
        result.stderr.trim() || undefined
      );
    }

    if (result.stdout.trim().length === 0) {
      throw new ConversionError(`${config.command} produced no output`);
    }

    return result.stdout;
  },
});

export interface ConverterSelection {
  strategy: ConverterStrategy;
  command: string;
  args: string[];
}

/**
 * Pick the converter for a run. `template` on the command line overrides the
 * configured strategy.
 */
export const selectConverter = (
  config: ConverterSelection,
  options: { template?: boolean; version?: string } = {}
): Converter => {
  if (options.template || config.strategy === 'template') {
    return createTemplateConverter({ version: options.version });
  }
  return createCommandConverter({ command: config.command, args: config.args });
};
