import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/lib/exec.js', () => ({
  runCommand: vi.fn(),
}));

import { runCommand } from '../../src/lib/exec.js';
import {
  buildPrompt,
  createCommandConverter,
  normalizeConverterOutput,
  selectConverter,
} from '../../src/lib/converter.js';
import { CommandNotFoundError, ConversionError } from '../../src/errors.js';

const REQUEST = { commandName: 'tool', readmeText: '# tool\n', readmePath: '/work/README.md' };

describe('converter', () => {
  beforeEach(() => {
    vi.mocked(runCommand).mockReset();
  });

  describe('normalizeConverterOutput', () => {
    it('should strip a fence around the whole page', () => {
      expect(normalizeConverterOutput('```troff\n.TH TOOL 1\n.SH NAME\n```\n')).toBe('.TH TOOL 1\n.SH NAME\n');
    });

    it('should keep fences inside the page', () => {
      const text = '.TH TOOL 1\n```\ncode\n```\n.SH NAME';
      expect(normalizeConverterOutput(text)).toBe(`${text}\n`);
    });

    it('should normalize line endings and end with one newline', () => {
      expect(normalizeConverterOutput('.TH TOOL 1\r\n.SH NAME\r\n\r\n')).toBe('.TH TOOL 1\n.SH NAME\n');
    });

    it('should map blank output to an empty string', () => {
      expect(normalizeConverterOutput('  \n\n')).toBe('');
    });
  });

  describe('buildPrompt', () => {
    it('should name the command and the section list', () => {
      const prompt = buildPrompt('my cmd');

      expect(prompt).toContain('for the command "my cmd" in section 1');
      expect(prompt).toContain('SEE ALSO, HISTORY, AUTHOR(S), COPYRIGHT.');
    });
  });

  describe('createCommandConverter', () => {
    const converter = createCommandConverter({ command: 'claude', args: ['--print'] });

    it('should pipe the README to the command with the prompt last', async () => {
      vi.mocked(runCommand).mockResolvedValue({ stdout: '.TH TOOL 1\n', stderr: '', exitCode: 0 });

      await expect(converter.convert(REQUEST)).resolves.toBe('.TH TOOL 1\n');
      expect(runCommand).toHaveBeenCalledWith('claude', ['--print', buildPrompt('tool')], { input: '# tool\n' });
    });

    it('should report a missing converter command', async () => {
      vi.mocked(runCommand).mockRejectedValue(new CommandNotFoundError('claude'));

      await expect(converter.convert(REQUEST)).rejects.toThrow('Conversion failed: converter command not found: claude');
    });

    it('should carry the exit code and stderr of a failed run', async () => {
      vi.mocked(runCommand).mockResolvedValue({ stdout: '', stderr: 'rate limited\n', exitCode: 3 });

      const attempt = converter.convert(REQUEST);

      await expect(attempt).rejects.toBeInstanceOf(ConversionError);
      await expect(converter.convert(REQUEST)).rejects.toMatchObject({
        message: 'Conversion failed: claude exited with code 3',
        suggestions: ['rate limited'],
      });
    });

    it('should reject empty output', async () => {
      vi.mocked(runCommand).mockResolvedValue({ stdout: '\n', stderr: '', exitCode: 0 });

      await expect(converter.convert(REQUEST)).rejects.toThrow('Conversion failed: claude produced no output');
    });
  });

  describe('selectConverter', () => {
    const config = { strategy: 'command' as const, command: 'claude', args: ['--print'] };

    it('should use the configured command by default', () => {
      expect(selectConverter(config).name).toBe('claude');
    });

    it('should switch to the template converter on request', () => {
      expect(selectConverter(config, { template: true }).name).toBe('template');
      expect(selectConverter({ ...config, strategy: 'template' }).name).toBe('template');
    });
  });
});
