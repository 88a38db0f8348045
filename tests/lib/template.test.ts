import { describe, it, expect } from 'vitest';
import {
  createTemplateConverter,
  escapeTroff,
  formatManDate,
  outlineReadme,
  renderBlocks,
  renderInline,
  renderManPage,
  summarize,
  toCanonicalSection,
} from '../../src/lib/template.js';
import { checkSectionOrder, validateStructure } from '../../src/lib/validator.js';

const DATE = new Date(2026, 9, 19);

const README = [
  '# tool',
  '',
  'tool - format widgets for the terminal. It is fast.',
  '',
  '## Installation',
  '',
  'Run `make install`.',
  '',
  '## Usage',
  '',
  '```sh',
  'tool [-v] <file>',
  '```',
  '',
  '## Options',
  '',
  '| Flag | Description |',
  '|------|-------------|',
  '| `-v` | Verbose output |',
  '',
  '## License',
  '',
  'MIT',
  '',
].join('\n');

describe('template converter', () => {
  describe('toCanonicalSection', () => {
    it('should map README headings to man sections', () => {
      expect(toCanonicalSection('Usage')).toBe('SYNOPSIS');
      expect(toCanonicalSection('See  Also')).toBe('SEE ALSO');
      expect(toCanonicalSection('Authors')).toBe('AUTHOR');
      expect(toCanonicalSection('License')).toBe('COPYRIGHT');
    });

    it('should leave unknown headings unmapped', () => {
      expect(toCanonicalSection('Installation')).toBeUndefined();
    });
  });

  describe('inline markup', () => {
    it('should escape hyphens and backslashes', () => {
      expect(escapeTroff('a-b\\c')).toBe('a\\-b\\ec');
    });

    it('should turn emphasis into font changes and drop link targets', () => {
      expect(renderInline('Use **bold** and *italic* with [docs](https://example.com)')).toBe(
        'Use \\fBbold\\fR and \\fIitalic\\fR with docs'
      );
    });

    it('should render code spans in bold without touching their contents', () => {
      expect(renderInline('Run `tool --fast`')).toBe('Run \\fBtool \\-\\-fast\\fR');
    });
  });

  describe('renderBlocks', () => {
    it('should protect lines that start with a control character', () => {
      expect(renderBlocks(['.hidden line'])).toEqual(['.PP', '\\&.hidden line']);
    });

    it('should render bullet and numbered lists', () => {
      expect(renderBlocks(['- one', '2. two'])).toEqual(['.IP \\(bu 2', 'one', '.IP 2. 4', 'two']);
    });

    it('should close an unterminated code block', () => {
      expect(renderBlocks(['```', 'echo hi'])).toEqual(['.PP', '.RS 4', '.nf', 'echo hi', '.fi', '.RE']);
    });

    it('should skip raw HTML lines', () => {
      expect(renderBlocks(['<p align="center">', 'text'])).toEqual(['.PP', 'text']);
    });
  });

  describe('summarize', () => {
    it('should prefer the NAME section', () => {
      const outline = outlineReadme('# tool\n\nA longer intro.\n\n## Name\n\ntool - does things\n');
      expect(summarize('tool', outline)).toBe('does things');
    });

    it('should fall back to a generic summary', () => {
      expect(summarize('tool', outlineReadme(''))).toBe('manual page for tool');
    });
  });

  describe('renderManPage', () => {
    it('should lay out a README as a man page in canonical order', () => {
      expect(renderManPage('tool', README, { date: DATE }).split('\n')).toEqual([
        '.TH TOOL 1 "October 2026" "tool" "User Commands"',
        '.SH NAME',
        'tool \\- format widgets for the terminal',
        '.SH SYNOPSIS',
        '.PP',
        '.RS 4',
        '.nf',
        'tool [\\-v] <file>',
        '.fi',
        '.RE',
        '.SH DESCRIPTION',
        '.PP',
        'tool \\- format widgets for the terminal. It is fast.',
        '.SS Installation',
        '.PP',
        'Run \\fBmake install\\fR.',
        '.SH OPTIONS',
        '.TP',
        '\\fB\\-v\\fR',
        'Verbose output',
        '.SH COPYRIGHT',
        '.PP',
        'MIT',
        '',
      ]);
    });

    it('should produce a valid page from an empty README', () => {
      const content = renderManPage('tool', '', { date: DATE });

      expect(content).toBe(
        [
          '.TH TOOL 1 "October 2026" "tool" "User Commands"',
          '.SH NAME',
          'tool \\- manual page for tool',
          '.SH SYNOPSIS',
          '.B tool',
          '[\\fIoptions\\fR]',
          '.SH DESCRIPTION',
          'manual page for tool.',
          '',
        ].join('\n')
      );
      expect(validateStructure({ name: 'tool.1', content }).issues).toEqual([]);
    });

    it('should quote names with spaces', () => {
      const lines = renderManPage('my cmd', '', { date: DATE, version: '1.2.3' }).split('\n');

      expect(lines[0]).toBe('.TH "MY CMD" 1 "October 2026" "my cmd 1.2.3" "User Commands"');
      expect(lines[4]).toBe('.B "my cmd"');
    });

    it('should emit sections that pass the order check', () => {
      const content = renderManPage('tool', README, { date: DATE });
      expect(checkSectionOrder({ name: 'tool.1', content })).toEqual([]);
    });
  });

  describe('createTemplateConverter', () => {
    it('should convert through renderManPage', async () => {
      const converter = createTemplateConverter({ date: DATE });

      expect(converter.name).toBe('template');
      await expect(
        converter.convert({ commandName: 'tool', readmeText: README, readmePath: '/work/README.md' })
      ).resolves.toBe(renderManPage('tool', README, { date: DATE }));
    });
  });

  it('should format dates as month and year', () => {
    expect(formatManDate(new Date(2026, 0, 5))).toBe('January 2026');
  });
});
