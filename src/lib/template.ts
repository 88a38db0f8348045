import { MAN_SECTION, SECTION_NAMES, SECTION_ORDER, type CanonicalSection } from '../constants.js';
import type { Converter, ConversionRequest } from './converter.js';

/**
 * Deterministic README-to-man converter. No external tools; the output always
 * carries a title header and NAME, SYNOPSIS and DESCRIPTION in canonical order.
 */

export interface TemplateConverterOptions {
  date?: Date;
  version?: string;
  manual?: string;
}

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const HEADING_ALIASES: Record<string, CanonicalSection> = {
  USAGE: 'SYNOPSIS',
  OVERVIEW: 'DESCRIPTION',
  ABOUT: 'DESCRIPTION',
  FLAGS: 'OPTIONS',
  'COMMAND LINE OPTIONS': 'OPTIONS',
  EXAMPLE: 'EXAMPLES',
  'EXIT CODES': 'EXIT STATUS',
  'ENVIRONMENT VARIABLES': 'ENVIRONMENT',
  'KNOWN ISSUES': 'BUGS',
  AUTHORS: 'AUTHOR',
  LICENSE: 'COPYRIGHT',
  LICENCE: 'COPYRIGHT',
};

const isCanonical = (heading: string): heading is CanonicalSection => {
  return SECTION_NAMES.includes(heading);
};

export const toCanonicalSection = (heading: string): CanonicalSection | undefined => {
  const key = heading.toUpperCase().replace(/\s+/g, ' ').trim();
  return isCanonical(key) ? key : HEADING_ALIASES[key];
};

// ─────────────────────────────────────────────────────────────────────────────
// Escaping and inline markup
// ─────────────────────────────────────────────────────────────────────────────

export const escapeTroff = (text: string): string => {
  return text.replace(/\\/g, '\\e').replace(/-/g, '\\-');
};

/** Keep control characters at the start of a line from being read as requests */
const protectLine = (line: string): string => {
  return /^[.']/.test(line) ? `\\&${line}` : line;
};

export const stripMarkdown = (text: string): string => {
  return text
    .replace(/!\[[^\]]*\]\([^)]*\)/g, '')
    .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
    .replace(/`([^`]+)`/g, '$1')
    .replace(/(\*\*|__)(.+?)\1/g, '$2')
    .replace(/(^|[^\w*])\*([^*\s][^*]*?)\*(?!\w)/g, '$1$2')
    .replace(/(^|[^\w])_([^_\s][^_]*?)_(?!\w)/g, '$1$2')
    .trim();
};

export const renderInline = (text: string): string => {
  const codeSpans: string[] = [];
  const withoutCode = text
    .replace(/!\[[^\]]*\]\([^)]*\)/g, '')
    .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
    .replace(/`([^`]+)`/g, (_match, code: string) => {
      codeSpans.push(code);
      return `\u0000${codeSpans.length - 1}\u0000`;
    });

  const marked = escapeTroff(withoutCode)
    .replace(/(\*\*|__)(.+?)\1/g, '\\fB$2\\fR')
    .replace(/(^|[^\w*])\*([^*\s][^*]*?)\*(?!\w)/g, '$1\\fI$2\\fR')
    .replace(/(^|[^\w])_([^_\s][^_]*?)_(?!\w)/g, '$1\\fI$2\\fR');

  return marked.replace(/\u0000(\d+)\u0000/g, (_match, index: string) => {
    return `\\fB${escapeTroff(codeSpans[Number(index)] ?? '')}\\fR`;
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Block rendering
// ─────────────────────────────────────────────────────────────────────────────

const FENCE = /^\s*(```|~~~)/;
const HEADING = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const BULLET = /^\s*[-*+]\s+(.*)$/;
const NUMBERED = /^\s*(\d+)[.)]\s+(.*)$/;
const TABLE_ROW = /^\s*\|(.*)\|\s*$/;
const TABLE_SEPARATOR = /^\s*\|?\s*:?-{3,}:?\s*(\|\s*:?-{3,}:?\s*)*\|?\s*$/;

const splitRow = (row: string): string[] => {
  return row.split('|').map((cell) => cell.trim());
};

/**
 * Render markdown body lines (no level-1/2 headings) as man macros.
 */
export const renderBlocks = (lines: string[]): string[] => {
  const out: string[] = [];
  let paragraph: string[] = [];
  let inCode = false;

  const flush = (): void => {
    if (paragraph.length === 0) return;
    out.push('.PP');
    for (const line of paragraph) {
      out.push(protectLine(renderInline(line)));
    }
    paragraph = [];
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (FENCE.test(line)) {
      flush();
      if (inCode) {
        out.push('.fi', '.RE');
      } else {
        out.push('.PP', '.RS 4', '.nf');
      }
      inCode = !inCode;
      continue;
    }

    if (inCode) {
      out.push(protectLine(escapeTroff(line)));
      continue;
    }

    if (line.trim().length === 0) {
      flush();
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      flush();
      out.push(`.SS ${escapeTroff(stripMarkdown(heading[2]))}`);
      continue;
    }

    const tableRow = TABLE_ROW.exec(line);
    if (tableRow) {
      flush();
      if (TABLE_SEPARATOR.test(line)) continue;
      // Header rows sit directly above the separator
      if (i + 1 < lines.length && TABLE_SEPARATOR.test(lines[i + 1])) continue;
      const [first, ...rest] = splitRow(tableRow[1]);
      out.push('.TP', `\\fB${escapeTroff(stripMarkdown(first))}\\fR`);
      out.push(protectLine(renderInline(rest.join(' '))));
      continue;
    }

    const bullet = BULLET.exec(line);
    if (bullet) {
      flush();
      out.push('.IP \\(bu 2', protectLine(renderInline(bullet[1])));
      continue;
    }

    const numbered = NUMBERED.exec(line);
    if (numbered) {
      flush();
      out.push(`.IP ${numbered[1]}. 4`, protectLine(renderInline(numbered[2])));
      continue;
    }

    if (/^\s*</.test(line)) {
      // Raw HTML (badges, alignment wrappers) has no man equivalent
      continue;
    }

    paragraph.push(line.replace(/^\s*>\s?/, '').trim());
  }

  flush();
  if (inCode) {
    out.push('.fi', '.RE');
  }
  return out;
};

// ─────────────────────────────────────────────────────────────────────────────
// README structure
// ─────────────────────────────────────────────────────────────────────────────

interface ReadmeOutline {
  title?: string;
  preamble: string[];
  sections: Map<CanonicalSection, string[]>;
  /** Level-2 headings with no canonical home, kept in README order */
  extras: { heading: string; lines: string[] }[];
}

export const outlineReadme = (markdown: string): ReadmeOutline => {
  const outline: ReadmeOutline = { preamble: [], sections: new Map(), extras: [] };
  let current: string[] = outline.preamble;
  let inCode = false;

  for (const line of markdown.replace(/\r\n/g, '\n').split('\n')) {
    if (FENCE.test(line)) {
      inCode = !inCode;
      current.push(line);
      continue;
    }

    const heading = inCode ? null : HEADING.exec(line);
    if (!heading || heading[1].length > 2) {
      current.push(line);
      continue;
    }

    const text = stripMarkdown(heading[2]);
    if (heading[1].length === 1 && outline.title === undefined) {
      outline.title = text;
      continue;
    }

    const canonical = toCanonicalSection(text);
    if (canonical) {
      const existing = outline.sections.get(canonical);
      current = existing ?? [];
      if (!existing) outline.sections.set(canonical, current);
      continue;
    }

    const extra: { heading: string; lines: string[] } = { heading: text, lines: [] };
    outline.extras.push(extra);
    current = extra.lines;
  }

  return outline;
};

const firstParagraph = (lines: string[]): string | undefined => {
  const collected: string[] = [];
  let inCode = false;
  for (const line of lines) {
    if (FENCE.test(line)) {
      inCode = !inCode;
      if (collected.length > 0) break;
      continue;
    }
    if (inCode) continue;
    const trimmed = line.trim();
    const isProse =
      trimmed.length > 0 &&
      !trimmed.startsWith('<') &&
      !BULLET.test(trimmed) &&
      !TABLE_ROW.test(trimmed) &&
      stripMarkdown(trimmed).length > 0;
    if (isProse) {
      collected.push(trimmed.replace(/^>\s?/, ''));
    } else if (collected.length > 0) {
      break;
    }
  }
  return collected.length > 0 ? stripMarkdown(collected.join(' ')) : undefined;
};

export const summarize = (commandName: string, outline: ReadmeOutline): string => {
  const named = outline.sections.get('NAME');
  const source = (named && firstParagraph(named)) ?? firstParagraph(outline.preamble);
  if (!source) {
    return outline.title && outline.title !== commandName ? outline.title : `manual page for ${commandName}`;
  }

  const withoutName = source.replace(new RegExp(`^${escapeRegExp(commandName)}\\s+-+\\s+`), '');
  const sentence = withoutName.split(/(?<=[.!?])\s/)[0] ?? withoutName;
  return sentence.replace(/[.!?]+$/, '');
};

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const quoteArgument = (value: string): string => {
  return /\s/.test(value) ? `"${value.replace(/"/g, '\\(dq')}"` : value;
};

export const formatManDate = (date: Date): string => {
  return `${MONTHS[date.getMonth()]} ${date.getFullYear()}`;
};

export const renderManPage = (
  commandName: string,
  markdown: string,
  options: TemplateConverterOptions = {}
): string => {
  const outline = outlineReadme(markdown);
  const date = formatManDate(options.date ?? new Date());
  const source = options.version ? `${commandName} ${options.version}` : commandName;
  const manual = options.manual ?? 'User Commands';
  const name = escapeTroff(commandName);

  const lines: string[] = [
    `.TH ${quoteArgument(commandName.toUpperCase())} ${MAN_SECTION} "${date}" "${source}" "${manual}"`,
    '.SH NAME',
    `${name} \\- ${escapeTroff(summarize(commandName, outline))}`,
    '.SH SYNOPSIS',
  ];

  const synopsis = outline.sections.get('SYNOPSIS');
  const synopsisBody = synopsis ? renderBlocks(synopsis) : [];
  if (synopsisBody.length > 0) {
    lines.push(...synopsisBody);
  } else {
    lines.push(`.B ${quoteArgument(name)}`, '[\\fIoptions\\fR]');
  }

  lines.push('.SH DESCRIPTION');
  const description = [
    ...renderBlocks(outline.preamble),
    ...renderBlocks(outline.sections.get('DESCRIPTION') ?? []),
  ];
  for (const extra of outline.extras) {
    const body = renderBlocks(extra.lines);
    if (body.length > 0) {
      description.push(`.SS ${escapeTroff(extra.heading)}`, ...body);
    }
  }
  if (description.length === 0) {
    description.push(escapeTroff(summarize(commandName, outline)) + '.');
  }
  lines.push(...description);

  for (const section of SECTION_ORDER) {
    if (section === 'NAME' || section === 'SYNOPSIS' || section === 'DESCRIPTION') continue;
    const body = renderBlocks(outline.sections.get(section) ?? []);
    if (body.length > 0) {
      lines.push(`.SH ${section}`, ...body);
    }
  }

  return lines.join('\n') + '\n';
};

export const createTemplateConverter = (options: TemplateConverterOptions = {}): Converter => ({
  name: 'template',
  convert: async ({ commandName, readmeText }: ConversionRequest) => {
    return renderManPage(commandName, readmeText, options);
  },
});
