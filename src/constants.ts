import { join, dirname } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Read version from package.json at runtime
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJsonPath = join(__dirname, '..', 'package.json');
let VERSION_VALUE = '1.0.0'; // fallback
try {
  const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    VERSION_VALUE = pkg.version;
  }
} catch {
  // Fallback if package.json can't be read (e.g., bundled)
}
export const VERSION = VERSION_VALUE;
export const DESCRIPTION = 'Generate and install man pages from README files';
export const APP_NAME = 'manpage';

export const MAN_SECTION = '1';
export const MAN_EXTENSION = `.${MAN_SECTION}`;
export const INSTALLED_PAGE_MODE = 0o644;

export const SYSTEM_MAN_DIR = '/usr/local/share/man/man1';
// Relative to the home directory of the invoking user
export const USER_MAN_DIR = join('.local', 'share', 'man', 'man1');
export const USER_MAN_ROOT = join('.local', 'share', 'man');

/** README names tried in the target's directory, in order */
export const README_CANDIDATES = ['README.md', 'Readme.md', 'readme.md', 'README.markdown', 'README'];

/**
 * Canonical man page section order. AUTHOR and AUTHORS share a rank.
 */
export const SECTION_ORDER = [
  'NAME',
  'SYNOPSIS',
  'DESCRIPTION',
  'OPTIONS',
  'ARGUMENTS',
  'EXAMPLES',
  'EXIT STATUS',
  'RETURN VALUE',
  'ERRORS',
  'ENVIRONMENT',
  'FILES',
  'VERSIONS',
  'CONFORMING TO',
  'NOTES',
  'BUGS',
  'SEE ALSO',
  'HISTORY',
  'AUTHOR',
  'COPYRIGHT',
] as const;

export type CanonicalSection = (typeof SECTION_ORDER)[number];
export const SECTION_NAMES: readonly string[] = SECTION_ORDER;

export const MAX_LINE_LENGTH = 80;

export const DEFAULT_CONVERTER_COMMAND = 'claude';
export const DEFAULT_CONVERTER_ARGS = ['--print'];
export const DEFAULT_RENDERER_COMMAND = 'groff';
export const DEFAULT_RENDERER_ARGS = ['-t', '-man', '-Tascii'];
export const DEFAULT_RENDERER_WARNING_ARGS = ['-ww'];

/** Man database updaters, tried in order */
export const MAN_DB_UPDATERS = ['mandb', 'makewhatis'];
