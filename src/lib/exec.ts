import { execFile } from 'child_process';
import { promisify } from 'util';
import { CommandNotFoundError } from '../errors.js';

const execFileAsync = promisify(execFile);

// Converter output for a long README can be large
const MAX_BUFFER = 16 * 1024 * 1024;

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  /** Written to the child's stdin, which is then closed */
  input?: string;
  cwd?: string;
}

const readField = (error: object, key: string): unknown => {
  return key in error ? Reflect.get(error, key) : undefined;
};

const asText = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return '';
};

/**
 * Run a command without a shell and collect its output. A non-zero exit is
 * returned, not thrown; a command that cannot be spawned is thrown as
 * CommandNotFoundError.
 */
export const runCommand = async (
  command: string,
  args: string[],
  options: ExecOptions = {}
): Promise<ExecResult> => {
  const pending = execFileAsync(command, args, {
    cwd: options.cwd,
    encoding: 'utf-8',
    maxBuffer: MAX_BUFFER,
  });
  pending.child.stdin?.on('error', () => {
    // EPIPE when the child exits before reading its input; the exit status reports the failure
  });
  pending.child.stdin?.end(options.input ?? '');

  try {
    const { stdout, stderr } = await pending;
    return { stdout, stderr, exitCode: 0 };
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }

    const code = readField(error, 'code');
    if (code === 'ENOENT' || code === 'EACCES') {
      throw new CommandNotFoundError(command);
    }
    if (typeof code === 'number' || readField(error, 'signal')) {
      return {
        stdout: asText(readField(error, 'stdout')),
        stderr: asText(readField(error, 'stderr')),
        exitCode: typeof code === 'number' ? code : 1,
      };
    }
    throw error;
  }
};

