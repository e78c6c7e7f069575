import { homedir } from 'node:os';
import type { Readable, Writable } from 'node:stream';
import { supportsColor, supportsColorStderr } from 'chalk';

/**
 * Process handles the commands use. Tests pass in-memory streams.
 */
export interface CliIO {
  stdout: Writable;
  stderr: Writable;
  stdin: Readable;
  cwd: string;
  homeDir: string;
  /** Both ends are terminals, so prompting makes sense. */
  interactive: boolean;
  color: { stdout: boolean; stderr: boolean };
  now?: () => Date;
}

export function createProcessIO(): CliIO {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    stdin: process.stdin,
    cwd: process.cwd(),
    homeDir: homedir(),
    interactive: Boolean(process.stdin.isTTY && process.stderr.isTTY),
    color: { stdout: supportsColor !== false, stderr: supportsColorStderr !== false },
  };
}
