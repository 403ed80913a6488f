import { execa, ExecaError } from 'execa';
import { join } from 'shlex';
import { SpawnError } from './errors.js';
import type { CommandLine } from '../types.js';

/** The execa summary followed by whatever the subprocess wrote to stderr. */
export function describeFailure(error: ExecaError): string {
  const stderr = typeof error.stderr === 'string' ? error.stderr.trim() : '';
  return stderr ? `${error.shortMessage}\n${stderr}` : error.shortMessage;
}

export function formatCommandLine(cmd: CommandLine): string {
  return join([cmd.program, ...cmd.args]);
}

/**
 * Run `cmd` with the caller's stdio and resolve to its exit code. Only a
 * failure to start the program is thrown.
 */
export async function runCommandLine(cmd: CommandLine, cwd: string): Promise<number> {
  try {
    const result = await execa(cmd.program, cmd.args, { cwd, stdio: 'inherit' });
    return result.exitCode ?? 0;
  } catch (error) {
    if (!(error instanceof ExecaError)) throw error;
    if (error.exitCode !== undefined) return error.exitCode;
    if (error.signal !== undefined) {
      console.warn(`${cmd.program} was terminated by ${error.signal}`);
      return 1;
    }
    throw new SpawnError(cmd.program, error.code ?? error.shortMessage, { code: error.code });
  }
}
