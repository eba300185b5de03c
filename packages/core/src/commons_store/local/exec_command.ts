import { execFile } from 'child_process';
import { promisify } from 'util';

import type { ExecCommand, ExecOptions, ExecResult } from './local_commons_store.types';

const execFileAsync = promisify(execFile);

function field(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Default ExecCommand: runs the binary without a shell and reports a
 * non-zero exit in the result instead of throwing.
 */
export const execFileCommand: ExecCommand = async (
  command: string,
  args: string[],
  options?: ExecOptions
): Promise<ExecResult> => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeout,
      maxBuffer: 64 * 1024 * 1024,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    if (typeof error !== 'object' || error === null) {
      return { exitCode: 1, stdout: '', stderr: String(error) };
    }
    const code = field(error, 'code');
    const stdout = field(error, 'stdout');
    const stderr = field(error, 'stderr');
    const message = error instanceof Error ? error.message : '';
    return {
      exitCode: typeof code === 'number' && code !== 0 ? code : 1,
      stdout: typeof stdout === 'string' ? stdout : '',
      stderr: typeof stderr === 'string' && stderr !== '' ? stderr : message,
    };
  }
};
