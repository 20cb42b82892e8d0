/**
 * Command Runner
 *
 * Spawns external tools (conda, pip) without a shell. By default the tool's
 * output is passed through to this process so its own diagnostics reach the
 * user; with `capture` the output is only buffered and returned.
 */

import { spawn } from 'child_process';
import { CommandError, errorMessage } from './bootstrap-errors';
import { debugLog } from '../shared/utils/debug-logger';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Buffer output instead of streaming it */
  capture?: boolean;
  /** Milliseconds; no timeout when omitted */
  timeout?: number;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Seam for running commands; tests substitute an in-process fake
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Render a command line for logs, quoting arguments that contain whitespace
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/\s/.test(part) || part === '' ? `"${part}"` : part))
    .join(' ');
}

/**
 * Run a command as a spawned process
 *
 * Resolves with the exit code (1 when the process was killed by a signal)
 * and rejects with CommandError when the process cannot be started.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    debugLog(`[CommandRunner] ${formatCommand(command, args)}`);

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeout,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (data: Buffer) => {
      const text = data.toString();
      stdout += text;
      if (!options.capture) {
        process.stdout.write(text);
      }
    });

    proc.stderr?.on('data', (data: Buffer) => {
      const text = data.toString();
      stderr += text;
      if (!options.capture) {
        process.stderr.write(text);
      }
    });

    proc.on('error', (err) => {
      reject(
        new CommandError(`Failed to run ${command}: ${errorMessage(err)}`, command, undefined, {
          cause: err,
        })
      );
    });

    proc.on('close', (code) => {
      debugLog(`[CommandRunner] ${command} exited with ${code ?? 'signal'}`);
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
};
