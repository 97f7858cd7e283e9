/**
 * Command Execution Wrapper
 * 
 * Runs external commands without a shell, with:
 * - Optional hard timeout (SIGTERM, then SIGKILL)
 * - Bounded output capture (keeps the tail)
 * - Spawn error propagation
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  /** Milliseconds. 0 disables the timeout. */
  timeout?: number;
  /** Characters kept per stream; older output is dropped first */
  maxOutputSize?: number;
  /** When false, stdout is not piped at all */
  captureStdout?: boolean;
}

/**
 * Signature shared by every command runner, so callers can swap
 * in a fake runner without spawning anything.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

const KILL_GRACE_MS = 10000;

function appendBounded(buffer: string, chunk: string, limit: number): string {
  const next = buffer + chunk;
  return next.length > limit ? next.slice(next.length - limit) : next;
}

/**
 * Execute an external command
 * 
 * Resolves with the exit code once the process closes. Rejects only
 * when the process could not be spawned (e.g. ENOENT).
 */
export const executeCommand: CommandRunner = async (command, args, options = {}) => {
  const {
    timeout = 300000, // 5 minutes default
    maxOutputSize = 1024 * 1024,
    captureStdout = true,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      stdio: ['ignore', captureStdout ? 'pipe' : 'ignore', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let killTimer: NodeJS.Timeout | undefined;

    // Handle timeout
    const timeoutId = timeout > 0
      ? setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
      }, timeout)
      : undefined;

    const finish = () => {
      if (timeoutId) clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
    };

    // Decode as a stream so multibyte characters split across chunks survive
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (data: string) => {
      stdout = appendBounded(stdout, data, maxOutputSize);
    });

    child.stderr?.on('data', (data: string) => {
      stderr = appendBounded(stderr, data, maxOutputSize);
    });

    child.on('close', (code, exitSignal) => {
      finish();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      finish();
      reject(error);
    });
  });
};
