/**
 * Command Execution Wrapper
 * 
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Error handling
 * - Signal forwarding
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
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Signature shared by `executeCommand` and test doubles
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 * 
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = (): void => {
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
      killTimer.unref();
    };

    // Handle timeout
    const timeoutId = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeout);

    // Handle abort signal
    const onAbort = (): void => terminate();
    signal?.addEventListener('abort', onAbort, { once: true });

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    const settle = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) {
        clearTimeout(killTimer);
      }
      signal?.removeEventListener('abort', onAbort);
    };

    // Handle process exit
    child.on('close', (code, exitSignal) => {
      settle();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      settle();
      reject(error);
    });
  });
}
