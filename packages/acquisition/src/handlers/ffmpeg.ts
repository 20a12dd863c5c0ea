/**
 * FFmpeg Remuxer
 *
 * Stream-copy only: segments are joined into one container, never
 * re-encoded.
 */

import { CommandExecutionError } from '@mediastage/core';
import {
  createLogger,
  errorMessage,
  type CommandResult,
  type CommandRunner,
} from '@mediastage/utils';

const log = createLogger({ component: 'ffmpeg' });

export interface RemuxerOptions {
  ffmpegPath: string;
  timeoutMs: number;
}

export class Remuxer {
  constructor(
    private readonly runCommand: CommandRunner,
    private readonly options: RemuxerOptions
  ) {}

  /**
   * Run ffmpeg with `-y` prepended
   *
   * @throws CommandExecutionError on spawn failure or non-zero exit
   */
  async execute(args: string[], options: { cwd?: string; signal?: AbortSignal } = {}): Promise<void> {
    const fullArgs = ['-y', '-loglevel', 'error', ...args];

    let result: CommandResult;
    try {
      result = await this.runCommand(this.options.ffmpegPath, fullArgs, {
        timeout: this.options.timeoutMs,
        cwd: options.cwd,
        signal: options.signal,
      });
    } catch (error) {
      throw new CommandExecutionError(this.options.ffmpegPath, -1, errorMessage(error));
    }

    if (result.exitCode !== 0) {
      log.warn({ exitCode: result.exitCode, timedOut: result.timedOut, stderr: result.stderr.slice(0, 500) }, 'ffmpeg failed');
      throw new CommandExecutionError(this.options.ffmpegPath, result.exitCode, result.stderr);
    }
  }

  /**
   * Join the files named in a concat list (`file '...'` lines)
   */
  buildConcatCommand(listFile: string, outputFile: string): string[] {
    return ['-f', 'concat', '-safe', '0', '-i', listFile, '-c', 'copy', outputFile];
  }

  /**
   * Read a remote playlist directly (used for encrypted streams)
   */
  buildStreamCopyCommand(
    inputUrl: string,
    outputFile: string,
    request: { headers?: Record<string, string>; proxy?: string } = {}
  ): string[] {
    const args: string[] = [];

    const headerLines = Object.entries(request.headers ?? {}).map(([name, value]) => `${name}: ${value}\r\n`);
    if (headerLines.length > 0) {
      args.push('-headers', headerLines.join(''));
    }
    if (request.proxy) {
      args.push('-http_proxy', request.proxy);
    }

    args.push('-i', inputUrl, '-c', 'copy', outputFile);
    return args;
  }
}

/**
 * Body of an ffmpeg concat list
 */
export function buildConcatList(fileNames: readonly string[]): string {
  return fileNames.map((name) => `file '${name.replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}
