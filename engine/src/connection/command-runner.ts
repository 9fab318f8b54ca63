/**
 * Command Runner
 *
 * One-shot spawn of an external tool with a bounded run time.
 * Every OS lookup and focus command goes through a CommandRunner so that
 * strategies can be exercised against canned output.
 *
 * @module connection/command-runner
 */

import { execFile as execFileCb } from 'child_process';
import { promisify } from 'util';
import { createLogger, getErrorCode, getErrorMessage, type Logger } from '@swapjump/core';
import { DEFAULT_COMMAND_TIMEOUT_MS } from './constants.js';

const execFileAsync = promisify(execFileCb);

/**
 * Run `file` with `args` (no shell) and resolve with its stdout.
 * Rejects with CommandFailedError on a non-zero exit, a timeout, or a missing binary.
 */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

export interface CommandRunnerOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/** Error thrown when an external command does not complete successfully */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly timedOut: boolean,
    public readonly missing: boolean,
  ) {
    super(message);
    this.name = 'CommandFailedError';
  }
}

export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].join(' ');
}

function toCommandFailedError(err: unknown, command: string, timeoutMs: number): CommandFailedError {
  const code = err && typeof err === 'object' && 'code' in err ? err.code : undefined;
  const exitCode = typeof code === 'number' ? code : null;
  const killed = err && typeof err === 'object' && 'killed' in err ? err.killed === true : false;

  if (getErrorCode(err) === 'ENOENT') {
    return new CommandFailedError(`${command}: command not found`, command, null, false, true);
  }
  if (killed && exitCode === null) {
    return new CommandFailedError(`${command}: timed out after ${timeoutMs}ms`, command, null, true, false);
  }
  return new CommandFailedError(`${command}: ${getErrorMessage(err).trim()}`, command, exitCode, false, false);
}

/**
 * Create a CommandRunner backed by child_process.execFile.
 */
export function createCommandRunner(options: CommandRunnerOptions = {}): CommandRunner {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const logger = options.logger ?? createLogger({ silent: true });

  return async (file, args) => {
    const command = formatCommand(file, args);
    try {
      const { stdout } = await execFileAsync(file, [...args], {
        timeout: timeoutMs,
        encoding: 'utf8',
        windowsHide: true,
      });
      return stdout;
    } catch (err) {
      const failure = toCommandFailedError(err, command, timeoutMs);
      logger.log(failure.message);
      throw failure;
    }
  };
}
