/**
 * Shared setup for CLI commands: effective settings, logger and the
 * process-facing inputs each command reads.
 */

import {
  createLogger,
  loadSettings,
  type EnvironmentSnapshot,
  type Logger,
  type SwapjumpSettings,
} from "@swapjump/core";
import { readEnvironment, type CommandRunner } from "@swapjump/engine";

export interface CommonOptions {
  tmux?: boolean;
  verbose?: boolean;
  config?: string;
}

/**
 * Where a command reads its inputs and writes its output. Tests swap these out.
 */
export interface CommandIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
  environment: () => EnvironmentSnapshot;
  /** Defaults to the real, timeout-bounded runner */
  runner?: CommandRunner;
}

export interface CommandContext {
  settings: SwapjumpSettings;
  logger: Logger;
}

export function defaultIo(): CommandIo {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    environment: readEnvironment,
  };
}

/**
 * Resolve settings (config file, environment, then flags) and a logger that
 * stays off stdout.
 */
export function createCommandContext(options: CommonOptions, io: CommandIo): CommandContext {
  const settings = loadSettings({ path: options.config, env: io.env });
  if (options.tmux) settings.tmux = true;
  if (options.verbose) settings.verbose = true;

  const logger = createLogger({ silent: !settings.verbose, prefix: "[swapjump]", stderr: true });
  return { settings, logger };
}
