/**
 * Active Session Locator
 *
 * Finds the terminal window or pane of an editor session that already has
 * a file open. The platform is probed afresh on every call, since the
 * environment can change between events (attaching to tmux, for one).
 */

import type { EnvironmentSnapshot, LocatedSession, Logger } from '@swapjump/core';
import { createLogger, getErrorMessage } from '@swapjump/core';
import type { CommandRunner } from './connection/command-runner.js';
import { DEFAULT_EDITOR_MARKER } from './connection/constants.js';
import { handleBelongsTo } from './connection/window-handle.js';
import { probePlatform, readEnvironment } from './platform/probe.js';
import { createStrategy } from './strategies/index.js';

export interface SessionLocatorOptions {
  runner: CommandRunner;
  /** Multiplexer-aware detection */
  tmux: boolean;
  editorMarker?: string;
  /** Environment source, read once per call */
  environment?: () => EnvironmentSnapshot;
  logger?: Logger;
}

export class ActiveSessionLocator {
  private runner: CommandRunner;
  private tmux: boolean;
  private editorMarker: string;
  private environment: () => EnvironmentSnapshot;
  private logger: Logger;

  constructor(options: SessionLocatorOptions) {
    this.runner = options.runner;
    this.tmux = options.tmux;
    this.editorMarker = options.editorMarker ?? DEFAULT_EDITOR_MARKER;
    this.environment = options.environment ?? readEnvironment;
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  /**
   * Locate the session holding `filePath` open.
   *
   * @returns The owning platform kind and a non-empty handle, or null when
   *   nothing was found, the environment is unsupported, or a lookup failed.
   */
  async locate(filePath: string, lockMarkerPath: string): Promise<LocatedSession | null> {
    const environment = this.environment();
    const kind = probePlatform(environment, { tmux: this.tmux });
    const strategy = createStrategy(kind, {
      runner: this.runner,
      environment,
      editorMarker: this.editorMarker,
      logger: this.logger,
    });

    this.logger.log(`Looking for ${filePath} (${kind})`);

    let handle: string | null;
    try {
      handle = await strategy.locate({ filePath, markerPath: lockMarkerPath });
    } catch (err) {
      this.logger.warn(`Session lookup failed: ${getErrorMessage(err)}`);
      return null;
    }

    if (!handle) {
      this.logger.log('No active session found');
      return null;
    }
    if (!handleBelongsTo(handle, kind)) {
      this.logger.warn(`Discarding handle not produced by the ${kind} strategy: ${handle}`);
      return null;
    }

    this.logger.log(`Found session ${handle}`);
    return { kind, handle };
  }
}
