/**
 * Window Focuser
 *
 * Raises the window or pane behind a located session. Best effort: the
 * outcome of the open attempt is already decided, so failures are reported
 * and never thrown.
 */

import type { EnvironmentSnapshot, FocusResult, Logger, PlatformKind, WindowHandle } from '@swapjump/core';
import { createLogger, getErrorMessage } from '@swapjump/core';
import type { CommandRunner } from './connection/command-runner.js';
import { DEFAULT_EDITOR_MARKER } from './connection/constants.js';
import { handleBelongsTo } from './connection/window-handle.js';
import { readEnvironment } from './platform/probe.js';
import { createStrategy } from './strategies/index.js';

export interface WindowFocuserOptions {
  runner: CommandRunner;
  editorMarker?: string;
  environment?: () => EnvironmentSnapshot;
  logger?: Logger;
}

export class WindowFocuser {
  private runner: CommandRunner;
  private editorMarker: string;
  private environment: () => EnvironmentSnapshot;
  private logger: Logger;

  constructor(options: WindowFocuserOptions) {
    this.runner = options.runner;
    this.editorMarker = options.editorMarker ?? DEFAULT_EDITOR_MARKER;
    this.environment = options.environment ?? readEnvironment;
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  /**
   * Focus `handle` with the strategy for `kind`. A handle produced by a
   * different strategy is refused without running anything.
   */
  async focus(handle: WindowHandle, kind: PlatformKind): Promise<FocusResult> {
    if (!handleBelongsTo(handle, kind)) {
      return { success: false, kind, error: `Handle does not belong to ${kind}: ${handle}` };
    }

    const strategy = createStrategy(kind, {
      runner: this.runner,
      environment: this.environment(),
      editorMarker: this.editorMarker,
      logger: this.logger,
    });

    let result: FocusResult;
    try {
      result = await strategy.focus(handle);
    } catch (err) {
      result = { success: false, kind, error: getErrorMessage(err) };
    }

    if (!result.success) {
      this.logger.warn(`Could not focus ${handle}: ${result.error ?? 'unknown error'}`);
    }
    return result;
  }
}
