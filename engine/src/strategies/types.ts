/**
 * Session strategy contract
 *
 * One implementation per platform kind. The strategy that locates a session
 * is the only one that can focus it.
 */

import type { EnvironmentSnapshot, FocusResult, Logger, PlatformKind, WindowHandle } from '@swapjump/core';
import type { CommandRunner } from '../connection/command-runner.js';

/** The file being opened and the lock marker the host found for it */
export interface SwapTarget {
  filePath: string;
  markerPath: string;
}

export interface SessionStrategy {
  readonly kind: PlatformKind;
  /** Find the window or pane already editing the file. Never throws for "not found". */
  locate(target: SwapTarget): Promise<WindowHandle | null>;
  /** Bring a window or pane found by `locate` to the front. Best effort. */
  focus(handle: WindowHandle): Promise<FocusResult>;
}

export interface StrategyDeps {
  runner: CommandRunner;
  environment: EnvironmentSnapshot;
  /** Title substring marking a window as an editor session */
  editorMarker: string;
  logger: Logger;
}
