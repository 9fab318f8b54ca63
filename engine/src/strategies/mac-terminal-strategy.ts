/**
 * macOS terminal strategy
 *
 * Asks Terminal.app or iTerm2, whichever hosts this process, for a window
 * whose title names both the file and the editor.
 */

import { basename } from 'path';
import type { EnvironmentSnapshot, FocusResult, Logger, WindowHandle } from '@swapjump/core';
import { getErrorMessage } from '@swapjump/core';
import type { CommandRunner } from '../connection/command-runner.js';
import { WindowHandlePrefix, type MacTerminalApp } from '../connection/constants.js';
import { escapeAppleScriptString, parseAppleScriptIdList, runAppleScript } from '../connection/applescript.js';
import { buildMacHandle, parseWindowHandle } from '../connection/window-handle.js';
import { detectMacTerminalApp } from '../platform/probe.js';
import type { SessionStrategy, StrategyDeps, SwapTarget } from './types.js';

/**
 * AppleScript listing the ids of every window whose title contains both
 * strings. `contains` is case-insensitive in AppleScript.
 */
export function buildWindowQueryScript(app: MacTerminalApp, fileName: string, editorMarker: string): string {
  const name = escapeAppleScriptString(fileName);
  const marker = escapeAppleScriptString(editorMarker);
  return `tell application "${app}" to get id of every window whose name contains "${name}" and name contains "${marker}"`;
}

/**
 * AppleScript raising a window by id and activating its application.
 */
export function buildFocusScript(app: MacTerminalApp, windowId: string): string {
  return `
    tell application "${app}"
      set index of window id ${windowId} to 1
      activate
    end tell
  `;
}

export class MacTerminalStrategy implements SessionStrategy {
  readonly kind = 'mac-terminal' as const;
  private runner: CommandRunner;
  private environment: EnvironmentSnapshot;
  private editorMarker: string;
  private logger: Logger;

  constructor(deps: StrategyDeps) {
    this.runner = deps.runner;
    this.environment = deps.environment;
    this.editorMarker = deps.editorMarker;
    this.logger = deps.logger;
  }

  /**
   * When several windows match, the last one listed wins. Window order from
   * AppleScript is not guaranteed chronological; newer windows usually come last.
   */
  async locate(target: SwapTarget): Promise<WindowHandle | null> {
    const app = detectMacTerminalApp(this.environment);
    if (!app) {
      this.logger.log(`Unsupported terminal: ${this.environment.env.TERM_PROGRAM ?? '(unset)'}`);
      return null;
    }

    const script = buildWindowQueryScript(app, basename(target.filePath), this.editorMarker);
    let output: string;
    try {
      output = await runAppleScript(this.runner, script);
    } catch (err) {
      this.logger.log(`${app} window query failed: ${getErrorMessage(err)}`);
      return null;
    }

    const ids = parseAppleScriptIdList(output);
    const windowId = ids[ids.length - 1];
    return windowId ? buildMacHandle(app, windowId) : null;
  }

  async focus(handle: WindowHandle): Promise<FocusResult> {
    const parsed = parseWindowHandle(handle);
    if (!parsed || parsed.prefix !== WindowHandlePrefix.MAC) {
      return { success: false, kind: this.kind, error: `Not a macOS terminal handle: ${handle}` };
    }

    try {
      await runAppleScript(this.runner, buildFocusScript(parsed.app, parsed.windowId));
      return { success: true, kind: this.kind };
    } catch (err) {
      return { success: false, kind: this.kind, error: getErrorMessage(err) };
    }
  }
}
