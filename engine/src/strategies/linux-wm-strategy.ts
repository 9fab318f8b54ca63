/**
 * Linux window manager strategy
 *
 * Lists top-level windows with wmctrl and picks the one whose title names
 * both the file and the editor.
 */

import { basename } from 'path';
import type { FocusResult, Logger, WindowHandle } from '@swapjump/core';
import { getErrorMessage } from '@swapjump/core';
import type { CommandRunner } from '../connection/command-runner.js';
import { WMCTRL_COMMAND, WindowHandlePrefix } from '../connection/constants.js';
import { buildX11Handle, parseWindowHandle } from '../connection/window-handle.js';
import type { SessionStrategy, StrategyDeps, SwapTarget } from './types.js';

export interface ManagedWindow {
  windowId: string;
  desktop: number;
  host: string;
  title: string;
}

// 0x04400006  0 myhost vim notes.md
const WINDOW_LINE = /^(0x[0-9a-f]+)\s+(-?\d+)\s+(\S+)(?:\s+(.*))?$/i;

/**
 * Parse `wmctrl -l` output.
 */
export function parseWindowList(output: string): ManagedWindow[] {
  const windows: ManagedWindow[] = [];
  for (const line of output.split('\n')) {
    const match = WINDOW_LINE.exec(line.trimEnd());
    if (!match) continue;
    const [, windowId = '', desktop = '0', host = '', title = ''] = match;
    windows.push({ windowId, desktop: parseInt(desktop, 10), host, title });
  }
  return windows;
}

/**
 * Windows whose title contains both the file name and the editor marker,
 * ignoring case, in listing order.
 */
export function findEditorWindows(
  windows: readonly ManagedWindow[],
  fileName: string,
  editorMarker: string,
): ManagedWindow[] {
  const name = fileName.toLowerCase();
  const marker = editorMarker.toLowerCase();
  return windows.filter((w) => {
    const title = w.title.toLowerCase();
    return title.includes(name) && title.includes(marker);
  });
}

export class LinuxWindowManagerStrategy implements SessionStrategy {
  readonly kind = 'linux-wm' as const;
  private runner: CommandRunner;
  private editorMarker: string;
  private logger: Logger;

  constructor(deps: StrategyDeps) {
    this.runner = deps.runner;
    this.editorMarker = deps.editorMarker;
    this.logger = deps.logger;
  }

  /**
   * Last match wins: wmctrl lists windows in stacking or creation order,
   * which usually puts the newest session last. Not guaranteed.
   */
  async locate(target: SwapTarget): Promise<WindowHandle | null> {
    let output: string;
    try {
      output = await this.runner(WMCTRL_COMMAND, ['-l']);
    } catch (err) {
      this.logger.log(`Could not list windows: ${getErrorMessage(err)}`);
      return null;
    }

    const matches = findEditorWindows(parseWindowList(output), basename(target.filePath), this.editorMarker);
    const window = matches[matches.length - 1];
    return window ? buildX11Handle(window.windowId) : null;
  }

  async focus(handle: WindowHandle): Promise<FocusResult> {
    const parsed = parseWindowHandle(handle);
    if (!parsed || parsed.prefix !== WindowHandlePrefix.X11) {
      return { success: false, kind: this.kind, error: `Not a window manager handle: ${handle}` };
    }

    try {
      await this.runner(WMCTRL_COMMAND, ['-i', '-a', parsed.windowId]);
      return { success: true, kind: this.kind };
    } catch (err) {
      return { success: false, kind: this.kind, error: getErrorMessage(err) };
    }
  }
}
