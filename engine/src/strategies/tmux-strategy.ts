/**
 * tmux strategy
 *
 * lock marker → holding process → controlling tty → pane with that tty.
 */

import type { FocusResult, Logger, WindowHandle } from '@swapjump/core';
import { getErrorMessage } from '@swapjump/core';
import type { CommandRunner } from '../connection/command-runner.js';
import { TMUX_COMMAND, WindowHandlePrefix } from '../connection/constants.js';
import { findProcessesHoldingFile, getControllingTty } from '../connection/process-detection.js';
import {
  buildTmuxHandle,
  parseTmuxPaneLine,
  parseWindowHandle,
  type TmuxPaneTarget,
} from '../connection/window-handle.js';
import type { SessionStrategy, StrategyDeps, SwapTarget } from './types.js';

// Same field order as the handle body, see parseTmuxPaneLine
export const PANE_FORMAT = [
  '#{pane_tty}',
  '#{session_name}',
  '#{window_index}',
  '#{pane_index}',
].join('|');

/**
 * Parse `tmux list-panes -a` output, skipping lines that do not parse.
 */
export function parsePaneList(output: string): TmuxPaneTarget[] {
  const panes: TmuxPaneTarget[] = [];
  for (const line of output.split('\n')) {
    const pane = parseTmuxPaneLine(line.trim());
    if (pane) panes.push(pane);
  }
  return panes;
}

/**
 * tmux target strings for a pane. An empty session name resolves against
 * the current session.
 */
export function paneTargets(pane: TmuxPaneTarget): { session: string; window: string; pane: string } {
  const window = `${pane.sessionName}:${pane.windowIndex}`;
  return { session: pane.sessionName, window, pane: `${window}.${pane.paneIndex}` };
}

export class TmuxStrategy implements SessionStrategy {
  readonly kind = 'multiplexer' as const;
  private runner: CommandRunner;
  private logger: Logger;

  constructor(deps: StrategyDeps) {
    this.runner = deps.runner;
    this.logger = deps.logger;
  }

  async locate(target: SwapTarget): Promise<WindowHandle | null> {
    const pids = await findProcessesHoldingFile(this.runner, target.markerPath);
    if (pids.length === 0) {
      this.logger.log(`No process holds ${target.markerPath}`);
      return null;
    }

    let panes: TmuxPaneTarget[] | null = null;
    for (const pid of pids) {
      const tty = await getControllingTty(this.runner, pid);
      if (!tty) {
        this.logger.log(`Process ${pid} has no controlling terminal`);
        continue;
      }

      panes ??= await this.listPanes();
      const pane = panes.find((p) => p.paneTty === tty);
      if (pane) {
        return buildTmuxHandle(pane);
      }
      this.logger.log(`No tmux pane on ${tty}`);
    }
    return null;
  }

  async focus(handle: WindowHandle): Promise<FocusResult> {
    const parsed = parseWindowHandle(handle);
    if (!parsed || parsed.prefix !== WindowHandlePrefix.TMUX) {
      return { success: false, kind: this.kind, error: `Not a tmux handle: ${handle}` };
    }

    const targets = paneTargets(parsed);
    if (targets.session) {
      await this.switchClient(targets.session);
    }
    try {
      await this.runner(TMUX_COMMAND, ['select-window', '-t', targets.window]);
      await this.runner(TMUX_COMMAND, ['select-pane', '-t', targets.pane]);
      return { success: true, kind: this.kind };
    } catch (err) {
      return { success: false, kind: this.kind, error: getErrorMessage(err) };
    }
  }

  /**
   * Move the attached client to the pane's session. select-window alone only
   * changes that session's current window. Fails when no client is attached.
   */
  private async switchClient(session: string): Promise<void> {
    try {
      await this.runner(TMUX_COMMAND, ['switch-client', '-t', session]);
    } catch (err) {
      this.logger.log(`Could not switch tmux client to ${session}: ${getErrorMessage(err)}`);
    }
  }

  private async listPanes(): Promise<TmuxPaneTarget[]> {
    try {
      const stdout = await this.runner(TMUX_COMMAND, ['list-panes', '-a', '-F', PANE_FORMAT]);
      return parsePaneList(stdout);
    } catch (err) {
      this.logger.log(`Could not list tmux panes: ${getErrorMessage(err)}`);
      return [];
    }
  }
}
