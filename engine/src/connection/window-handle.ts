/**
 * Window Handle Utilities
 *
 * Building and parsing of the handles strategies hand to the focuser.
 * Each handle carries the prefix of the strategy that produced it, so a
 * handle can never be acted on by a different strategy.
 *
 * @module connection/window-handle
 */

import type { PlatformKind, WindowHandle } from '@swapjump/core';
import { WindowHandlePrefix, isMacTerminalApp, type MacTerminalApp } from './constants.js';

/** A tmux pane located by its terminal device */
export interface TmuxPaneTarget {
  paneTty: string;
  sessionName: string;
  windowIndex: number;
  paneIndex: number;
}

export type ParsedWindowHandle =
  | ({ prefix: WindowHandlePrefix.TMUX } & TmuxPaneTarget)
  | { prefix: WindowHandlePrefix.MAC; app: MacTerminalApp; windowId: string }
  | { prefix: WindowHandlePrefix.X11; windowId: string };

const KIND_BY_PREFIX: Record<WindowHandlePrefix, PlatformKind> = {
  [WindowHandlePrefix.TMUX]: 'multiplexer',
  [WindowHandlePrefix.MAC]: 'mac-terminal',
  [WindowHandlePrefix.X11]: 'linux-wm',
};

const X11_WINDOW_ID = /^0x[0-9a-f]+$/i;

// ============================================================
// Builders
// ============================================================

export function buildTmuxHandle(target: TmuxPaneTarget): WindowHandle {
  const { paneTty, sessionName, windowIndex, paneIndex } = target;
  return `${WindowHandlePrefix.TMUX}:${paneTty}|${sessionName}|${windowIndex}|${paneIndex}`;
}

export function buildMacHandle(app: MacTerminalApp, windowId: string): WindowHandle {
  return `${WindowHandlePrefix.MAC}:${app}:${windowId}`;
}

export function buildX11Handle(windowId: string): WindowHandle {
  return `${WindowHandlePrefix.X11}:${windowId}`;
}

// ============================================================
// Parsing
// ============================================================

/**
 * Parse a `tty|session|window|pane` line. This is both the body of a tmux
 * handle and the line format requested from `tmux list-panes`.
 *
 * tmux session names may themselves contain `|`, so the two indexes are
 * taken from the end and everything between the tty and them is the name.
 */
export function parseTmuxPaneLine(line: string): TmuxPaneTarget | null {
  const parts = line.split('|');
  if (parts.length < 4) return null;

  const paneTty = parts[0] ?? '';
  const windowPart = parts[parts.length - 2] ?? '';
  const panePart = parts[parts.length - 1] ?? '';
  const sessionName = parts.slice(1, -2).join('|');

  if (!paneTty.startsWith('/dev/')) return null;
  if (!/^\d+$/.test(windowPart) || !/^\d+$/.test(panePart)) return null;

  return {
    paneTty,
    sessionName,
    windowIndex: parseInt(windowPart, 10),
    paneIndex: parseInt(panePart, 10),
  };
}

/**
 * Parse a window handle string into its components.
 *
 * @returns The parsed handle, or null for anything malformed or unknown.
 */
export function parseWindowHandle(handle: string): ParsedWindowHandle | null {
  const colonIndex = handle.indexOf(':');
  if (colonIndex === -1) return null;

  const prefix = handle.substring(0, colonIndex);
  const value = handle.substring(colonIndex + 1);

  switch (prefix) {
    case WindowHandlePrefix.TMUX: {
      const target = parseTmuxPaneLine(value);
      return target ? { prefix: WindowHandlePrefix.TMUX, ...target } : null;
    }
    case WindowHandlePrefix.MAC: {
      const appEnd = value.indexOf(':');
      if (appEnd === -1) return null;
      const app = value.substring(0, appEnd);
      const windowId = value.substring(appEnd + 1);
      if (!isMacTerminalApp(app) || !/^\d+$/.test(windowId)) return null;
      return { prefix: WindowHandlePrefix.MAC, app, windowId };
    }
    case WindowHandlePrefix.X11:
      return X11_WINDOW_ID.test(value) ? { prefix: WindowHandlePrefix.X11, windowId: value } : null;
    default:
      return null;
  }
}

/**
 * The platform kind whose strategy produced this handle, or null if it is not a valid handle.
 */
export function handleKind(handle: string): PlatformKind | null {
  const parsed = parseWindowHandle(handle);
  return parsed ? KIND_BY_PREFIX[parsed.prefix] : null;
}

/**
 * True when `handle` is a well-formed handle produced by the strategy for `kind`.
 */
export function handleBelongsTo(handle: string, kind: PlatformKind): boolean {
  return kind !== 'unsupported' && handleKind(handle) === kind;
}
