/**
 * Connection Layer Constants
 *
 * Timeouts, window handle prefixes and the external tools each platform uses.
 */

// ============================================================================
// External Commands
// ============================================================================

/** Upper bound for a single external command */
export const DEFAULT_COMMAND_TIMEOUT_MS = 500;

export const LSOF_COMMAND = 'lsof';
export const PS_COMMAND = 'ps';
export const TMUX_COMMAND = 'tmux';
export const OSASCRIPT_COMMAND = 'osascript';
export const WMCTRL_COMMAND = 'wmctrl';

/** Default title substring marking a window as an editor session */
export const DEFAULT_EDITOR_MARKER = 'vim';

// ============================================================================
// Window Handle Prefixes
// ============================================================================

/**
 * Window handle prefix identifiers.
 * Handles follow the format: PREFIX:value
 *
 * Examples:
 * - TMUX:/dev/pts/3|work|2|1 (pane tty, session, window index, pane index)
 * - MAC:iTerm2:4711 (terminal app, window id)
 * - X11:0x04400006 (window manager window id)
 */
export enum WindowHandlePrefix {
  /** tmux pane */
  TMUX = 'TMUX',

  /** Terminal.app or iTerm2 window (macOS) */
  MAC = 'MAC',

  /** X11 window listed by the window manager */
  X11 = 'X11',
}

// ============================================================================
// macOS Terminal Applications
// ============================================================================

/**
 * Scriptable terminal applications, keyed by the TERM_PROGRAM value each
 * one exports to its shells.
 */
export const MAC_TERMINAL_APPS = {
  Apple_Terminal: 'Terminal',
  'iTerm.app': 'iTerm2',
} as const;

export type MacTerminalApp = (typeof MAC_TERMINAL_APPS)[keyof typeof MAC_TERMINAL_APPS];

export const MAC_TERMINAL_APP_NAMES: readonly MacTerminalApp[] = Object.values(MAC_TERMINAL_APPS);

export function isMacTerminalApp(value: string): value is MacTerminalApp {
  return MAC_TERMINAL_APP_NAMES.some((name) => name === value);
}
