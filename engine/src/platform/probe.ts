/**
 * Platform Probe
 *
 * Decides which session lookup applies from environment inputs alone.
 * Pure: callers take a snapshot once per event and pass it in.
 *
 * @module platform/probe
 */

import type { EnvironmentSnapshot, PlatformKind } from '@swapjump/core';
import { MAC_TERMINAL_APPS, type MacTerminalApp } from '../connection/constants.js';

/** Unix platforms where windows are listed through the X11 window manager */
const WINDOW_MANAGER_PLATFORMS: readonly NodeJS.Platform[] = [
  'linux',
  'freebsd',
  'openbsd',
  'netbsd',
  'sunos',
  'aix',
];

export interface ProbeOptions {
  /** Multiplexer-aware detection, off unless configured */
  tmux: boolean;
}

/**
 * Capture the current platform and environment.
 */
export function readEnvironment(): EnvironmentSnapshot {
  return { platform: process.platform, env: { ...process.env } };
}

/**
 * True when the snapshot was taken inside a tmux client.
 */
export function isInsideTmux(snapshot: EnvironmentSnapshot): boolean {
  return Boolean(snapshot.env.TMUX);
}

/**
 * Select the platform kind for one event.
 *
 * The multiplexer wins over the native platform only when it is both enabled
 * and detected; otherwise the OS family decides.
 */
export function probePlatform(snapshot: EnvironmentSnapshot, options: ProbeOptions): PlatformKind {
  if (options.tmux && isInsideTmux(snapshot)) {
    return 'multiplexer';
  }
  if (snapshot.platform === 'darwin') {
    return 'mac-terminal';
  }
  if (WINDOW_MANAGER_PLATFORMS.includes(snapshot.platform)) {
    return 'linux-wm';
  }
  return 'unsupported';
}

/**
 * Identify the scriptable macOS terminal hosting this process from TERM_PROGRAM.
 *
 * @returns The application name to script, or null for any other terminal.
 */
export function detectMacTerminalApp(snapshot: EnvironmentSnapshot): MacTerminalApp | null {
  const program = snapshot.env.TERM_PROGRAM;
  if (program === 'Apple_Terminal' || program === 'iTerm.app') {
    return MAC_TERMINAL_APPS[program];
  }
  return null;
}
