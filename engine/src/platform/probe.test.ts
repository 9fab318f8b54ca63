/**
 * Tests for the platform probe
 */

import { describe, it, expect } from '@jest/globals';
import type { EnvironmentSnapshot } from '@swapjump/core';
import { probePlatform, detectMacTerminalApp, isInsideTmux, readEnvironment } from './probe.js';

function snapshot(platform: NodeJS.Platform, env: Record<string, string | undefined> = {}): EnvironmentSnapshot {
  return { platform, env };
}

const TMUX_ENV = { TMUX: '/tmp/tmux-1000/default,1234,0' };

describe('probePlatform', () => {
  it('selects the multiplexer when enabled and inside tmux', () => {
    expect(probePlatform(snapshot('linux', TMUX_ENV), { tmux: true })).toBe('multiplexer');
    expect(probePlatform(snapshot('darwin', TMUX_ENV), { tmux: true })).toBe('multiplexer');
  });

  it('falls through to the native platform when tmux is enabled but not running', () => {
    expect(probePlatform(snapshot('linux'), { tmux: true })).toBe('linux-wm');
    expect(probePlatform(snapshot('darwin'), { tmux: true })).toBe('mac-terminal');
  });

  it('ignores tmux when detection is disabled', () => {
    expect(probePlatform(snapshot('linux', TMUX_ENV), { tmux: false })).toBe('linux-wm');
  });

  it('treats an empty TMUX variable as outside tmux', () => {
    expect(probePlatform(snapshot('linux', { TMUX: '' }), { tmux: true })).toBe('linux-wm');
  });

  it('uses the window manager on other unix platforms', () => {
    expect(probePlatform(snapshot('freebsd'), { tmux: false })).toBe('linux-wm');
    expect(probePlatform(snapshot('openbsd'), { tmux: false })).toBe('linux-wm');
  });

  it('reports anything else as unsupported', () => {
    expect(probePlatform(snapshot('win32'), { tmux: false })).toBe('unsupported');
    expect(probePlatform(snapshot('android'), { tmux: false })).toBe('unsupported');
  });
});

describe('isInsideTmux', () => {
  it('reads the TMUX variable', () => {
    expect(isInsideTmux(snapshot('linux', TMUX_ENV))).toBe(true);
    expect(isInsideTmux(snapshot('linux'))).toBe(false);
  });
});

describe('detectMacTerminalApp', () => {
  it('recognizes Terminal.app and iTerm2', () => {
    expect(detectMacTerminalApp(snapshot('darwin', { TERM_PROGRAM: 'Apple_Terminal' }))).toBe('Terminal');
    expect(detectMacTerminalApp(snapshot('darwin', { TERM_PROGRAM: 'iTerm.app' }))).toBe('iTerm2');
  });

  it('returns null for other terminals', () => {
    expect(detectMacTerminalApp(snapshot('darwin', { TERM_PROGRAM: 'WezTerm' }))).toBeNull();
    expect(detectMacTerminalApp(snapshot('darwin', { TERM_PROGRAM: 'vscode' }))).toBeNull();
    expect(detectMacTerminalApp(snapshot('darwin'))).toBeNull();
  });
});

describe('readEnvironment', () => {
  it('copies the process platform and environment', () => {
    const env = readEnvironment();
    expect(env.platform).toBe(process.platform);
    expect(env.env).toEqual({ ...process.env });
    expect(env.env).not.toBe(process.env);
  });
});
