/**
 * Tests for strategy selection
 */

import { describe, it, expect } from '@jest/globals';
import { createLogger } from '@swapjump/core';
import {
  createStrategy,
  TmuxStrategy,
  MacTerminalStrategy,
  LinuxWindowManagerStrategy,
  UnsupportedStrategy,
} from './index.js';
import { createFakeRunner } from '../testing/fake-runner.js';

const deps = {
  runner: createFakeRunner().run,
  environment: { platform: 'linux' as const, env: {} },
  editorMarker: 'vim',
  logger: createLogger({ silent: true }),
};

describe('createStrategy', () => {
  it('builds one strategy per platform kind', () => {
    expect(createStrategy('multiplexer', deps)).toBeInstanceOf(TmuxStrategy);
    expect(createStrategy('mac-terminal', deps)).toBeInstanceOf(MacTerminalStrategy);
    expect(createStrategy('linux-wm', deps)).toBeInstanceOf(LinuxWindowManagerStrategy);
    expect(createStrategy('unsupported', deps)).toBeInstanceOf(UnsupportedStrategy);
  });

  it('reports the kind it was built for', () => {
    expect(createStrategy('multiplexer', deps).kind).toBe('multiplexer');
    expect(createStrategy('mac-terminal', deps).kind).toBe('mac-terminal');
    expect(createStrategy('linux-wm', deps).kind).toBe('linux-wm');
    expect(createStrategy('unsupported', deps).kind).toBe('unsupported');
  });
});

describe('UnsupportedStrategy', () => {
  it('never finds a session', async () => {
    await expect(new UnsupportedStrategy().locate()).resolves.toBeNull();
  });

  it('cannot focus', async () => {
    await expect(new UnsupportedStrategy().focus()).resolves.toEqual({
      success: false,
      kind: 'unsupported',
      error: 'Window focus is not supported on this platform',
    });
  });
});
