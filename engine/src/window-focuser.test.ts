/**
 * Tests for WindowFocuser
 */

import { describe, it, expect } from '@jest/globals';
import { WindowFocuser } from './window-focuser.js';
import { createFakeRunner, commandError } from './testing/fake-runner.js';

function createFocuser(responses: Parameters<typeof createFakeRunner>[0]) {
  const runner = createFakeRunner(responses);
  const focuser = new WindowFocuser({
    runner: runner.run,
    environment: () => ({ platform: 'linux', env: {} }),
  });
  return { focuser, runner };
}

describe('WindowFocuser', () => {
  it('dispatches to the strategy of the given kind', async () => {
    const { focuser, runner } = createFocuser({ wmctrl: '', tmux: '' });

    await expect(focuser.focus('X11:0x04400006', 'linux-wm')).resolves.toEqual({ success: true, kind: 'linux-wm' });
    await expect(focuser.focus('TMUX:/dev/pts/3|main|2|1', 'multiplexer')).resolves.toEqual({
      success: true,
      kind: 'multiplexer',
    });
    expect(runner.commands()).toEqual([
      'wmctrl -i -a 0x04400006',
      'tmux switch-client -t main',
      'tmux select-window -t main:2',
      'tmux select-pane -t main:2.1',
    ]);
  });

  it('refuses a handle produced for another platform', async () => {
    const { focuser, runner } = createFocuser({ wmctrl: '', tmux: '' });
    const result = await focuser.focus('X11:0x04400006', 'multiplexer');
    expect(result).toEqual({
      success: false,
      kind: 'multiplexer',
      error: 'Handle does not belong to multiplexer: X11:0x04400006',
    });
    expect(runner.calls).toEqual([]);
  });

  it('refuses empty handles', async () => {
    const { focuser, runner } = createFocuser({ wmctrl: '' });
    const result = await focuser.focus('', 'linux-wm');
    expect(result.success).toBe(false);
    expect(runner.calls).toEqual([]);
  });

  it('reports command failures without throwing', async () => {
    const { focuser } = createFocuser({ wmctrl: commandError('wmctrl -i -a 0x04400006') });
    await expect(focuser.focus('X11:0x04400006', 'linux-wm')).resolves.toEqual({
      success: false,
      kind: 'linux-wm',
      error: 'wmctrl -i -a 0x04400006: exited with 1',
    });
  });

  it('fails on the unsupported platform', async () => {
    const { focuser } = createFocuser({});
    const result = await focuser.focus('X11:0x04400006', 'unsupported');
    expect(result.success).toBe(false);
  });
});
