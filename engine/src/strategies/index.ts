/**
 * Strategy selection
 */

import type { PlatformKind } from '@swapjump/core';
import { LinuxWindowManagerStrategy } from './linux-wm-strategy.js';
import { MacTerminalStrategy } from './mac-terminal-strategy.js';
import { TmuxStrategy } from './tmux-strategy.js';
import { UnsupportedStrategy } from './unsupported-strategy.js';
import type { SessionStrategy, StrategyDeps } from './types.js';

/**
 * Build the one strategy responsible for `kind`.
 */
export function createStrategy(kind: PlatformKind, deps: StrategyDeps): SessionStrategy {
  switch (kind) {
    case 'multiplexer':
      return new TmuxStrategy(deps);
    case 'mac-terminal':
      return new MacTerminalStrategy(deps);
    case 'linux-wm':
      return new LinuxWindowManagerStrategy(deps);
    case 'unsupported':
      return new UnsupportedStrategy();
  }
}

export { TmuxStrategy, PANE_FORMAT, parsePaneList, paneTargets } from './tmux-strategy.js';
export { MacTerminalStrategy, buildWindowQueryScript, buildFocusScript } from './mac-terminal-strategy.js';
export {
  LinuxWindowManagerStrategy,
  parseWindowList,
  findEditorWindows,
  type ManagedWindow,
} from './linux-wm-strategy.js';
export { UnsupportedStrategy } from './unsupported-strategy.js';
export type { SessionStrategy, StrategyDeps, SwapTarget } from './types.js';
