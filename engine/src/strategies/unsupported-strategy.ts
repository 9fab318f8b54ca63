/**
 * Fallback for platforms with no window lookup. Nothing is ever found, so the
 * handler goes straight to the marker timestamp check.
 */

import type { FocusResult, WindowHandle } from '@swapjump/core';
import type { SessionStrategy } from './types.js';

export class UnsupportedStrategy implements SessionStrategy {
  readonly kind = 'unsupported' as const;

  async locate(): Promise<WindowHandle | null> {
    return null;
  }

  async focus(): Promise<FocusResult> {
    return { success: false, kind: this.kind, error: 'Window focus is not supported on this platform' };
  }
}
