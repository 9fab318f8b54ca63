/**
 * Notification Scheduler
 *
 * Holds at most one status message until the host next enters a buffer,
 * so the message shows after the editor's own buffer switch instead of
 * being overwritten by it.
 */

import type { EditorHost } from './host/types.js';

interface PendingNotification {
  message: string;
  unsubscribe: () => void;
}

export class NotificationScheduler {
  private pending: PendingNotification | null = null;

  constructor(private host: EditorHost) {}

  /**
   * Show `message` on the next buffer-enter event. A message still waiting
   * from an earlier call is replaced.
   */
  enqueue(message: string): void {
    if (this.pending) {
      this.pending.message = message;
      return;
    }

    const unsubscribe = this.host.onBufferEnter(() => this.fire());
    this.pending = { message, unsubscribe };
  }

  hasPending(): boolean {
    return this.pending !== null;
  }

  /** The message that will be shown next, if any. */
  peek(): string | null {
    return this.pending?.message ?? null;
  }

  /**
   * Drop the waiting message without showing it.
   */
  cancel(): void {
    if (!this.pending) return;
    this.pending.unsubscribe();
    this.pending = null;
  }

  private fire(): void {
    const pending = this.pending;
    if (!pending) return;

    pending.unsubscribe();
    this.pending = null;
    this.host.showMessage(pending.message);
  }
}
