/**
 * Swapfile Handler
 *
 * Decides what the editor does when it finds a swap file for the file
 * being opened:
 * - switch-away:      another session has it open; raise that session
 * - discard-and-edit: the swap file predates the file; delete it
 * - open-read-only:   anything else
 */

import type { LocatedSession, Logger, OutcomeDirective } from '@swapjump/core';
import { createLogger, getErrorMessage, isNotFoundError } from '@swapjump/core';
import type { EditorHost } from '../host/types.js';
import type { NotificationScheduler } from '../notification-scheduler.js';
import type { ActiveSessionLocator } from '../session-locator.js';
import type { WindowFocuser } from '../window-focuser.js';

export const SWITCHED_MESSAGE = 'Switched to the existing session editing this file';
export const STALE_DELETED_MESSAGE = 'Deleted a stale swap file left by an earlier session';
export const READ_ONLY_MESSAGE = 'Swap file in use: opening read-only';

// Missing paths compare as older than any existing one
const MISSING_MTIME = -1;

export interface SwapfileHandlerDeps {
  host: EditorHost;
  locator: Pick<ActiveSessionLocator, 'locate'>;
  focuser: Pick<WindowFocuser, 'focus'>;
  notifications: Pick<NotificationScheduler, 'enqueue'>;
  logger?: Logger;
}

export class SwapfileHandler {
  private host: EditorHost;
  private locator: Pick<ActiveSessionLocator, 'locate'>;
  private focuser: Pick<WindowFocuser, 'focus'>;
  private notifications: Pick<NotificationScheduler, 'enqueue'>;
  private logger: Logger;

  constructor(deps: SwapfileHandlerDeps) {
    this.host = deps.host;
    this.locator = deps.locator;
    this.focuser = deps.focuser;
    this.notifications = deps.notifications;
    this.logger = deps.logger ?? createLogger({ silent: true });
  }

  /**
   * Handle one "swap file exists" event. Always resolves with exactly one
   * directive; failures degrade to open-read-only.
   */
  async handle(filePath: string, lockMarkerPath: string): Promise<OutcomeDirective> {
    const session = await this.findSession(filePath, lockMarkerPath);
    if (session) {
      this.notifications.enqueue(SWITCHED_MESSAGE);
      await this.focusSession(session);
      return 'switch-away';
    }

    const markerTime = await this.modifiedTime(lockMarkerPath);
    const fileTime = await this.modifiedTime(filePath);

    if (markerTime < fileTime) {
      if (await this.deleteMarker(lockMarkerPath)) {
        this.notifications.enqueue(STALE_DELETED_MESSAGE);
        return 'discard-and-edit';
      }
    }

    this.notifications.enqueue(READ_ONLY_MESSAGE);
    return 'open-read-only';
  }

  private async findSession(filePath: string, lockMarkerPath: string): Promise<LocatedSession | null> {
    try {
      return await this.locator.locate(filePath, lockMarkerPath);
    } catch (err) {
      this.logger.warn(`Session lookup failed: ${getErrorMessage(err)}`);
      return null;
    }
  }

  private async focusSession(session: LocatedSession): Promise<void> {
    try {
      const result = await this.focuser.focus(session.handle, session.kind);
      if (!result.success) {
        this.logger.warn(`Focus failed: ${result.error ?? 'unknown error'}`);
      }
    } catch (err) {
      this.logger.warn(`Focus failed: ${getErrorMessage(err)}`);
    }
  }

  private async modifiedTime(path: string): Promise<number> {
    try {
      return (await this.host.getModifiedTime(path)) ?? MISSING_MTIME;
    } catch (err) {
      this.logger.warn(`Could not stat ${path}: ${getErrorMessage(err)}`);
      return MISSING_MTIME;
    }
  }

  /**
   * @returns false when the marker is still there afterwards
   */
  private async deleteMarker(path: string): Promise<boolean> {
    try {
      await this.host.deleteFile(path);
      this.logger.log(`Deleted stale swap file ${path}`);
      return true;
    } catch (err) {
      if (isNotFoundError(err)) {
        return true;
      }
      this.logger.warn(`Could not delete ${path}: ${getErrorMessage(err)}`);
      return false;
    }
  }
}
