/**
 * Default wiring of the swap file handler.
 */

import type { EnvironmentSnapshot, Logger, SwapjumpSettings } from '@swapjump/core';
import { createLogger } from '@swapjump/core';
import { createCommandRunner, type CommandRunner } from './connection/command-runner.js';
import { SwapfileHandler } from './handlers/swapfile-handler.js';
import type { EditorHost } from './host/types.js';
import { NotificationScheduler } from './notification-scheduler.js';
import { ActiveSessionLocator } from './session-locator.js';
import { WindowFocuser } from './window-focuser.js';

export interface CreateSwapfileHandlerOptions {
  host: EditorHost;
  settings: SwapjumpSettings;
  /** Defaults to a runner bounded by settings.commandTimeoutMs */
  runner?: CommandRunner;
  environment?: () => EnvironmentSnapshot;
  logger?: Logger;
}

export function createSwapfileHandler(options: CreateSwapfileHandlerOptions): SwapfileHandler {
  const { host, settings, environment } = options;
  const logger = options.logger ?? createLogger({ silent: true });
  const runner = options.runner ?? createCommandRunner({ timeoutMs: settings.commandTimeoutMs, logger });

  return new SwapfileHandler({
    host,
    locator: new ActiveSessionLocator({
      runner,
      tmux: settings.tmux,
      editorMarker: settings.editorMarker,
      environment,
      logger,
    }),
    focuser: new WindowFocuser({ runner, editorMarker: settings.editorMarker, environment, logger }),
    notifications: new NotificationScheduler(host),
    logger,
  });
}
