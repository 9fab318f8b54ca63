/**
 * Locate command: print the session holding a file open, as JSON.
 */

import { resolve } from "path";
import { ActiveSessionLocator, createCommandRunner } from "@swapjump/engine";
import { createCommandContext, defaultIo, type CommandIo, type CommonOptions } from "./command-helper.js";

export async function locateSession(
  file: string,
  marker: string,
  options: CommonOptions,
  io: CommandIo = defaultIo(),
): Promise<void> {
  const { settings, logger } = createCommandContext(options, io);
  const runner = io.runner ?? createCommandRunner({ timeoutMs: settings.commandTimeoutMs, logger });

  const locator = new ActiveSessionLocator({
    runner,
    tmux: settings.tmux,
    editorMarker: settings.editorMarker,
    environment: io.environment,
    logger,
  });

  const located = await locator.locate(resolve(file), resolve(marker));
  io.stdout(`${JSON.stringify(located, null, 2)}\n`);
}
