/**
 * Handle command: decide what to do about a swap file.
 *
 * Prints the swap choice letter (q, e or o) for the editor to act on and the
 * status message on stderr. With --json, prints both as one object.
 */

import { resolve } from "path";
import { toSwapChoice } from "@swapjump/core";
import { NodeEditorHost, createSwapfileHandler } from "@swapjump/engine";
import { createCommandContext, defaultIo, type CommandIo, type CommonOptions } from "./command-helper.js";

export interface HandleOptions extends CommonOptions {
  json?: boolean;
}

export async function handleSwapfile(
  file: string,
  marker: string,
  options: HandleOptions,
  io: CommandIo = defaultIo(),
): Promise<void> {
  const { settings, logger } = createCommandContext(options, io);

  const messages: string[] = [];
  const host = new NodeEditorHost({ output: (message) => messages.push(message) });
  const handler = createSwapfileHandler({
    host,
    settings,
    runner: io.runner,
    environment: io.environment,
    logger,
  });

  const directive = await handler.handle(resolve(file), resolve(marker));
  // This process exits right after answering, so the buffer is "entered" now
  host.enterBuffer();

  const swapChoice = toSwapChoice(directive);
  const message = messages[messages.length - 1] ?? null;

  if (options.json) {
    io.stdout(`${JSON.stringify({ directive, swapChoice, message })}\n`);
    return;
  }
  io.stdout(`${swapChoice}\n`);
  if (message) {
    io.stderr(`${message}\n`);
  }
}
