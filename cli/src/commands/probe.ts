/**
 * Probe command: show which lookup would run here, as JSON.
 */

import { detectMacTerminalApp, isInsideTmux, probePlatform } from "@swapjump/engine";
import { createCommandContext, defaultIo, type CommandIo, type CommonOptions } from "./command-helper.js";

export function showProbe(options: CommonOptions, io: CommandIo = defaultIo()): void {
  const { settings } = createCommandContext(options, io);
  const environment = io.environment();

  io.stdout(
    `${JSON.stringify(
      {
        platform: environment.platform,
        kind: probePlatform(environment, { tmux: settings.tmux }),
        insideTmux: isInsideTmux(environment),
        terminalApp: detectMacTerminalApp(environment),
        settings,
      },
      null,
      2,
    )}\n`,
  );
}
