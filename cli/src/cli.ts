#!/usr/bin/env node
/**
 * swapjump CLI
 *
 * Called by an editor when it finds a swap file for the file being opened.
 *
 * Commands:
 *   swapjump handle <file> <marker>  - Decide: switch away, delete stale swap, or read-only
 *   swapjump locate <file> <marker>  - Show the session holding the file, as JSON
 *   swapjump probe                   - Show the detected platform and settings
 */

import { Command } from "commander";
import { getErrorMessage } from "@swapjump/core";
import {
  handleSwapfile,
  locateSession,
  showProbe,
  type CommonOptions,
  type HandleOptions,
} from "./commands/index.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("swapjump")
  .description("Jump to the editor session that already has a file open")
  .version(VERSION);

program
  .command("handle <file> <marker>")
  .description("Decide what to do about the swap file <marker> of <file>")
  .option("--tmux", "Look for the session in tmux panes")
  .option("--json", "Output directive, swap choice and message as JSON")
  .option("-v, --verbose", "Log lookup steps to stderr")
  .option("-c, --config <path>", "Config file (default: ~/.swapjump/config.json)")
  .action((file: string, marker: string, options: HandleOptions) => handleSwapfile(file, marker, options));

program
  .command("locate <file> <marker>")
  .description("Show the window or pane holding <file> open")
  .option("--tmux", "Look for the session in tmux panes")
  .option("-v, --verbose", "Log lookup steps to stderr")
  .option("-c, --config <path>", "Config file (default: ~/.swapjump/config.json)")
  .action((file: string, marker: string, options: CommonOptions) => locateSession(file, marker, options));

program
  .command("probe")
  .description("Show the detected platform and effective settings")
  .option("--tmux", "Enable tmux detection")
  .option("-c, --config <path>", "Config file (default: ~/.swapjump/config.json)")
  .action((options: CommonOptions) => showProbe(options));

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${getErrorMessage(err)}`);
  process.exit(1);
});
