/**
 * AppleScript Utilities
 *
 * Build and run the AppleScript snippets used to find and raise terminal
 * windows on macOS.
 *
 * @module connection/applescript
 */

import type { CommandRunner } from './command-runner.js';
import { OSASCRIPT_COMMAND } from './constants.js';

/**
 * Escape a value for use inside a double-quoted AppleScript string literal.
 *
 * @example
 * escapeAppleScriptString('say "hi"') // 'say \\"hi\\"'
 */
export function escapeAppleScriptString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Execute an AppleScript and return its trimmed output.
 *
 * The script is passed as a single argv entry to `osascript -e`, so no shell
 * quoting is involved.
 */
export async function runAppleScript(runner: CommandRunner, script: string): Promise<string> {
  const stdout = await runner(OSASCRIPT_COMMAND, ['-e', script]);
  return stdout.trim();
}

/**
 * Parse an AppleScript list of integers as printed by osascript ("12, 34").
 * Entries that are not plain integers are dropped.
 */
export function parseAppleScriptIdList(output: string): string[] {
  return output
    .split(',')
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part));
}
