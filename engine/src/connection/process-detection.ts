/**
 * Process Detection
 *
 * Map a file to the processes holding it open, and a process to its
 * controlling terminal device.
 *
 * @module connection/process-detection
 */

import type { CommandRunner } from './command-runner.js';
import { LSOF_COMMAND, PS_COMMAND } from './constants.js';

/**
 * Find the processes that currently have `path` open, via `lsof -t`.
 *
 * The current process is excluded. Returns an empty list when nothing holds
 * the file (lsof exits 1 in that case) or when lsof is unavailable.
 */
export async function findProcessesHoldingFile(runner: CommandRunner, path: string): Promise<number[]> {
  let stdout: string;
  try {
    stdout = await runner(LSOF_COMMAND, ['-t', '--', path]);
  } catch {
    return [];
  }

  const pids: number[] = [];
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    const pid = parseInt(trimmed, 10);
    if (pid > 0 && pid !== process.pid && !pids.includes(pid)) {
      pids.push(pid);
    }
  }
  return pids;
}

/**
 * Normalize a tty name as printed by ps ("pts/3", "ttys001") to a device path.
 */
export function normalizeTtyPath(tty: string): string {
  return tty.startsWith('/dev/') ? tty : `/dev/${tty}`;
}

/**
 * Get the controlling terminal device of a process, or null if it has none.
 */
export async function getControllingTty(runner: CommandRunner, pid: number): Promise<string | null> {
  if (pid <= 0) return null;

  let stdout: string;
  try {
    stdout = await runner(PS_COMMAND, ['-o', 'tty=', '-p', String(pid)]);
  } catch {
    return null;
  }

  const tty = stdout.trim().split('\n')[0]?.trim() ?? '';
  if (!tty || tty === '?' || tty === '??' || tty === '-') {
    return null;
  }
  return normalizeTtyPath(tty);
}
