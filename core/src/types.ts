/**
 * Core Types
 *
 * Shared types for swapjump.
 * Used by the detection engine and the command line alike.
 */

// ============================================================
// Platform
// ============================================================

/**
 * The environment a session lookup runs against. Selected once per event
 * from environment state and never cached.
 */
export type PlatformKind = "multiplexer" | "mac-terminal" | "linux-wm" | "unsupported";

/**
 * Environment inputs the probe reads. Captured once per event so that a
 * whole lookup sees one consistent view.
 */
export interface EnvironmentSnapshot {
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
}

// ============================================================
// Session handles
// ============================================================

/**
 * Opaque token naming a terminal window or multiplexer pane.
 * Only the strategy that produced it may interpret it. Never empty:
 * "not found" is represented by `null`.
 */
export type WindowHandle = string;

export interface LocatedSession {
  kind: PlatformKind;
  handle: WindowHandle;
}

export interface FocusResult {
  success: boolean;
  kind: PlatformKind;
  error?: string;
}

// ============================================================
// Outcome
// ============================================================

/**
 * How the host editor should proceed with the open attempt.
 */
export type OutcomeDirective = "switch-away" | "discard-and-edit" | "open-read-only";

/**
 * One-letter swap-file answer understood by Vim-style hosts:
 * q(uit) the duplicate open, e(dit) anyway, o(pen) read-only.
 */
export type SwapChoice = "q" | "e" | "o";

const SWAP_CHOICES: Record<OutcomeDirective, SwapChoice> = {
  "switch-away": "q",
  "discard-and-edit": "e",
  "open-read-only": "o",
};

export function toSwapChoice(directive: OutcomeDirective): SwapChoice {
  return SWAP_CHOICES[directive];
}
