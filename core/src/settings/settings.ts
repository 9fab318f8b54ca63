/**
 * swapjump configuration
 *
 * Read from ~/.swapjump/config.json, then overridden by SWAPJUMP_* environment
 * variables. Invalid values fall back to the next source down.
 */

import { readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { isNotFoundError, getErrorMessage } from "../logging/error-utils.js";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";

export const SWAPJUMP_DIR = join(homedir(), ".swapjump");
export const SWAPJUMP_CONFIG_PATH = join(SWAPJUMP_DIR, "config.json");

export interface SwapjumpSettings {
  /** Look for the session in a tmux pane when running inside tmux. */
  tmux: boolean;
  /** Substring that marks a window title as an editor session. */
  editorMarker: string;
  /** Upper bound for every external command, in milliseconds. */
  commandTimeoutMs: number;
  /** Log lookup steps to stderr. */
  verbose: boolean;
}

export interface LoadSettingsOptions {
  path?: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

export function getDefaultSettings(): SwapjumpSettings {
  return {
    tmux: false,
    editorMarker: "vim",
    commandTimeoutMs: 500,
    verbose: false,
  };
}

/**
 * Parse "1/true/yes/on" and "0/false/no/off" (any case). Anything else is null.
 */
export function parseBooleanFlag(value: string | undefined): boolean | null {
  if (value === undefined) return null;
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return null;
  }
}

function parsePositiveInt(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(path: string, logger: Logger): Partial<SwapjumpSettings> {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    if (!isNotFoundError(err)) {
      logger.warn(`Could not read ${path}: ${getErrorMessage(err)}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    logger.warn(`Ignoring malformed config ${path}: ${getErrorMessage(err)}`);
    return {};
  }
  if (!isRecord(parsed)) {
    logger.warn(`Ignoring config ${path}: expected a JSON object`);
    return {};
  }

  const result: Partial<SwapjumpSettings> = {};
  if (typeof parsed.tmux === "boolean") result.tmux = parsed.tmux;
  if (typeof parsed.verbose === "boolean") result.verbose = parsed.verbose;
  if (typeof parsed.editorMarker === "string" && parsed.editorMarker.trim()) {
    result.editorMarker = parsed.editorMarker.trim();
  }
  if (
    typeof parsed.commandTimeoutMs === "number" &&
    Number.isInteger(parsed.commandTimeoutMs) &&
    parsed.commandTimeoutMs > 0
  ) {
    result.commandTimeoutMs = parsed.commandTimeoutMs;
  }
  return result;
}

/**
 * Resolve effective settings: defaults, then the config file, then the environment.
 */
export function loadSettings(options: LoadSettingsOptions = {}): SwapjumpSettings {
  const { path = SWAPJUMP_CONFIG_PATH, env = process.env } = options;
  const logger = options.logger ?? createLogger({ silent: true });

  const settings = { ...getDefaultSettings(), ...readConfigFile(path, logger) };

  const tmux = parseBooleanFlag(env.SWAPJUMP_TMUX);
  if (tmux !== null) settings.tmux = tmux;

  const verbose = parseBooleanFlag(env.SWAPJUMP_VERBOSE);
  if (verbose !== null) settings.verbose = verbose;

  const marker = env.SWAPJUMP_EDITOR_MARKER?.trim();
  if (marker) settings.editorMarker = marker;

  const timeout = parsePositiveInt(env.SWAPJUMP_TIMEOUT_MS);
  if (timeout !== null) settings.commandTimeoutMs = timeout;

  return settings;
}
