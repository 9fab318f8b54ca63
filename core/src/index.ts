/**
 * @swapjump/core
 *
 * Shared types, logging and settings.
 */

export * from "./types.js";
export * from "./logging/index.js";
export * from "./settings/index.js";
