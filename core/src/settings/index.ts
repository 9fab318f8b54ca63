/**
 * Settings module exports
 */

export {
  SWAPJUMP_DIR,
  SWAPJUMP_CONFIG_PATH,
  getDefaultSettings,
  loadSettings,
  parseBooleanFlag,
} from "./settings.js";

export type { SwapjumpSettings, LoadSettingsOptions } from "./settings.js";
