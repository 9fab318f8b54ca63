/**
 * Logging Module
 *
 * Injectable loggers and error classification shared by every package.
 */

export type { Logger, LoggerOptions } from "./logger.js";
export { createLogger } from "./logger.js";
export {
  getErrorCode,
  isNotFoundError,
  getErrorMessage,
} from "./error-utils.js";
