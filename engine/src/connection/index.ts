/**
 * Connection Layer
 *
 * Everything that talks to the operating system:
 * - Bounded external command execution
 * - Process-to-file and process-to-tty lookup
 * - AppleScript helpers
 * - Window handle encoding
 *
 * @module connection
 */

// Constants
export {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_EDITOR_MARKER,
  LSOF_COMMAND,
  PS_COMMAND,
  TMUX_COMMAND,
  OSASCRIPT_COMMAND,
  WMCTRL_COMMAND,
  WindowHandlePrefix,
  MAC_TERMINAL_APPS,
  MAC_TERMINAL_APP_NAMES,
  isMacTerminalApp,
  type MacTerminalApp,
} from './constants.js';

// Command execution
export {
  createCommandRunner,
  formatCommand,
  CommandFailedError,
  type CommandRunner,
  type CommandRunnerOptions,
} from './command-runner.js';

// AppleScript utilities
export {
  escapeAppleScriptString,
  runAppleScript,
  parseAppleScriptIdList,
} from './applescript.js';

// Process detection
export {
  findProcessesHoldingFile,
  getControllingTty,
  normalizeTtyPath,
} from './process-detection.js';

// Window handles
export {
  buildTmuxHandle,
  buildMacHandle,
  buildX11Handle,
  parseWindowHandle,
  parseTmuxPaneLine,
  handleKind,
  handleBelongsTo,
  type ParsedWindowHandle,
  type TmuxPaneTarget,
} from './window-handle.js';
