/**
 * @swapjump/engine
 *
 * Active-session detection and window focus for editors that find a swap
 * file when opening a file.
 */

export * from './connection/index.js';
export { probePlatform, readEnvironment, detectMacTerminalApp, isInsideTmux, type ProbeOptions } from './platform/probe.js';
export * from './strategies/index.js';
export { ActiveSessionLocator, type SessionLocatorOptions } from './session-locator.js';
export { WindowFocuser, type WindowFocuserOptions } from './window-focuser.js';
export { NotificationScheduler } from './notification-scheduler.js';
export * from './handlers/index.js';
export * from './host/index.js';
export { createSwapfileHandler, type CreateSwapfileHandlerOptions } from './create-handler.js';
