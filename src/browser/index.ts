/**
 * Browser module.
 * The session handle contract, its Playwright implementation,
 * and the page scripts evaluated inside sessions.
 */

export { resolveSelector, describeSelector } from './selectors.js';
export { createPlaywrightLauncher } from './playwright.js';
export type {
  ActionOptions,
  LaunchOptions,
  SessionHandle,
  SessionLauncher,
  WindowPosition,
} from './session.js';
export * from './overlay.js';
