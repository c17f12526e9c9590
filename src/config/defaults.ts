/**
 * Default configuration values.
 * CLI flags, the config file and the environment override the
 * user-facing ones; the rest are protocol constants.
 */

export const TIMEOUTS = {
  /** Seconds. Recorded in task kwargs, converted to ms at the handle. */
  ACTION_TIMEOUT_S: 10,
  NAVIGATION_TIMEOUT: 30_000,
  SELECTION_POLL_INTERVAL: 100,
  CLOSE_GRACE: 1_000,
} as const;

export const LIMITS = {
  SELECTION_MAX_ATTEMPTS: 100,
  CLICK_MAX_ERRORS: 5,
  DEFAULT_SESSIONS: 3,
  DEFAULT_CLICK_INTERVAL: 1_000,
  DEFAULT_SCROLL_AMOUNT: 300,
} as const;

export const LAYOUT = {
  WINDOW_OFFSET: 50,
  WINDOW_WIDTH: 1280,
  WINDOW_HEIGHT: 800,
} as const;

export const RECORDING = {
  DEFAULT_DIR: 'browser_recordings',
  FILE_PREFIX: 'browser_session_',
  FILE_EXTENSION: '.json',
  BLANK_LOCATION: 'about:blank',
} as const;

export const CONFIG_FILE = '.browser-fleet.yaml';
