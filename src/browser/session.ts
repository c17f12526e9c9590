import type { BrowserKind, JsonValue, SelectorStrategy } from '../schema/index.js';

// ── Handle contract ──────────────────────────────────────────

export interface ActionOptions {
  by?: SelectorStrategy | undefined;
  timeoutMs?: number | undefined;
}

/**
 * One running automation target. The orchestrator owns every handle
 * it creates and never lets two workers use the same one at once.
 *
 * Implementations report a closed page or a disconnected browser as
 * `SessionUnreachableError`.
 */
export interface SessionHandle {
  readonly index: number;
  /** URL of the active window. */
  readonly currentLocation: string;

  navigate(url: string, options?: { timeoutMs?: number | undefined }): Promise<void>;
  click(selector: string, options?: ActionOptions): Promise<void>;
  fill(selector: string, text: string, options?: ActionOptions): Promise<void>;

  /**
   * Evaluate a function `source` in the active window, called with
   * `arg` as its only argument. Resolves with the function's return
   * value, unvalidated.
   */
  runScript(source: string, arg?: JsonValue): Promise<unknown>;

  windowTokens(): Promise<string[]>;
  activeWindow(): Promise<string>;
  focus(token: string): Promise<void>;

  close(): Promise<void>;
}

// ── Launcher contract ────────────────────────────────────────

export interface WindowPosition {
  x: number;
  y: number;
}

export interface LaunchOptions {
  index: number;
  kind: BrowserKind;
  headless: boolean;
  position: WindowPosition;
}

export interface SessionLauncher {
  launch(options: LaunchOptions): Promise<SessionHandle>;
}
