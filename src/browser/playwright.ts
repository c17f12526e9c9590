import { chromium, firefox, webkit } from 'playwright';
import type { Browser, BrowserContext, BrowserType, Page } from 'playwright';

import type { BrowserKind, JsonValue } from '../schema/index.js';
import { LAYOUT, TIMEOUTS } from '../config/defaults.js';
import { SessionUnreachableError } from '../core/errors.js';
import { resolveSelector } from './selectors.js';
import type {
  ActionOptions,
  LaunchOptions,
  SessionHandle,
  SessionLauncher,
} from './session.js';

// ── Browser types ────────────────────────────────────────────

const BROWSER_TYPES: Record<BrowserKind, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

// ── Launcher ─────────────────────────────────────────────────

/**
 * Production launcher: one browser instance per session so that a
 * crash or a stuck dialog in one never blocks the others.
 */
export function createPlaywrightLauncher(): SessionLauncher {
  return {
    async launch(options: LaunchOptions): Promise<SessionHandle> {
      const browser = await BROWSER_TYPES[options.kind].launch({
        headless: options.headless,
        args: launchArgs(options),
      });

      try {
        // Headful windows size the viewport themselves.
        const context = await browser.newContext({
          viewport: options.headless
            ? { width: LAYOUT.WINDOW_WIDTH, height: LAYOUT.WINDOW_HEIGHT }
            : null,
        });
        const page = await context.newPage();
        return new PlaywrightSession(options.index, browser, context, page);
      } catch (err) {
        await browser.close();
        throw err;
      }
    },
  };
}

function launchArgs(options: LaunchOptions): string[] {
  // Only Chromium takes window geometry flags.
  if (options.kind !== 'chromium' || options.headless) return [];
  return [
    `--window-position=${String(options.position.x)},${String(options.position.y)}`,
    `--window-size=${String(LAYOUT.WINDOW_WIDTH)},${String(LAYOUT.WINDOW_HEIGHT)}`,
  ];
}

// ── Session ──────────────────────────────────────────────────

class PlaywrightSession implements SessionHandle {
  readonly index: number;

  private readonly browser: Browser;
  private readonly tokens = new WeakMap<Page, string>();
  private active: Page;
  private nextToken = 0;

  constructor(index: number, browser: Browser, context: BrowserContext, page: Page) {
    this.index = index;
    this.browser = browser;
    this.active = page;

    this.register(page);
    context.on('page', (opened) => {
      this.register(opened);
    });
  }

  get currentLocation(): string {
    return this.active.isClosed() ? '' : this.active.url();
  }

  async navigate(url: string, options?: { timeoutMs?: number | undefined }): Promise<void> {
    const page = this.page();
    await page.goto(url, {
      timeout: options?.timeoutMs ?? TIMEOUTS.NAVIGATION_TIMEOUT,
      waitUntil: 'domcontentloaded',
    });
  }

  async click(selector: string, options?: ActionOptions): Promise<void> {
    const locator = resolveSelector(this.page(), selector, options?.by);
    await locator.click({
      timeout: options?.timeoutMs ?? TIMEOUTS.ACTION_TIMEOUT_S * 1000,
    });
  }

  async fill(selector: string, text: string, options?: ActionOptions): Promise<void> {
    const locator = resolveSelector(this.page(), selector, options?.by);
    const timeout = options?.timeoutMs ?? TIMEOUTS.ACTION_TIMEOUT_S * 1000;

    // A trailing newline submits the field.
    const submit = text.endsWith('\n');
    const value = submit ? text.slice(0, -1) : text;

    if (!submit || value.length > 0) {
      await locator.fill(value, { timeout });
    }
    if (submit) {
      await locator.press('Enter', { timeout });
    }
  }

  async runScript(source: string, arg?: JsonValue): Promise<unknown> {
    const expression = `(${source})(${JSON.stringify(arg ?? null)})`;
    const result: unknown = await this.page().evaluate(expression);
    return result;
  }

  async windowTokens(): Promise<string[]> {
    this.ensureConnected();
    return this.active
      .context()
      .pages()
      .filter((page) => !page.isClosed())
      .map((page) => this.register(page));
  }

  async activeWindow(): Promise<string> {
    return this.register(this.page());
  }

  async focus(token: string): Promise<void> {
    this.ensureConnected();
    const target = this.active
      .context()
      .pages()
      .find((page) => !page.isClosed() && this.tokens.get(page) === token);

    if (!target) {
      throw new SessionUnreachableError(this.index, `window ${token} is closed`);
    }

    await target.bringToFront();
    this.active = target;
  }

  async close(): Promise<void> {
    await this.browser.close();
  }

  // ── Internals ──────────────────────────────────────────────

  private register(page: Page): string {
    const existing = this.tokens.get(page);
    if (existing !== undefined) return existing;

    const token = `window-${String(this.nextToken++)}`;
    this.tokens.set(page, token);
    return token;
  }

  private ensureConnected(): void {
    if (!this.browser.isConnected()) {
      throw new SessionUnreachableError(this.index, 'browser disconnected');
    }
  }

  private page(): Page {
    this.ensureConnected();
    if (this.active.isClosed()) {
      throw new SessionUnreachableError(this.index, 'active window is closed');
    }
    return this.active;
  }
}
