import fs from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import { chromium, errors, type Locator, type Page } from 'playwright-core';
import type { Logger } from 'pino';
import { NavigationError } from '../errors';
import { FAST_POLL_MS, browserIdentity } from '../site/contract';
import type { BrowserHandle, BrowserLauncher, DomQuery, ElementRef, FindOptions, LoadState } from './domQuery';

const CLICK_TIMEOUT_MS = 5_000;

const isTimeout = (error: unknown) => error instanceof errors.TimeoutError;

const toElementRef = (locator: Locator): ElementRef => ({
  click: () => locator.click({ timeout: CLICK_TIMEOUT_MS }),
  fill: (text) => locator.fill(text, { timeout: CLICK_TIMEOUT_MS }),
  isChecked: () => locator.isChecked({ timeout: CLICK_TIMEOUT_MS })
});

const isClickable = async (locator: Locator, pollMs: number) => {
  if (!(await locator.isVisible())) {
    return false;
  }
  try {
    return await locator.isEnabled({ timeout: pollMs });
  } catch (error) {
    if (isTimeout(error)) {
      return false;
    }
    throw error;
  }
};

const loadStateEvent: Record<LoadState, 'domcontentloaded' | 'load'> = {
  interactive: 'domcontentloaded',
  complete: 'load'
};

export class PlaywrightDom implements DomQuery {
  constructor(private readonly page: Page) {}

  async tryFind(selector: string, options: FindOptions): Promise<ElementRef | null> {
    const locator = this.page.locator(selector).first();
    if ((options.state ?? 'present') === 'present') {
      try {
        await locator.waitFor({ state: 'attached', timeout: options.timeoutMs });
        return toElementRef(locator);
      } catch (error) {
        if (isTimeout(error)) {
          return null;
        }
        throw error;
      }
    }

    const pollMs = options.pollMs ?? FAST_POLL_MS;
    const deadline = Date.now() + options.timeoutMs;
    for (;;) {
      if (await isClickable(locator, pollMs)) {
        return toElementRef(locator);
      }
      if (Date.now() >= deadline) {
        return null;
      }
      await delay(pollMs);
    }
  }

  async waitUntilGone(selector: string, options: FindOptions): Promise<boolean> {
    try {
      await this.page.locator(selector).first().waitFor({ state: 'hidden', timeout: options.timeoutMs });
      return true;
    } catch (error) {
      if (isTimeout(error)) {
        return false;
      }
      throw error;
    }
  }

  async waitForLoadState(state: LoadState, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForLoadState(loadStateEvent[state], { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (isTimeout(error)) {
        return false;
      }
      throw error;
    }
  }

  async goto(url: string): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    } catch (error) {
      throw new NavigationError(url, error);
    }
  }

  async currentUrl(): Promise<string> {
    const href = await this.page.evaluate('window.location.href');
    return String(href);
  }

  async pause(ms: number): Promise<void> {
    await delay(ms);
  }
}

export interface PlaywrightLaunchOptions {
  profileDir: string;
  headless: boolean;
  executablePath?: string;
  channel: string;
  pageLoadTimeoutMs: number;
}

export const createPlaywrightLauncher = (options: PlaywrightLaunchOptions, logger: Logger): BrowserLauncher => ({
  async launch(): Promise<BrowserHandle> {
    await fs.mkdir(options.profileDir, { recursive: true });
    logger.debug(
      { profileDir: options.profileDir, headless: options.headless, executablePath: options.executablePath ?? null },
      'Launching browser'
    );

    const context = await chromium.launchPersistentContext(options.profileDir, {
      headless: options.headless,
      executablePath: options.executablePath,
      channel: options.executablePath ? undefined : options.channel,
      args: [...browserIdentity.launchArgs],
      ignoreDefaultArgs: [...browserIdentity.ignoredDefaultArgs],
      userAgent: browserIdentity.userAgent,
      viewport: { ...browserIdentity.viewport },
      ignoreHTTPSErrors: true
    });

    try {
      await context.addInitScript(browserIdentity.hideWebdriverScript);
      context.setDefaultNavigationTimeout(options.pageLoadTimeoutMs);
      const page = context.pages()[0] ?? (await context.newPage());
      return {
        dom: new PlaywrightDom(page),
        close: () => context.close()
      };
    } catch (error) {
      await context.close().catch((closeError: unknown) => {
        logger.warn({ err: closeError }, 'Failed to close browser after launch error');
      });
      throw error;
    }
  }
});
