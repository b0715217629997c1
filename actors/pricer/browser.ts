import { type Browser, chromium, errors, type Page } from 'playwright';
import { createLogger } from '../../shared/logger';
import {
  BROWSER_LAUNCH_ARGS,
  BROWSER_USER_AGENT,
  BROWSER_VIEWPORT,
} from './selectors';

const log = createLogger('browser');

// ================================================
// RENDERING COLLABORATOR
// ================================================

export interface MatchedElement {
  selector: string;
  text: string;
}

export interface RenderSession {
  /**
   * Wait up to `timeoutMs` for any of the selectors, then return the text of
   * the first one (in list order) present on the page.
   */
  findFirstMatching(
    selectors: readonly string[],
    timeoutMs: number
  ): Promise<MatchedElement | null>;
  screenshot(path: string): Promise<void>;
  close(): Promise<void>;
}

export interface Renderer {
  open(url: string, navigationTimeoutMs: number): Promise<RenderSession>;
}

/**
 * Open a session, run `fn`, and close the session on every exit path
 */
export async function withRenderSession<T>(
  renderer: Renderer,
  url: string,
  navigationTimeoutMs: number,
  fn: (session: RenderSession) => Promise<T>
): Promise<T> {
  const session = await renderer.open(url, navigationTimeoutMs);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

// ================================================
// PLAYWRIGHT IMPLEMENTATION
// ================================================

/**
 * Wait for page to load
 */
async function waitForLoad(page: Page, timeout: number): Promise<void> {
  try {
    await page.waitForLoadState('domcontentloaded', { timeout });
  } catch {
    log.warn(`⚠️ Page load timeout after ${timeout}ms, continuing anyway...`);
  }
}

class PlaywrightSession implements RenderSession {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page
  ) {}

  async findFirstMatching(
    selectors: readonly string[],
    timeoutMs: number
  ): Promise<MatchedElement | null> {
    if (selectors.length === 0) {
      return null;
    }

    try {
      await this.page.waitForSelector(selectors.join(', '), {
        state: 'attached',
        timeout: timeoutMs,
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        log.debug(`No selector appeared within ${timeoutMs}ms`);
        return null;
      }
      throw error;
    }

    for (const selector of selectors) {
      const locator = this.page.locator(selector).first();
      if ((await locator.count()) === 0) {
        continue;
      }
      const text = (await locator.innerText({ timeout: timeoutMs })).trim();
      if (text) {
        return { selector, text };
      }
      // Meta tags carry the value in their content attribute
      const content = await locator.getAttribute('content', {
        timeout: timeoutMs,
      });
      return { selector, text: content?.trim() ?? '' };
    }

    return null;
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  async close(): Promise<void> {
    log.info('Closing browser session');
    try {
      await this.browser.close();
    } catch (error) {
      log.error('Failed to close browser:', error);
    }
  }
}

export interface PlaywrightRendererOptions {
  headless: boolean;
}

/**
 * Launches a fresh Chromium per session so nothing outlives one item
 */
export class PlaywrightRenderer implements Renderer {
  constructor(private readonly options: PlaywrightRendererOptions) {}

  async open(
    url: string,
    navigationTimeoutMs: number
  ): Promise<RenderSession> {
    const browser = await chromium.launch({
      headless: this.options.headless,
      args: BROWSER_LAUNCH_ARGS,
    });

    try {
      const context = await browser.newContext({
        userAgent: BROWSER_USER_AGENT,
        viewport: BROWSER_VIEWPORT,
      });
      const page = await context.newPage();
      await page.goto(url, {
        waitUntil: 'commit',
        timeout: navigationTimeoutMs,
      });
      await waitForLoad(page, navigationTimeoutMs);
      log.info(`Page loaded in browser: ${url}`);
      return new PlaywrightSession(browser, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
