import { chromium, errors, Browser, BrowserContext, Page } from "playwright";
import { BrowserSession, ClickOptions, OpenPage, PageObservation } from "./types.js";
import { CaptureError, SessionError, describeCause } from "../shared/errors.js";
import { showClickMarker } from "../../utils/uiEffects.js";
import { Logger } from "../../utils/logger.js";

export const DEFAULT_NAVIGATION_TIMEOUT = 30000;

export interface PlaywrightLaunchOptions {
  startUrl: string;
  headless: boolean;
  viewport: { width: number; height: number };
  /** Use a locally installed Chrome instead of the bundled Chromium */
  executablePath?: string;
  /** Attach to an already running Chrome over CDP instead of launching one */
  cdpEndpoint?: string;
  navigationTimeoutMs?: number;
  showPointer?: boolean;
}

interface SessionParts {
  browser: Browser | null;
  context: BrowserContext;
  page: Page;
  /** False when the context belongs to a Chrome we attached to */
  ownsContext: boolean;
}

/**
 * Browser capabilities backed by one Playwright context. Tabs are addressed by
 * their position in `context.pages()`, which is the order they were opened.
 */
export class PlaywrightBrowser implements BrowserSession {
  private readonly browser: Browser | null;
  private readonly context: BrowserContext;
  private readonly ownsContext: boolean;
  private page: Page;

  constructor(
    parts: SessionParts,
    private readonly logger: Logger,
    private readonly options: { showPointer: boolean; navigationTimeoutMs: number } = {
      showPointer: false,
      navigationTimeoutMs: DEFAULT_NAVIGATION_TIMEOUT
    }
  ) {
    this.browser = parts.browser;
    this.context = parts.context;
    this.page = parts.page;
    this.ownsContext = parts.ownsContext;
  }

  static async launch(options: PlaywrightLaunchOptions, logger: Logger): Promise<PlaywrightBrowser> {
    logger.browser.action('launch', {
      headless: options.headless,
      viewport: options.viewport,
      executablePath: options.executablePath,
      cdpEndpoint: options.cdpEndpoint,
      startUrl: options.startUrl
    });

    const navigationTimeoutMs = options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT;
    let browser: Browser | null = null;

    try {
      let context: BrowserContext;
      let ownsContext = true;

      if (options.cdpEndpoint) {
        browser = await chromium.connectOverCDP(options.cdpEndpoint);
        const existing = browser.contexts()[0];
        ownsContext = existing === undefined;
        context = existing ?? await browser.newContext({ viewport: options.viewport });
      } else {
        browser = await chromium.launch({
          headless: options.headless,
          executablePath: options.executablePath,
          args: ['--disable-blink-features=AutomationControlled']
        });
        context = await browser.newContext({ viewport: options.viewport });
      }

      const page = context.pages()[0] ?? await context.newPage();
      if (!ownsContext) {
        await page.setViewportSize(options.viewport);
      }

      await page.goto(options.startUrl, { waitUntil: 'domcontentloaded', timeout: navigationTimeoutMs });
      await page.waitForLoadState('networkidle', { timeout: navigationTimeoutMs }).catch((error: unknown) => {
        logger.warn('Start page did not reach network idle; continuing', { error: describeCause(error) });
      });

      logger.info('Browser initialized', { url: page.url(), title: await page.title() });

      return new PlaywrightBrowser(
        { browser, context, page, ownsContext },
        logger,
        { showPointer: options.showPointer ?? false, navigationTimeoutMs }
      );
    } catch (error) {
      logger.browser.error('launch', error);
      if (browser) {
        await browser.close().catch((closeError: unknown) => {
          logger.error('Failed to close browser after launch failure', closeError);
        });
      }
      throw new SessionError(`Failed to initialize browser: ${describeCause(error)}`, { cause: error });
    }
  }

  async capture(): Promise<PageObservation> {
    try {
      const page = this.activePage();
      const screenshot = await page.screenshot({ type: 'png', fullPage: false });
      const markup = await page.content();
      const scriptText = await page.evaluate(() =>
        Array.from(document.scripts).map(script => script.textContent ?? '').join('\n')
      );
      const visibleText = await page.innerText('body');
      const title = await page.title();

      this.logger.debug('Page captured', {
        url: page.url(),
        screenshotBytes: screenshot.length,
        markupLength: markup.length,
        textLength: visibleText.length
      });

      return {
        url: page.url(),
        title,
        markup,
        scriptText,
        visibleText,
        screenshot,
        capturedAt: Date.now()
      };
    } catch (error) {
      this.logger.browser.error('capture', error);
      throw new CaptureError(`Failed to capture page state: ${describeCause(error)}`, { cause: error });
    }
  }

  async navigate(url: string): Promise<void> {
    await this.activePage().goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.navigationTimeoutMs
    });
  }

  async pointerClick(x: number, y: number, options: ClickOptions): Promise<void> {
    const page = this.activePage();
    if (this.options.showPointer) {
      await showClickMarker(page, x, y, this.logger);
    }
    await page.mouse.click(x, y, { button: options.button, clickCount: options.clickCount });
  }

  async pointerMove(x: number, y: number): Promise<void> {
    await this.activePage().mouse.move(x, y);
  }

  async pointerDown(): Promise<void> {
    await this.activePage().mouse.down();
  }

  async pointerUp(): Promise<void> {
    await this.activePage().mouse.up();
  }

  async keyPress(name: string): Promise<void> {
    await this.activePage().keyboard.press(name);
  }

  async keyType(text: string): Promise<void> {
    await this.activePage().keyboard.type(text);
  }

  async wheel(dx: number, dy: number): Promise<void> {
    await this.activePage().mouse.wheel(dx, dy);
  }

  async listOpenPages(): Promise<OpenPage[]> {
    const active = this.activePage();
    return Promise.all(
      this.context.pages().map(async (page, index) => ({
        index,
        url: page.url(),
        title: await page.title().catch(() => ''),
        active: page === active
      }))
    );
  }

  async activatePage(index: number): Promise<void> {
    const page = this.context.pages()[index];
    if (!page) {
      throw new Error(`No open page at index ${index}`);
    }
    this.page = page;
    await page.bringToFront();
  }

  async waitForLoadSignal(timeoutMs: number): Promise<boolean> {
    try {
      await this.activePage().waitForLoadState('networkidle', { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) return false;
      throw error;
    }
  }

  /**
   * Release the context (when we created it) and then the browser. Both are
   * attempted even if the first one fails.
   */
  async close(): Promise<void> {
    const failures: unknown[] = [];

    if (this.ownsContext) {
      try {
        await this.context.close();
      } catch (error) {
        this.logger.error('Failed to close browser context', error);
        failures.push(error);
      }
    }

    if (this.browser) {
      try {
        await this.browser.close();
      } catch (error) {
        this.logger.error('Failed to close browser', error);
        failures.push(error);
      }
    }

    if (failures.length > 0) {
      throw new SessionError(`Browser shutdown failed: ${describeCause(failures[0])}`, { cause: failures[0] });
    }
    this.logger.info('Browser resources cleaned up');
  }

  // The active tab may have been closed by the page itself; fall back to the newest one
  private activePage(): Page {
    if (!this.page.isClosed()) return this.page;

    const pages = this.context.pages();
    const fallback = pages[pages.length - 1];
    if (!fallback) {
      throw new Error('No open pages left in the browser context');
    }
    this.logger.warn('Active tab was closed; switching to the most recent tab', { url: fallback.url() });
    this.page = fallback;
    return fallback;
  }
}
