import puppeteer from 'puppeteer-core';
import type { Browser, ElementHandle, Page } from 'puppeteer-core';
import type {
  BrowserSession,
  BrowserSessionPort,
  LocateResult,
  Locator,
  PageElement,
} from '../../../application/ports/BrowserSessionPort.js';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const LAUNCH_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu', '--window-size=1920,1080'];

export interface PuppeteerSessionConfig {
  executablePath: string;
  navigationTimeoutMs?: number;
}

export const toSelector = (locator: Locator): string =>
  locator.kind === 'xpath' ? `::-p-xpath(${JSON.stringify(locator.value)})` : locator.value;

class PuppeteerElement implements PageElement {
  constructor(
    private readonly page: Page,
    private readonly handle: ElementHandle,
  ) {}

  async clear(): Promise<void> {
    await this.handle.click({ count: 3 });
    await this.page.keyboard.press('Backspace');
  }

  async type(text: string): Promise<void> {
    await this.handle.type(text);
  }

  async scrollIntoView(): Promise<void> {
    await this.handle.scrollIntoView();
  }

  async click(): Promise<void> {
    await this.handle.click();
  }
}

class PuppeteerSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
  ) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'load' });
  }

  async locate(locator: Locator, options: { timeoutMs: number; clickable?: boolean }): Promise<LocateResult> {
    try {
      const handle = await this.page.waitForSelector(toSelector(locator), {
        timeout: options.timeoutMs,
        visible: options.clickable ?? false,
      });

      if (!handle) {
        return { found: false, reason: 'selector resolved without an element' };
      }

      return { found: true, element: new PuppeteerElement(this.page, handle) };
    } catch (error) {
      return { found: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/** Launches a fresh headless Chrome per session; the caller owns closing it. */
export class PuppeteerBrowserSessionFactory implements BrowserSessionPort {
  constructor(private readonly config: PuppeteerSessionConfig) {}

  async open(): Promise<BrowserSession> {
    const browser = await puppeteer.launch({
      executablePath: this.config.executablePath,
      headless: true,
      args: LAUNCH_ARGS,
      defaultViewport: { width: 1920, height: 1080 },
    });

    try {
      const page = await browser.newPage();
      await page.setUserAgent(USER_AGENT);
      if (this.config.navigationTimeoutMs) {
        page.setDefaultNavigationTimeout(this.config.navigationTimeoutMs);
      }

      return new PuppeteerSession(browser, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
