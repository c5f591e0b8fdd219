import { describe, expect, it, vi } from 'vitest';
import {
  CheckAbortedError,
  LocateFailureError,
  SessionFailureError,
} from '../../../application/errors/CheckErrors.js';
import type {
  BrowserSession,
  BrowserSessionPort,
  LocateResult,
  Locator,
  PageElement,
} from '../../../application/ports/BrowserSessionPort.js';
import { DEFAULT_INPUT_LOCATORS, RenderedPageFetcher } from './RenderedPageFetcher.js';

const PAGE_URL = 'https://bank.test/saldo';
const CARD = '123456789012';

interface FakeSessionOptions {
  matches?: (locator: Locator) => boolean;
  html?: string;
  /** Keeps `goto` pending until the session is closed. */
  hangOnGoto?: boolean;
  onGoto?: () => void;
}

class FakeSession implements BrowserSession {
  readonly steps: string[] = [];
  closeCalls = 0;
  private rejectPending: ((error: Error) => void) | null = null;

  constructor(private readonly options: FakeSessionOptions = {}) {}

  async goto(url: string): Promise<void> {
    this.steps.push(`goto ${url}`);

    if (this.options.hangOnGoto) {
      const pending = new Promise<void>((_, reject) => {
        this.rejectPending = reject;
      });
      this.options.onGoto?.();
      return pending;
    }
  }

  async locate(locator: Locator, options: { timeoutMs: number; clickable?: boolean }): Promise<LocateResult> {
    this.steps.push(`locate ${locator.value}${options.clickable ? ' (clickable)' : ''}`);

    if (this.options.matches?.(locator)) {
      return { found: true, element: this.element(locator.value) };
    }
    return { found: false, reason: `Waiting for selector failed: ${options.timeoutMs}ms exceeded` };
  }

  async title(): Promise<string> {
    return 'Saldo på kronekort';
  }

  async content(): Promise<string> {
    this.steps.push('content');
    return this.options.html ?? '<html></html>';
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.rejectPending?.(new Error('Target closed'));
  }

  private element(name: string): PageElement {
    return {
      clear: async () => {
        this.steps.push(`clear ${name}`);
      },
      type: async (text) => {
        this.steps.push(`type ${text}`);
      },
      scrollIntoView: async () => {
        this.steps.push(`scroll ${name}`);
      },
      click: async () => {
        this.steps.push(`click ${name}`);
      },
    };
  }
}

const sessionsOf = (session: BrowserSession): BrowserSessionPort & { opened: number } => ({
  opened: 0,
  async open() {
    this.opened += 1;
    return session;
  },
});

const createLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const createFetcher = (sessions: BrowserSessionPort, logger = createLogger()) =>
  new RenderedPageFetcher(sessions, { url: PAGE_URL, loadDelayMs: 0, settleDelayMs: 0, locatorTimeoutMs: 100 }, logger);

describe('RenderedPageFetcher', () => {
  it('submits the card number through the first matching controls and returns the page', async () => {
    const session = new FakeSession({
      html: '<html><body>resultat</body></html>',
      matches: (locator) => locator.value === 'input.dnb-input__input' || locator.value === 'button.dnb-button',
    });

    const html = await createFetcher(sessionsOf(session)).fetchDocument(CARD);

    expect(html).toBe('<html><body>resultat</body></html>');
    expect(session.steps).toEqual([
      `goto ${PAGE_URL}`,
      "locate input.dnb-input__input[maxlength='12']",
      'locate input.dnb-input__input',
      'clear input.dnb-input__input',
      `type ${CARD}`,
      "locate //button[.//span[contains(text(), 'Se saldo')]] (clickable)",
      "locate //span[contains(text(), 'Se saldo')] (clickable)",
      'locate button.dnb-button (clickable)',
      'scroll button.dnb-button',
      'click button.dnb-button',
      'content',
    ]);
    expect(session.closeCalls).toBe(1);
  });

  it('fails with the attempted locators when the input never shows up', async () => {
    const session = new FakeSession();
    const logger = createLogger();

    const result = createFetcher(sessionsOf(session), logger).fetchDocument(CARD);

    await expect(result).rejects.toBeInstanceOf(LocateFailureError);
    await expect(result).rejects.toMatchObject({
      code: 'locate_failure',
      control: 'card number input',
      attempts: DEFAULT_INPUT_LOCATORS.map((locator) => `${locator.kind}=${locator.value}`),
    });
    expect(logger.error).toHaveBeenCalledWith('Could not find card number input on the page', {
      title: 'Saldo på kronekort',
      attempts: DEFAULT_INPUT_LOCATORS.map((locator) => `${locator.kind}=${locator.value}`),
    });
    expect(session.closeCalls).toBe(1);
  });

  it('reports a session that cannot be opened', async () => {
    const launchError = new Error('Failed to launch the browser process');
    const sessions: BrowserSessionPort = {
      open: async () => {
        throw launchError;
      },
    };

    const result = createFetcher(sessions).fetchDocument(CARD);

    await expect(result).rejects.toBeInstanceOf(SessionFailureError);
    await expect(result).rejects.toMatchObject({ code: 'session_failure', cause: launchError });
  });

  it('does not open a session for an already cancelled check', async () => {
    const session = new FakeSession();
    const sessions = sessionsOf(session);
    const controller = new AbortController();
    controller.abort();

    await expect(createFetcher(sessions).fetchDocument(CARD, { signal: controller.signal })).rejects.toBeInstanceOf(
      CheckAbortedError,
    );
    expect(sessions.opened).toBe(0);
  });

  it('closes the browser once when cancelled mid-navigation', async () => {
    const controller = new AbortController();
    const session = new FakeSession({
      hangOnGoto: true,
      onGoto: () => queueMicrotask(() => controller.abort()),
    });

    const result = createFetcher(sessionsOf(session)).fetchDocument(CARD, { signal: controller.signal });

    await expect(result).rejects.toBeInstanceOf(CheckAbortedError);
    expect(session.closeCalls).toBe(1);
    expect(session.steps).toEqual([`goto ${PAGE_URL}`]);
  });

  it('keeps the result when closing the browser fails', async () => {
    const session = new FakeSession({ matches: () => true, html: '<p>ok</p>' });
    session.close = async () => {
      throw new Error('Browser already closed');
    };
    const logger = createLogger();

    await expect(createFetcher(sessionsOf(session), logger).fetchDocument(CARD)).resolves.toBe('<p>ok</p>');
    expect(logger.warn).toHaveBeenCalledWith('Failed to close browser session', { error: 'Browser already closed' });
  });
});
