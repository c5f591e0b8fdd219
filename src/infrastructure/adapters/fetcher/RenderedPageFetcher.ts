import { CheckAbortedError, LocateFailureError, SessionFailureError } from '../../../application/errors/CheckErrors.js';
import type {
  BrowserSession,
  BrowserSessionPort,
  Locator,
  PageElement,
} from '../../../application/ports/BrowserSessionPort.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import type { FetchDocumentOptions, PageFetcherPort } from '../../../application/ports/PageFetcherPort.js';
import { delay } from '../../../application/support/delay.js';
import { maskIdentifier } from '../../../domain/services/IdentifierMasker.js';

export const DEFAULT_INPUT_LOCATORS: readonly Locator[] = [
  { kind: 'css', value: "input.dnb-input__input[maxlength='12']" },
  { kind: 'css', value: 'input.dnb-input__input' },
  { kind: 'css', value: "input[type='text'][maxlength='12']" },
  { kind: 'css', value: "input[type='text']" },
];

export const DEFAULT_SUBMIT_LOCATORS: readonly Locator[] = [
  { kind: 'xpath', value: "//button[.//span[contains(text(), 'Se saldo')]]" },
  { kind: 'xpath', value: "//span[contains(text(), 'Se saldo')]" },
  { kind: 'css', value: 'button.dnb-button' },
  { kind: 'css', value: "button[type='submit']" },
  {
    kind: 'xpath',
    value: "//button[contains(translate(text(), 'ABCDEFGHIJKLMNOPQRSTUVWXYZ', 'abcdefghijklmnopqrstuvwxyz'), 'saldo')]",
  },
];

export interface RenderedPageFetcherConfig {
  url: string;
  loadDelayMs: number;
  settleDelayMs: number;
  locatorTimeoutMs: number;
  inputLocators?: readonly Locator[];
  submitLocators?: readonly Locator[];
}

const describeLocator = (locator: Locator): string => `${locator.kind}=${locator.value}`;

const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new CheckAbortedError();
  }
};

export class RenderedPageFetcher implements PageFetcherPort {
  private readonly inputLocators: readonly Locator[];
  private readonly submitLocators: readonly Locator[];

  constructor(
    private readonly sessions: BrowserSessionPort,
    private readonly config: RenderedPageFetcherConfig,
    private readonly logger: LoggerPort,
  ) {
    this.inputLocators = config.inputLocators ?? DEFAULT_INPUT_LOCATORS;
    this.submitLocators = config.submitLocators ?? DEFAULT_SUBMIT_LOCATORS;
  }

  async fetchDocument(identifier: string, options: FetchDocumentOptions = {}): Promise<string> {
    const { signal } = options;
    throwIfAborted(signal);

    const session = await this.openSession();

    let closing: Promise<void> | null = null;
    const teardown = (): Promise<void> => {
      closing ??= this.closeSession(session);
      return closing;
    };
    // Cancellation closes the browser right away instead of waiting for the current step.
    const onAbort = () => {
      void teardown();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      throwIfAborted(signal);
      this.logger.debug('Loading balance page', { card: maskIdentifier(identifier) });
      await session.goto(this.config.url);
      await delay(this.config.loadDelayMs, signal);

      const input = await this.locateFirst(session, this.inputLocators, 'card number input', false, signal);
      await input.clear();
      await input.type(identifier);

      const submit = await this.locateFirst(session, this.submitLocators, 'submit button', true, signal);
      await submit.scrollIntoView();
      await submit.click();
      this.logger.debug('Submitted card number, waiting for results');

      await delay(this.config.settleDelayMs, signal);
      const html = await session.content();
      throwIfAborted(signal);

      return html;
    } catch (error) {
      // Steps interrupted by a forced close fail with driver errors; report them as the cancellation.
      if (signal?.aborted && !(error instanceof CheckAbortedError)) {
        throw new CheckAbortedError();
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await teardown();
    }
  }

  private async openSession(): Promise<BrowserSession> {
    try {
      return await this.sessions.open();
    } catch (error) {
      throw new SessionFailureError(error);
    }
  }

  private async locateFirst(
    session: BrowserSession,
    locators: readonly Locator[],
    control: string,
    clickable: boolean,
    signal?: AbortSignal,
  ): Promise<PageElement> {
    const attempts: string[] = [];

    for (const locator of locators) {
      throwIfAborted(signal);

      const result = await session.locate(locator, { timeoutMs: this.config.locatorTimeoutMs, clickable });
      if (result.found) {
        this.logger.debug(`Found ${control}`, { locator: describeLocator(locator) });
        return result.element;
      }

      attempts.push(describeLocator(locator));
      this.logger.debug(`Locator for ${control} did not match`, {
        locator: describeLocator(locator),
        reason: result.reason,
      });
    }

    throwIfAborted(signal);
    this.logger.error(`Could not find ${control} on the page`, { title: await this.readTitle(session), attempts });
    throw new LocateFailureError(control, attempts);
  }

  private async readTitle(session: BrowserSession): Promise<string> {
    try {
      return await session.title();
    } catch (error) {
      this.logger.debug('Could not read page title', { error: error instanceof Error ? error.message : String(error) });
      return '';
    }
  }

  private async closeSession(session: BrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.logger.warn('Failed to close browser session', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
