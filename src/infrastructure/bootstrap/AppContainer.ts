import type { BrowserSessionPort } from '../../application/ports/BrowserSessionPort.js';
import type { LoggerPort } from '../../application/ports/LoggerPort.js';
import type { NotifierPort } from '../../application/ports/NotifierPort.js';
import type { PageFetcherPort } from '../../application/ports/PageFetcherPort.js';
import type { StoragePort } from '../../application/ports/StoragePort.js';
import { BalanceCheckService } from '../../application/services/BalanceCheckService.js';
import { SubscriberService } from '../../application/services/SubscriberService.js';
import { PuppeteerBrowserSessionFactory } from '../adapters/browser/PuppeteerBrowserSessionFactory.js';
import { RenderedPageFetcher } from '../adapters/fetcher/RenderedPageFetcher.js';
import { LogNotifier } from '../adapters/notifier/LogNotifier.js';
import { MessageFormatter } from '../adapters/notifier/MessageFormatter.js';
import { TelegramNotifier } from '../adapters/notifier/TelegramNotifier.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { SqliteStorageAdapter } from '../adapters/storage/SqliteStorageAdapter.js';
import { loadConfig } from '../config/Config.js';
import type { AppConfig } from '../config/Config.js';
import { fetchTransport } from '../http/FetchTransport.js';
import { ConsoleLogger } from '../logging/ConsoleLogger.js';
import { SweepScheduler } from '../scheduling/SweepScheduler.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: LoggerPort;
  storage?: StoragePort;
  browser?: BrowserSessionPort;
  fetcher?: PageFetcherPort;
  notifier?: NotifierPort;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: LoggerPort;

  readonly storage: StoragePort;
  readonly browser: BrowserSessionPort;
  readonly fetcher: PageFetcherPort;
  readonly formatter: MessageFormatter;
  readonly notifier: NotifierPort;
  readonly balanceCheckService: BalanceCheckService;
  readonly subscriberService: SubscriberService;
  readonly scheduler: SweepScheduler;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();

    const rootLogger = new ConsoleLogger(this.config.logging.level);
    this.logger = overrides.logger ?? rootLogger;
    const scoped = (scope: string): LoggerPort => (overrides.logger ? overrides.logger : rootLogger.child(scope));

    const { databaseFile } = this.config.storage;
    this.storage =
      overrides.storage ??
      (databaseFile ? new SqliteStorageAdapter(databaseFile, scoped('storage')) : new InMemoryStorageAdapter());

    this.browser =
      overrides.browser ??
      new PuppeteerBrowserSessionFactory({
        executablePath: this.config.browser.executablePath,
        navigationTimeoutMs: this.config.page.locatorTimeoutMs * 2,
      });

    this.fetcher =
      overrides.fetcher ?? new RenderedPageFetcher(this.browser, this.config.page, scoped('fetcher'));

    this.formatter = new MessageFormatter();

    const { botToken } = this.config.telegram;
    this.notifier =
      overrides.notifier ??
      (botToken
        ? new TelegramNotifier({ botToken }, fetchTransport, this.formatter, scoped('telegram'))
        : new LogNotifier(this.formatter, scoped('notifier')));

    this.balanceCheckService = new BalanceCheckService(this.storage, this.fetcher, this.notifier, scoped('checks'), {
      checkTimeoutMs: this.config.checks.timeoutMs,
      sweepPacingMs: this.config.checks.pacingMs,
      workerPoolSize: this.config.checks.workerPoolSize,
    });

    this.subscriberService = new SubscriberService(this.storage, scoped('subscribers'));

    this.scheduler = new SweepScheduler(
      () => this.balanceCheckService.runSweep(),
      { startDelayMs: this.config.checks.startDelayMs, intervalMs: this.config.checks.intervalMs },
      scoped('scheduler'),
    );
  }

  hasTelegram(): boolean {
    return this.notifier instanceof TelegramNotifier;
  }

  async shutdown(): Promise<void> {
    await this.scheduler.stop();
    await this.storage.close();
  }
}
