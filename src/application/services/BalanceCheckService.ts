import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import { extractBalance } from '../../domain/services/BalanceExtractor.js';
import type { ExtractionResult } from '../../domain/services/BalanceExtractor.js';
import { deltaOf, detectChange, shouldNotify } from '../../domain/services/ChangeDetector.js';
import { maskIdentifier } from '../../domain/services/IdentifierMasker.js';
import type { BalanceChangedNotificationDTO } from '../dto/BalanceChangedNotificationDTO.js';
import type { CheckOutcome, SweepReport } from '../dto/CheckOutcomeDTO.js';
import { CheckAbortedError, CheckTimeoutError, failureReasonOf } from '../errors/CheckErrors.js';
import type { LoggerPort } from '../ports/LoggerPort.js';
import type { NotifierPort } from '../ports/NotifierPort.js';
import type { PageFetcherPort } from '../ports/PageFetcherPort.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { delay } from '../support/delay.js';
import { CheckGuard } from './CheckGuard.js';

export interface BalanceCheckOptions {
  checkTimeoutMs: number;
  sweepPacingMs: number;
  workerPoolSize: number;
}

interface CheckRun {
  outcome: CheckOutcome;
  notified: boolean;
}

export class BalanceCheckService {
  private readonly guard = new CheckGuard();
  private readonly pool: LimitFunction;

  constructor(
    private readonly storage: StoragePort,
    private readonly fetcher: PageFetcherPort,
    private readonly notifier: NotifierPort,
    private readonly logger: LoggerPort,
    private readonly options: BalanceCheckOptions,
  ) {
    this.pool = pLimit(options.workerPoolSize);
  }

  isChecking(subscriberId: string): boolean {
    return this.guard.isHeld(subscriberId);
  }

  /**
   * Checks one subscriber right away. The caller renders the result itself, so
   * nothing is sent through the notifier.
   */
  async checkNow(subscriberId: string): Promise<CheckOutcome> {
    const release = this.guard.tryAcquire(subscriberId);
    if (!release) {
      this.logger.info('Check already in progress', { subscriberId });
      return { status: 'in_progress', subscriberId };
    }

    try {
      const identifier = await this.storage.getIdentifier(subscriberId);
      if (!identifier) {
        return { status: 'not_registered', subscriberId };
      }

      const { outcome } = await this.runCheck(subscriberId, identifier, { notify: false });
      return outcome;
    } catch (error) {
      this.logger.error('On-demand balance check crashed', {
        subscriberId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { status: 'failed', subscriberId, reason: failureReasonOf(error) };
    } finally {
      release();
    }
  }

  async runSweep(): Promise<SweepReport> {
    const startedAt = new Date().toISOString();
    const report: SweepReport = {
      startedAt,
      finishedAt: startedAt,
      checked: 0,
      skipped: 0,
      notified: 0,
      timedOut: 0,
      failed: 0,
    };

    const subscribers = await this.storage.listSubscribers();
    this.logger.info('Starting balance sweep', { subscribers: subscribers.length });

    let previousCheckRan = false;

    for (const { subscriberId, identifier } of subscribers) {
      if (this.guard.isHeld(subscriberId)) {
        report.skipped += 1;
        continue;
      }

      if (previousCheckRan && this.options.sweepPacingMs > 0) {
        await delay(this.options.sweepPacingMs);
      }

      const release = this.guard.tryAcquire(subscriberId);
      if (!release) {
        report.skipped += 1;
        continue;
      }

      previousCheckRan = true;

      try {
        const { outcome, notified } = await this.runCheck(subscriberId, identifier, { notify: true });

        switch (outcome.status) {
          case 'ok':
            report.checked += 1;
            break;
          case 'timed_out':
            report.timedOut += 1;
            break;
          default:
            report.failed += 1;
        }

        if (notified) {
          report.notified += 1;
        }
      } catch (error) {
        report.failed += 1;
        this.logger.error('Balance check crashed during sweep', {
          subscriberId,
          error: error instanceof Error ? error.message : String(error),
        });
      } finally {
        release();
      }
    }

    report.finishedAt = new Date().toISOString();
    this.logger.info('Balance sweep finished', { ...report });

    return report;
  }

  private async runCheck(subscriberId: string, identifier: string, mode: { notify: boolean }): Promise<CheckRun> {
    const masked = maskIdentifier(identifier);
    this.logger.info('Checking balance', { subscriberId, card: masked });

    let extraction: ExtractionResult;
    try {
      extraction = await this.fetchAndExtract(identifier);
    } catch (error) {
      if (error instanceof CheckTimeoutError) {
        this.logger.warn('Balance check timed out', { subscriberId, card: masked, timeoutMs: error.timeoutMs });
        return { outcome: { status: 'timed_out', subscriberId }, notified: false };
      }

      const reason = failureReasonOf(error);
      this.logger.error('Balance check failed', {
        subscriberId,
        card: masked,
        reason,
        error: error instanceof Error ? error.message : String(error),
      });
      return { outcome: { status: 'failed', subscriberId, reason }, notified: false };
    }

    if (extraction.balance === null) {
      this.logger.warn('Could not read balance from page', {
        subscriberId,
        candidates: extraction.candidates,
        strategyErrors: extraction.strategyErrors,
      });
    } else {
      this.logger.debug('Balance extracted', { subscriberId, strategy: extraction.strategy });
    }

    const previous = await this.storage.loadLatestSnapshot(subscriberId, { requireBalance: true });
    const decision = detectChange(previous?.balance ?? null, extraction.balance);
    const snapshot = await this.storage.appendSnapshot(subscriberId, extraction.balance, extraction.transactions);

    let notified = false;
    if (mode.notify && shouldNotify(decision)) {
      notified = await this.deliver(subscriberId, {
        subscriberId,
        currentBalance: decision.current,
        previousBalance: decision.previous,
        delta: decision.delta,
        lastTransaction: extraction.lastTransaction,
        checkedAt: snapshot.checkedAt,
      });
    }

    return {
      outcome: {
        status: 'ok',
        subscriberId,
        balance: extraction.balance,
        previousBalance: previous?.balance ?? null,
        delta: deltaOf(decision),
        changed: shouldNotify(decision),
        transactions: extraction.transactions,
        lastTransaction: extraction.lastTransaction,
        checkedAt: snapshot.checkedAt,
      },
      notified,
    };
  }

  private async fetchAndExtract(identifier: string): Promise<ExtractionResult> {
    const controller = new AbortController();
    const timeoutMs = this.options.checkTimeoutMs;

    const work = this.pool(async () => {
      // The deadline may pass while the task is still queued behind other checks.
      if (controller.signal.aborted) {
        throw new CheckAbortedError();
      }

      const html = await this.fetcher.fetchDocument(identifier, { signal: controller.signal });
      return extractBalance(html);
    });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CheckTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async deliver(subscriberId: string, notification: BalanceChangedNotificationDTO): Promise<boolean> {
    try {
      await this.notifier.notifyBalanceChanged(notification);
      this.logger.info('Balance change notified', { subscriberId, delta: notification.delta });
      return true;
    } catch (error) {
      // The snapshot stays recorded.
      this.logger.error('Notification delivery failed', {
        subscriberId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
