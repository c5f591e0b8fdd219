import type { CardTransaction } from '../../domain/entities/Transaction.js';
import type { BalanceCheckErrorCode } from '../errors/CheckErrors.js';

export interface CompletedCheck {
  status: 'ok';
  subscriberId: string;
  /** `null` when the page was fetched but no balance could be read from it. */
  balance: number | null;
  previousBalance: number | null;
  delta: number | null;
  changed: boolean;
  transactions: CardTransaction[];
  lastTransaction: CardTransaction | null;
  checkedAt: string;
}

export type CheckOutcome =
  | CompletedCheck
  | { status: 'in_progress'; subscriberId: string }
  | { status: 'not_registered'; subscriberId: string }
  | { status: 'timed_out'; subscriberId: string }
  | { status: 'failed'; subscriberId: string; reason: BalanceCheckErrorCode | 'unexpected_error' };

export type CheckStatus = CheckOutcome['status'];

export interface SweepReport {
  startedAt: string;
  finishedAt: string;
  checked: number;
  skipped: number;
  notified: number;
  timedOut: number;
  failed: number;
}
