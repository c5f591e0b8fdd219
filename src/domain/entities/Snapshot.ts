import type { CardTransaction } from './Transaction.js';

export interface Snapshot {
  subscriberId: string;
  /** `null` when the balance could not be determined. Never read it as zero. */
  balance: number | null;
  transactions: CardTransaction[];
  checkedAt: string; // ISO timestamp
}
