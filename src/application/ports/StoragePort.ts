import type { CardTransaction } from '../../domain/entities/Transaction.js';
import type { Snapshot } from '../../domain/entities/Snapshot.js';
import type { Subscriber, SubscriberRef } from '../../domain/entities/Subscriber.js';

export interface LatestSnapshotQuery {
  /** Skip attempts where the balance could not be determined. */
  requireBalance?: boolean;
}

export interface StoragePort {
  getIdentifier(subscriberId: string): Promise<string | null>;
  getSubscriber(subscriberId: string): Promise<Subscriber | null>;
  putIdentifier(subscriberId: string, identifier: string, displayName?: string): Promise<Subscriber>;
  listSubscribers(): Promise<SubscriberRef[]>;
  loadLatestSnapshot(subscriberId: string, query?: LatestSnapshotQuery): Promise<Snapshot | null>;
  appendSnapshot(subscriberId: string, balance: number | null, transactions: CardTransaction[]): Promise<Snapshot>;
  listSnapshots(subscriberId: string, limit: number): Promise<Snapshot[]>;
  close(): Promise<void>;
}
