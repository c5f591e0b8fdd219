import dayjs from 'dayjs';
import type { Snapshot } from '../../../domain/entities/Snapshot.js';
import type { Subscriber, SubscriberRef } from '../../../domain/entities/Subscriber.js';
import type { CardTransaction } from '../../../domain/entities/Transaction.js';
import type { LatestSnapshotQuery, StoragePort } from '../../../application/ports/StoragePort.js';

export class InMemoryStorageAdapter implements StoragePort {
  private readonly subscribers = new Map<string, Subscriber>();
  private readonly snapshots = new Map<string, Snapshot[]>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async getIdentifier(subscriberId: string): Promise<string | null> {
    return this.subscribers.get(subscriberId)?.identifier ?? null;
  }

  async getSubscriber(subscriberId: string): Promise<Subscriber | null> {
    const subscriber = this.subscribers.get(subscriberId);
    return subscriber ? { ...subscriber } : null;
  }

  async putIdentifier(subscriberId: string, identifier: string, displayName?: string): Promise<Subscriber> {
    const existing = this.subscribers.get(subscriberId);
    const subscriber: Subscriber = {
      id: subscriberId,
      identifier,
      displayName: displayName ?? existing?.displayName,
      registeredAt: existing?.registeredAt ?? dayjs(this.clock()).toISOString(),
    };

    this.subscribers.set(subscriberId, subscriber);
    return { ...subscriber };
  }

  async listSubscribers(): Promise<SubscriberRef[]> {
    // Map preserves insertion order, which is registration order.
    return Array.from(this.subscribers.values()).map((subscriber) => ({
      subscriberId: subscriber.id,
      identifier: subscriber.identifier,
    }));
  }

  async loadLatestSnapshot(subscriberId: string, query: LatestSnapshotQuery = {}): Promise<Snapshot | null> {
    const history = this.snapshots.get(subscriberId) ?? [];

    for (let index = history.length - 1; index >= 0; index -= 1) {
      const snapshot = history[index];
      if (!query.requireBalance || snapshot.balance !== null) {
        return { ...snapshot, transactions: [...snapshot.transactions] };
      }
    }

    return null;
  }

  async appendSnapshot(
    subscriberId: string,
    balance: number | null,
    transactions: CardTransaction[],
  ): Promise<Snapshot> {
    const snapshot: Snapshot = {
      subscriberId,
      balance,
      transactions: transactions.map((txn) => ({ ...txn })),
      checkedAt: dayjs(this.clock()).toISOString(),
    };

    const history = this.snapshots.get(subscriberId) ?? [];
    history.push(snapshot);
    this.snapshots.set(subscriberId, history);

    return { ...snapshot, transactions: [...snapshot.transactions] };
  }

  async listSnapshots(subscriberId: string, limit: number): Promise<Snapshot[]> {
    const history = this.snapshots.get(subscriberId) ?? [];
    return history
      .slice(-limit)
      .reverse()
      .map((snapshot) => ({ ...snapshot, transactions: [...snapshot.transactions] }));
  }

  async close(): Promise<void> {
    this.subscribers.clear();
    this.snapshots.clear();
  }
}
