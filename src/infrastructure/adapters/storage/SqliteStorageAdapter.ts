import Database from 'better-sqlite3';
import dayjs from 'dayjs';
import { z } from 'zod';
import { CardTransactionListSchema } from '../../../application/dto/CardTransactionDTO.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import type { LatestSnapshotQuery, StoragePort } from '../../../application/ports/StoragePort.js';
import type { Snapshot } from '../../../domain/entities/Snapshot.js';
import type { Subscriber, SubscriberRef } from '../../../domain/entities/Subscriber.js';
import type { CardTransaction } from '../../../domain/entities/Transaction.js';

const SubscriberRowSchema = z.object({
  subscriber_id: z.string(),
  card_number: z.string(),
  display_name: z.string().nullable(),
  registered_at: z.string(),
});

const SnapshotRowSchema = z.object({
  subscriber_id: z.string(),
  balance: z.number().nullable(),
  transactions: z.string().nullable(),
  checked_at: z.string(),
});

type SnapshotRow = z.infer<typeof SnapshotRowSchema>;

export class SqliteStorageAdapter implements StoragePort {
  private readonly db: Database.Database;

  constructor(
    filename: string,
    private readonly logger: LoggerPort,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS subscribers (
        subscriber_id TEXT PRIMARY KEY,
        card_number TEXT NOT NULL,
        display_name TEXT,
        registered_at TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS balance_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        subscriber_id TEXT NOT NULL,
        balance REAL,
        transactions TEXT,
        checked_at TEXT NOT NULL,
        FOREIGN KEY (subscriber_id) REFERENCES subscribers (subscriber_id)
      )
    `);

    this.db.exec(
      'CREATE INDEX IF NOT EXISTS balance_history_subscriber ON balance_history (subscriber_id, id)',
    );
  }

  async getIdentifier(subscriberId: string): Promise<string | null> {
    const subscriber = await this.getSubscriber(subscriberId);
    return subscriber?.identifier ?? null;
  }

  async getSubscriber(subscriberId: string): Promise<Subscriber | null> {
    const row = this.db
      .prepare('SELECT subscriber_id, card_number, display_name, registered_at FROM subscribers WHERE subscriber_id = ?')
      .get(subscriberId);

    return row ? this.mapSubscriber(SubscriberRowSchema.parse(row)) : null;
  }

  async putIdentifier(subscriberId: string, identifier: string, displayName?: string): Promise<Subscriber> {
    // Replacing a card keeps the first registration time and snapshot history.
    this.db
      .prepare(
        `INSERT INTO subscribers (subscriber_id, card_number, display_name, registered_at)
         VALUES (@subscriberId, @identifier, @displayName, @registeredAt)
         ON CONFLICT (subscriber_id) DO UPDATE SET
           card_number = excluded.card_number,
           display_name = COALESCE(excluded.display_name, subscribers.display_name)`,
      )
      .run({
        subscriberId,
        identifier,
        displayName: displayName ?? null,
        registeredAt: dayjs(this.clock()).toISOString(),
      });

    const stored = await this.getSubscriber(subscriberId);
    if (!stored) {
      throw new Error(`Subscriber ${subscriberId} was not persisted`);
    }

    return stored;
  }

  async listSubscribers(): Promise<SubscriberRef[]> {
    const rows = this.db
      .prepare('SELECT subscriber_id, card_number, display_name, registered_at FROM subscribers ORDER BY registered_at, rowid')
      .all();

    return rows.map((row) => {
      const subscriber = SubscriberRowSchema.parse(row);
      return { subscriberId: subscriber.subscriber_id, identifier: subscriber.card_number };
    });
  }

  async loadLatestSnapshot(subscriberId: string, query: LatestSnapshotQuery = {}): Promise<Snapshot | null> {
    const balanceFilter = query.requireBalance ? 'AND balance IS NOT NULL' : '';
    const row = this.db
      .prepare(
        `SELECT subscriber_id, balance, transactions, checked_at
         FROM balance_history
         WHERE subscriber_id = ? ${balanceFilter}
         ORDER BY id DESC
         LIMIT 1`,
      )
      .get(subscriberId);

    return row ? this.mapSnapshot(SnapshotRowSchema.parse(row)) : null;
  }

  async appendSnapshot(
    subscriberId: string,
    balance: number | null,
    transactions: CardTransaction[],
  ): Promise<Snapshot> {
    const checkedAt = dayjs(this.clock()).toISOString();

    this.db
      .prepare(
        'INSERT INTO balance_history (subscriber_id, balance, transactions, checked_at) VALUES (?, ?, ?, ?)',
      )
      .run(subscriberId, balance, JSON.stringify(transactions), checkedAt);

    return { subscriberId, balance, transactions: transactions.map((txn) => ({ ...txn })), checkedAt };
  }

  async listSnapshots(subscriberId: string, limit: number): Promise<Snapshot[]> {
    const rows = this.db
      .prepare(
        `SELECT subscriber_id, balance, transactions, checked_at
         FROM balance_history
         WHERE subscriber_id = ?
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(subscriberId, limit);

    return rows.map((row) => this.mapSnapshot(SnapshotRowSchema.parse(row)));
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private mapSubscriber(row: z.infer<typeof SubscriberRowSchema>): Subscriber {
    return {
      id: row.subscriber_id,
      identifier: row.card_number,
      displayName: row.display_name ?? undefined,
      registeredAt: row.registered_at,
    };
  }

  private mapSnapshot(row: SnapshotRow): Snapshot {
    return {
      subscriberId: row.subscriber_id,
      balance: row.balance,
      transactions: this.parseTransactions(row),
      checkedAt: row.checked_at,
    };
  }

  private parseTransactions(row: SnapshotRow): CardTransaction[] {
    if (!row.transactions) {
      return [];
    }

    try {
      return CardTransactionListSchema.parse(JSON.parse(row.transactions));
    } catch (error) {
      this.logger.warn('Stored transactions could not be read', {
        subscriberId: row.subscriber_id,
        checkedAt: row.checked_at,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}
