import type { Snapshot } from '../../domain/entities/Snapshot.js';
import type { Subscriber } from '../../domain/entities/Subscriber.js';
import { maskIdentifier } from '../../domain/services/IdentifierMasker.js';
import { SubscriberRegistrationSchema } from '../dto/SubscriberRegistrationDTO.js';
import type { LoggerPort } from '../ports/LoggerPort.js';
import type { StoragePort } from '../ports/StoragePort.js';

const MAX_HISTORY = 100;

export class SubscriberService {
  constructor(
    private readonly storage: StoragePort,
    private readonly logger: LoggerPort,
  ) {}

  /**
   * Registers a card for the subscriber, replacing any card registered before.
   * Throws a `ZodError` when the input is not a 12-digit card number.
   */
  async register(subscriberId: string, input: unknown): Promise<Subscriber> {
    const { cardNumber, displayName } = SubscriberRegistrationSchema.parse(input);
    const previous = await this.storage.getIdentifier(subscriberId);
    const subscriber = await this.storage.putIdentifier(subscriberId, cardNumber, displayName);

    this.logger.info(previous ? 'Card number replaced' : 'Subscriber registered', {
      subscriberId,
      card: maskIdentifier(cardNumber),
    });

    return subscriber;
  }

  async get(subscriberId: string): Promise<Subscriber | null> {
    return this.storage.getSubscriber(subscriberId);
  }

  async latestSnapshot(subscriberId: string): Promise<Snapshot | null> {
    return this.storage.loadLatestSnapshot(subscriberId);
  }

  async history(subscriberId: string, limit = 20): Promise<Snapshot[]> {
    const bounded = Math.min(Math.max(Math.trunc(limit), 1), MAX_HISTORY);
    return this.storage.listSnapshots(subscriberId, bounded);
  }
}
