import express from 'express';
import type { Response } from 'express';
import { z, ZodError } from 'zod';
import type { CheckOutcome } from './application/dto/CheckOutcomeDTO.js';
import type { Snapshot } from './domain/entities/Snapshot.js';
import type { Subscriber } from './domain/entities/Subscriber.js';
import { maskIdentifier } from './domain/services/IdentifierMasker.js';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

export const CHECK_MESSAGES = {
  in_progress: 'Sjekker saldo... vennligst vent.',
  not_registered: 'Du har ikke registrert et kortnummer ennå.',
  timed_out: 'Tidsavbrudd ved sjekking av saldo. Vennligst prøv igjen senere.',
  failed: 'En feil oppstod ved sjekking av saldo. Vennligst prøv igjen senere.',
  unavailable: 'Kunne ikke hente saldo. Vennligst prøv igjen senere.',
} as const;

const CHECK_STATUS_CODES: Record<CheckOutcome['status'], number> = {
  ok: 200,
  in_progress: 409,
  not_registered: 404,
  timed_out: 504,
  failed: 502,
};

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

const CheckQuerySchema = z.object({
  reply: z.enum(['true', 'false']).optional(),
});

const toSubscriberView = (subscriber: Subscriber) => ({
  subscriberId: subscriber.id,
  card: maskIdentifier(subscriber.identifier),
  displayName: subscriber.displayName ?? null,
  registeredAt: subscriber.registeredAt,
});

const toSnapshotView = (snapshot: Snapshot) => ({
  balance: snapshot.balance,
  transactions: snapshot.transactions,
  checkedAt: snapshot.checkedAt,
});

const sendValidationError = (res: Response, error: ZodError) =>
  res.status(400).json({ error: error.issues[0]?.message ?? 'Invalid request' });

export const createServer = (container: AppContainer) => {
  const app = express();
  const logger = container.logger;

  app.use(express.json({ limit: '100kb' }));

  const renderCheckMessage = (outcome: CheckOutcome): string => {
    if (outcome.status !== 'ok') {
      return CHECK_MESSAGES[outcome.status];
    }

    return outcome.balance === null
      ? CHECK_MESSAGES.unavailable
      : container.formatter.balanceReply(outcome.balance, outcome.lastTransaction);
  };

  const unexpected = (res: Response, label: string, error: unknown) => {
    logger.error(label, { error: error instanceof Error ? error.message : String(error) });
    res.status(500).json({ error: 'En feil oppstod. Vennligst prøv igjen senere.' });
  };

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Balance Watch API',
      version: '0.1.0',
      scheduler: container.scheduler.state,
      telegramConfigured: container.hasTelegram(),
      lastSweep: container.scheduler.lastSweep,
    });
  });

  app.put('/api/subscribers/:subscriberId', async (req, res) => {
    try {
      const subscriber = await container.subscriberService.register(req.params.subscriberId, req.body);
      res.json(toSubscriberView(subscriber));
    } catch (error) {
      if (error instanceof ZodError) {
        return sendValidationError(res, error);
      }
      unexpected(res, 'Registration failed', error);
    }
  });

  app.get('/api/subscribers/:subscriberId', async (req, res) => {
    try {
      const subscriber = await container.subscriberService.get(req.params.subscriberId);

      if (!subscriber) {
        return res.status(404).json({ error: CHECK_MESSAGES.not_registered });
      }

      res.json(toSubscriberView(subscriber));
    } catch (error) {
      unexpected(res, 'Subscriber lookup failed', error);
    }
  });

  app.post('/api/subscribers/:subscriberId/check', async (req, res) => {
    const query = CheckQuerySchema.safeParse(req.query);
    if (!query.success) {
      return sendValidationError(res, query.error);
    }

    const { subscriberId } = req.params;

    try {
      const outcome = await container.balanceCheckService.checkNow(subscriberId);
      const message = renderCheckMessage(outcome);

      let delivered: boolean | undefined;
      if (query.data.reply === 'true') {
        delivered = await container.notifier.sendText(subscriberId, message).then(
          () => true,
          (error: unknown) => {
            logger.warn('Reply delivery failed', {
              subscriberId,
              error: error instanceof Error ? error.message : String(error),
            });
            return false;
          },
        );
      }

      res.status(CHECK_STATUS_CODES[outcome.status]).json({ ...outcome, message, delivered });
    } catch (error) {
      unexpected(res, 'Balance check request failed', error);
    }
  });

  app.get('/api/subscribers/:subscriberId/snapshots', async (req, res) => {
    const query = HistoryQuerySchema.safeParse(req.query);
    if (!query.success) {
      return sendValidationError(res, query.error);
    }

    try {
      const snapshots = await container.subscriberService.history(req.params.subscriberId, query.data.limit);
      res.json({ subscriberId: req.params.subscriberId, snapshots: snapshots.map(toSnapshotView) });
    } catch (error) {
      unexpected(res, 'History lookup failed', error);
    }
  });

  app.get('/api/subscribers/:subscriberId/snapshots/latest', async (req, res) => {
    try {
      const snapshot = await container.subscriberService.latestSnapshot(req.params.subscriberId);

      if (!snapshot) {
        return res.status(404).json({ error: 'No snapshot recorded yet' });
      }

      res.json({ subscriberId: req.params.subscriberId, ...toSnapshotView(snapshot) });
    } catch (error) {
      unexpected(res, 'Latest snapshot lookup failed', error);
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  return app;
};
