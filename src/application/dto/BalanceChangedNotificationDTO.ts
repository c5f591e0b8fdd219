import { z } from 'zod';
import { CardTransactionSchema } from './CardTransactionDTO.js';

export const BalanceChangedNotificationSchema = z.object({
  subscriberId: z.string(),
  currentBalance: z.number(),
  previousBalance: z.number(),
  delta: z.number(),
  lastTransaction: CardTransactionSchema.nullable(),
  checkedAt: z.string(),
});

export type BalanceChangedNotificationDTO = z.infer<typeof BalanceChangedNotificationSchema>;
