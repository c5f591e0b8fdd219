import { z } from 'zod';

export const CardTransactionSchema = z.object({
  date: z.string(),
  description: z.string(),
  amount: z.string(),
});

export const CardTransactionListSchema = z.array(CardTransactionSchema);

export type CardTransactionDTO = z.infer<typeof CardTransactionSchema>;
