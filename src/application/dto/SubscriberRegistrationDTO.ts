import { z } from 'zod';

const CARD_NUMBER_LENGTH = 12;

export const SubscriberRegistrationSchema = z.object({
  cardNumber: z
    .string()
    .transform((value) => value.replace(/\s+/g, ''))
    .pipe(
      z
        .string()
        .regex(new RegExp(`^\\d{${CARD_NUMBER_LENGTH}}$`), `Card number must be ${CARD_NUMBER_LENGTH} digits`),
    ),
  displayName: z.string().trim().min(1).max(64).optional(),
});

export type SubscriberRegistrationDTO = z.infer<typeof SubscriberRegistrationSchema>;
