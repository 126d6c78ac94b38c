import { z } from 'zod';

/**
 * Order validation schemas
 */

const orderParams = z.object({
  tenantId: z.string().uuid('Invalid tenant ID format'),
  orderId: z.string().uuid('Invalid order ID format'),
});

export const orderParamsSchema = z.object({
  params: orderParams,
});

export const confirmPaymentSchema = z.object({
  params: orderParams,
  body: z
    .object({
      paymentProofMediaId: z.string().min(1).max(255).optional(),
    })
    .default({}),
});

export const expireOrdersSchema = z.object({
  body: z
    .object({
      limit: z.number().int('Limit must be an integer').min(1).max(1000).optional(),
    })
    .default({}),
});

export type ConfirmPaymentRequest = z.infer<typeof confirmPaymentSchema>;
