import { z } from 'zod';
import { PaymentProvider, PaymentTransactionStatus } from '../types/payment.types';

/**
 * Payment transaction validation schemas
 */

const targetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ORDER'), orderId: z.string().uuid('Invalid order ID format') }),
  z.object({ kind: z.literal('APPOINTMENT'), appointmentId: z.string().uuid('Invalid appointment ID format') }),
]);

export const recordPaymentSchema = z.object({
  params: z.object({
    tenantId: z.string().uuid('Invalid tenant ID format'),
  }),
  body: z.object({
    provider: z.nativeEnum(PaymentProvider),
    externalId: z.string().min(1, 'External ID is required').max(255),
    amount: z
      .number({ required_error: 'Amount is required' })
      .positive('Amount must be positive')
      .multipleOf(0.01, 'Amount must be in whole cents'),
    currency: z.string().length(3, 'Currency must be a 3-letter code'),
    status: z.nativeEnum(PaymentTransactionStatus),
    target: targetSchema,
    rawResponse: z.record(z.unknown()).optional(),
    notes: z.string().max(2000).optional(),
  }),
});

export const paymentParamsSchema = z.object({
  params: z.object({
    tenantId: z.string().uuid('Invalid tenant ID format'),
    paymentId: z.string().uuid('Invalid payment ID format'),
  }),
});

export type RecordPaymentRequest = z.infer<typeof recordPaymentSchema>;
