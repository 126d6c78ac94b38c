import { z } from 'zod';

/**
 * Raffle validation schemas
 *
 * Length and range limits mirror the column definitions in
 * migrations/001_initial_schema.sql.
 */

const raffleParams = z.object({
  tenantId: z.string().uuid('Invalid tenant ID format'),
  raffleId: z.string().uuid('Invalid raffle ID format'),
});

export const contactSchema = z.object({
  id: z.string().min(1, 'Contact ID is required').max(100, 'Contact ID must be at most 100 characters'),
  phone: z.string().min(1, 'Contact phone is required').max(32, 'Contact phone must be at most 32 characters'),
  name: z.string().max(200).optional(),
});

// Create raffle request schema
export const createRaffleSchema = z.object({
  params: z.object({
    tenantId: z.string().uuid('Invalid tenant ID format'),
  }),
  body: z.object({
    title: z.string().min(1, 'Title is required').max(200, 'Title must be at most 200 characters'),
    description: z.string().max(5000).optional(),
    ticketPrice: z
      .number({ required_error: 'Ticket price is required', invalid_type_error: 'Ticket price must be a number' })
      .positive('Ticket price must be positive')
      .multipleOf(0.01, 'Ticket price must be in whole cents'),
    currency: z.string().length(3, 'Currency must be a 3-letter code').optional(),
    isActive: z.boolean().optional(),
    minNumber: z.number().int('minNumber must be an integer').min(1, 'minNumber must be at least 1').optional(),
    maxNumber: z
      .number({ required_error: 'maxNumber is required' })
      .int('maxNumber must be an integer')
      .min(1, 'maxNumber must be at least 1'),
    drawDate: z
      .string()
      .datetime({ offset: true, message: 'drawDate must be an ISO 8601 timestamp' })
      .transform((value) => new Date(value))
      .nullable()
      .optional(),
  }),
});

export const raffleParamsSchema = z.object({
  params: raffleParams,
});

export const generateTicketsSchema = z.object({
  params: raffleParams,
  body: z
    .object({
      force: z.boolean().optional(),
    })
    .default({}),
});

export const reserveSpecificSchema = z.object({
  params: raffleParams,
  body: z.object({
    numbers: z
      .array(z.number().int('Ticket numbers must be integers'), { required_error: 'Numbers are required' })
      .min(1, 'At least one number is required'),
    contact: contactSchema,
  }),
});

export const reserveRandomSchema = z.object({
  params: raffleParams,
  body: z.object({
    qty: z
      .number({ required_error: 'Quantity is required', invalid_type_error: 'Quantity must be a number' })
      .int('Quantity must be an integer')
      .positive('Quantity must be positive'),
    contact: contactSchema,
  }),
});

export type CreateRaffleRequest = z.infer<typeof createRaffleSchema>;
export type ReserveSpecificRequest = z.infer<typeof reserveSpecificSchema>;
export type ReserveRandomRequest = z.infer<typeof reserveRandomSchema>;
