import { z } from 'zod';
import type { TenantSettings } from '../types/tenant.types';
import { isValidTimeZone } from '../utils/time';

/**
 * Tenant validation schemas
 */

const businessHoursSchema = z
  .object({
    start: z.number().int('Business hours must be whole hours').min(0).max(23),
    end: z.number().int('Business hours must be whole hours').min(1).max(24),
  })
  .refine((hours) => hours.start < hours.end, {
    message: 'Business hours must start before they end',
    path: ['end'],
  });

// Stored settings, with every missing key filled from its default
export const tenantSettingsSchema = z
  .object({
    timezone: z
      .string()
      .refine(isValidTimeZone, { message: 'Unknown IANA timezone' })
      .default('UTC'),
    businessHours: businessHoursSchema.default({ start: 9, end: 18 }),
    slotIntervalMinutes: z.number().int().min(5).max(24 * 60).default(30),
    minTicketsPerOrder: z.number().int().positive().optional(),
    maxTicketsPerOrder: z.number().int().positive().optional(),
    reservationTimeoutMinutes: z.number().int().positive().optional(),
  })
  .refine(
    (s) =>
      s.minTicketsPerOrder === undefined ||
      s.maxTicketsPerOrder === undefined ||
      s.minTicketsPerOrder <= s.maxTicketsPerOrder,
    { message: 'minTicketsPerOrder must not exceed maxTicketsPerOrder', path: ['minTicketsPerOrder'] }
  );

/**
 * Settings as stored may predate newer keys; resolve them against defaults
 */
export function resolveTenantSettings(raw: unknown): TenantSettings {
  return tenantSettingsSchema.parse(raw ?? {});
}

// Create tenant request schema
export const createTenantSchema = z.object({
  body: z.object({
    slug: z
      .string()
      .min(1, 'Slug is required')
      .max(100, 'Slug must be at most 100 characters')
      .regex(/^[a-z0-9-]+$/, 'Slug may only contain lowercase letters, digits and dashes'),
    name: z.string().min(1, 'Name is required').max(200, 'Name must be at most 200 characters'),
    settings: tenantSettingsSchema.optional(),
  }),
});

export const tenantParamsSchema = z.object({
  params: z.object({
    tenantId: z.string().uuid('Invalid tenant ID format'),
  }),
});

// Create service request schema
export const createServiceSchema = z.object({
  params: z.object({
    tenantId: z.string().uuid('Invalid tenant ID format'),
  }),
  body: z.object({
    name: z.string().min(1, 'Name is required').max(200, 'Name must be at most 200 characters'),
    description: z.string().max(2000).optional(),
    durationMinutes: z
      .number({ required_error: 'Duration is required', invalid_type_error: 'Duration must be a number' })
      .int('Duration must be an integer')
      .min(5, 'Duration must be at least 5 minutes')
      .max(24 * 60, 'Duration must be at most 1440 minutes'),
    price: z
      .number({ required_error: 'Price is required' })
      .min(0, 'Price must not be negative')
      .multipleOf(0.01, 'Price must be in whole cents'),
    currency: z.string().length(3, 'Currency must be a 3-letter code').optional(),
    isActive: z.boolean().optional(),
    bufferTimeMinutes: z.number().int().min(0, 'Buffer time must not be negative').optional(),
    maxBookingsPerDay: z.number().int().min(1, 'Max bookings per day must be at least 1').optional(),
    advanceBookingDays: z.number().int().min(1, 'Advance booking days must be at least 1').optional(),
  }),
});

export type CreateTenantRequest = z.infer<typeof createTenantSchema>;
export type CreateServiceRequest = z.infer<typeof createServiceSchema>;
