import { z } from 'zod';
import { isValidDateString } from '../utils/time';

/**
 * Appointment and availability validation schemas
 */

const tenantServiceParams = z.object({
  tenantId: z.string().uuid('Invalid tenant ID format'),
  serviceId: z.string().uuid('Invalid service ID format'),
});

const appointmentParams = z.object({
  tenantId: z.string().uuid('Invalid tenant ID format'),
  appointmentId: z.string().uuid('Invalid appointment ID format'),
});

const calendarDate = (field: string) =>
  z.string({ required_error: `${field} is required` }).refine(isValidDateString, {
    message: `${field} must be a valid YYYY-MM-DD date`,
  });

const instant = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .datetime({ offset: true, message: `${field} must be an ISO 8601 timestamp` })
    .transform((value) => new Date(value));

export const customerSchema = z.object({
  name: z.string().max(200, 'Name must be at most 200 characters').default(''),
  phone: z.string().min(1, 'Phone is required').max(32, 'Phone must be at most 32 characters'),
  email: z.string().email('Invalid email address').max(254).optional(),
});

// Create appointment request schema
export const createAppointmentSchema = z.object({
  params: z.object({
    tenantId: z.string().uuid('Invalid tenant ID format'),
  }),
  body: z.object({
    serviceId: z.string().uuid('Invalid service ID format'),
    customer: customerSchema,
    scheduledAt: instant('scheduledAt'),
    notes: z.string().max(2000, 'Notes must be at most 2000 characters').optional(),
  }),
});

export const appointmentParamsSchema = z.object({
  params: appointmentParams,
});

export const confirmAppointmentSchema = z.object({
  params: appointmentParams,
  body: z
    .object({
      paymentTransactionId: z.string().uuid('Invalid payment transaction ID format').optional(),
    })
    .default({}),
});

export const cancelAppointmentSchema = z.object({
  params: appointmentParams,
  body: z
    .object({
      reason: z.string().max(500, 'Reason must be at most 500 characters').optional(),
    })
    .default({}),
});

export const serviceParamsSchema = z.object({
  params: tenantServiceParams,
});

// GET .../slots?date=YYYY-MM-DD[&duration=N]
export const availableSlotsSchema = z.object({
  params: tenantServiceParams,
  query: z.object({
    date: calendarDate('date'),
    duration: z.coerce.number().int('Duration must be an integer').min(5).max(24 * 60).optional(),
  }),
});

export const nextSlotSchema = z.object({
  params: tenantServiceParams,
  query: z.object({
    from: instant('from').optional(),
  }),
});

export const calendarSchema = z.object({
  params: tenantServiceParams,
  query: z.object({
    startDate: calendarDate('startDate'),
    endDate: calendarDate('endDate'),
  }),
});

export type CreateAppointmentRequest = z.infer<typeof createAppointmentSchema>;
export type AvailableSlotsRequest = z.infer<typeof availableSlotsSchema>;
export type CalendarRequest = z.infer<typeof calendarSchema>;
