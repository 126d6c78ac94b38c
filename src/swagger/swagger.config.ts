import path from 'node:path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

const uuidPathParam = (name: string) => ({
  in: 'path',
  name,
  required: true,
  schema: { type: 'string', format: 'uuid' },
});

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Booking & Allocation API',
      version: '1.0.0',
      description: `
A multi-tenant engine for appointment booking and raffle ticket allocation.

## Appointments
- Slot discovery per service: business hours, slot interval, buffer time and a daily cap
- Booking locks the service row, so two requests for overlapping slots are decided one after the other
- Lifecycle: PENDING -> CONFIRMED -> COMPLETED | NO_SHOW, with CANCELLED from PENDING or CONFIRMED

## Raffle tickets
- Reserve chosen numbers or a uniformly random set of available numbers
- Reservations hold tickets for ${env.RESERVATION_TIMEOUT_MINUTES} minutes (tenants may override)
- Lapsed holds are released lazily by the next allocation on the raffle; no background job is required
- Lifecycle: PENDING_PAYMENT -> PAID | CANCELLED | EXPIRED

## Concurrency Guarantees
A ticket is held by at most one order and an appointment slot by at most one booking.
Lock waits are bounded; a timeout answers 503 with \`LOCK_TIMEOUT\` and may be retried.
      `.trim(),
      contact: {
        name: 'API Support',
      },
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Tenants', description: 'Tenant provisioning' },
      { name: 'Services', description: 'Bookable services' },
      { name: 'Availability', description: 'Slot discovery' },
      { name: 'Appointments', description: 'Booking lifecycle operations' },
      { name: 'Raffles', description: 'Raffle administration' },
      { name: 'Reservations', description: 'Ticket allocation' },
      { name: 'Orders', description: 'Order lifecycle operations' },
      { name: 'Payments', description: 'Payment transactions' },
      { name: 'Maintenance', description: 'System maintenance operations' },
    ],
    components: {
      parameters: {
        TenantId: uuidPathParam('tenantId'),
        ServiceId: uuidPathParam('serviceId'),
        AppointmentId: uuidPathParam('appointmentId'),
        RaffleId: uuidPathParam('raffleId'),
        OrderId: uuidPathParam('orderId'),
      },
      schemas: {
        TenantSettings: {
          type: 'object',
          properties: {
            timezone: { type: 'string', example: 'America/Asuncion' },
            businessHours: {
              type: 'object',
              properties: {
                start: { type: 'integer', minimum: 0, maximum: 23, example: 9 },
                end: { type: 'integer', minimum: 1, maximum: 24, example: 18 },
              },
            },
            slotIntervalMinutes: { type: 'integer', example: 30 },
            minTicketsPerOrder: { type: 'integer' },
            maxTicketsPerOrder: { type: 'integer' },
            reservationTimeoutMinutes: { type: 'integer' },
          },
        },
        Contact: {
          type: 'object',
          required: ['id', 'phone'],
          properties: {
            id: { type: 'string', description: 'Identifier of the buyer in the messaging channel' },
            phone: { type: 'string' },
            name: { type: 'string' },
          },
        },
        Order: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            raffleId: { type: 'string', format: 'uuid' },
            qty: { type: 'integer' },
            totalAmount: { type: 'number' },
            status: {
              type: 'string',
              enum: ['DRAFT', 'PENDING_PAYMENT', 'PAID', 'CANCELLED', 'EXPIRED'],
            },
            expiresAt: { type: 'string', format: 'date-time', nullable: true },
            paidAt: { type: 'string', format: 'date-time', nullable: true },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: {
                  type: 'string',
                  description: 'Error code',
                },
                message: {
                  type: 'string',
                  description: 'Human-readable error message',
                },
                details: {
                  type: 'object',
                  description: 'Additional error details',
                },
              },
            },
          },
        },
      },
    },
  },
  // Route files with JSDoc comments, as sources or compiled output
  apis: [path.join(__dirname, '../routes/**/*.{ts,js}')],
};

let cached: object | null = null;

export function getOpenApiSpec(): object {
  if (!cached) {
    cached = swaggerJsdoc(options);
  }
  return cached;
}
