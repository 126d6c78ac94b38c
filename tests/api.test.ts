import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from '../src/app';
import { createTestEngine, deferred, seedRaffle, seedService, seedTenant, tick, type TestEngine } from './helpers';

describe('HTTP API', () => {
  let engine: TestEngine;
  let app: Application;

  beforeEach(() => {
    engine = createTestEngine({ lockTimeoutMs: 50 });
    app = createApp(engine.container);
  });

  describe('service endpoints', () => {
    it('GET /health reports the store driver', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'healthy',
        timestamp: '2030-01-07T08:00:00.000Z',
        store: 'memory',
      });
    });

    it('GET /v1 returns version info', async () => {
      const res = await request(app).get('/v1');

      expect(res.body).toEqual({ version: '1.0.0', api: 'Booking & Allocation API' });
    });

    it('GET /openapi.json documents the reservation routes', async () => {
      const res = await request(app).get('/openapi.json');

      expect(res.status).toBe(200);
      expect(res.body.info.title).toBe('Booking & Allocation API');
      expect(Object.keys(res.body.paths)).toContain('/v1/tenants/{tenantId}/raffles/{raffleId}/reservations');
    });

    it('answers unknown routes with NOT_FOUND', async () => {
      const res = await request(app).get('/v2/nothing');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Route GET /v2/nothing not found' } });
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app).post('/v1/tenants').set('Content-Type', 'application/json').send('{"slug":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } });
    });
  });

  describe('tenants', () => {
    it('creates a tenant with default settings', async () => {
      const res = await request(app).post('/v1/tenants').send({ slug: 'studio-one', name: 'Studio One' });

      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({
        slug: 'studio-one',
        name: 'Studio One',
        isActive: true,
        settings: { timezone: 'UTC', businessHours: { start: 9, end: 18 }, slotIntervalMinutes: 30 },
      });
    });

    it('reports validation failures per field', async () => {
      const res = await request(app).post('/v1/tenants').send({ slug: 'Not A Slug', name: 'Studio' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: {
            errors: [{ field: 'body.slug', message: 'Slug may only contain lowercase letters, digits and dashes' }],
          },
        },
      });
    });

    it('rejects a duplicate slug with CONFLICT', async () => {
      await request(app).post('/v1/tenants').send({ slug: 'studio-one', name: 'Studio One' });

      const res = await request(app).post('/v1/tenants').send({ slug: 'studio-one', name: 'Studio Two' });

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('CONFLICT');
    });
  });

  describe('input limits', () => {
    it('rejects raffle numbering below 1 and fractional-cent prices', async () => {
      const tenant = await seedTenant(engine);

      const res = await request(app)
        .post(`/v1/tenants/${tenant.id}/raffles`)
        .send({ title: 'Odd Raffle', ticketPrice: 10.005, minNumber: 0, maxNumber: 5 });

      expect(res.status).toBe(400);
      expect(res.body.error.details.errors).toEqual([
        { field: 'body.ticketPrice', message: 'Ticket price must be in whole cents' },
        { field: 'body.minNumber', message: 'minNumber must be at least 1' },
      ]);
      expect(engine.store.tables.raffles.size).toBe(0);
    });

    it('rejects a customer phone longer than the stored column', async () => {
      const tenant = await seedTenant(engine);
      const service = await seedService(engine, tenant.id);

      const res = await request(app)
        .post(`/v1/tenants/${tenant.id}/appointments`)
        .send({
          serviceId: service.id,
          customer: { name: 'Alex Doe', phone: '1'.repeat(40) },
          scheduledAt: '2030-01-07T10:00:00Z',
        });

      expect(res.status).toBe(400);
      expect(res.body.error.details.errors).toEqual([
        { field: 'body.customer.phone', message: 'Phone must be at most 32 characters' },
      ]);
    });

    it('rejects a contact id longer than the stored column', async () => {
      const tenant = await seedTenant(engine);
      const raffle = await seedRaffle(engine, tenant.id);

      const res = await request(app)
        .post(`/v1/tenants/${tenant.id}/raffles/${raffle.id}/reservations`)
        .send({ numbers: [1], contact: { id: 'c'.repeat(101), phone: '+10000000001' } });

      expect(res.status).toBe(400);
      expect(res.body.error.details.errors).toEqual([
        { field: 'body.contact.id', message: 'Contact ID must be at most 100 characters' },
      ]);
      expect(engine.store.tables.orders.size).toBe(0);
    });
  });

  describe('booking flow', () => {
    it('lists slots, books one and refuses a double booking', async () => {
      const tenant = await seedTenant(engine);
      const service = await seedService(engine, tenant.id);
      const base = `/v1/tenants/${tenant.id}`;

      const slots = await request(app).get(`${base}/services/${service.id}/slots`).query({ date: '2030-01-07' });
      expect(slots.status).toBe(200);
      expect(slots.body.data.date).toBe('2030-01-07');
      expect(slots.body.data.slots).toHaveLength(17);
      expect(slots.body.data.slots[0]).toBe('2030-01-07T09:00:00.000Z');

      const booking = {
        serviceId: service.id,
        customer: { name: 'Alex Doe', phone: '+10000000001' },
        scheduledAt: '2030-01-07T10:00:00Z',
      };
      const created = await request(app).post(`${base}/appointments`).send(booking);
      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({ status: 'PENDING', scheduledAt: '2030-01-07T10:00:00.000Z' });

      const clash = await request(app)
        .post(`${base}/appointments`)
        .send({ ...booking, customer: { name: 'Sam Roe', phone: '+10000000002' } });
      expect(clash.status).toBe(409);
      expect(clash.body.error).toEqual({
        code: 'SLOT_UNAVAILABLE',
        message: 'This time slot is not available',
        details: { reason: 'overlap' },
      });

      const early = await request(app).post(`${base}/appointments/${created.body.data.id}/complete`);
      expect(early.status).toBe(409);
      expect(early.body.error.code).toBe('INVALID_STATE_TRANSITION');

      const confirmed = await request(app).post(`${base}/appointments/${created.body.data.id}/confirm`).send({});
      expect(confirmed.status).toBe(200);
      expect(confirmed.body).toMatchObject({ message: 'Appointment confirmed', data: { status: 'CONFIRMED' } });

      const notEnded = await request(app).post(`${base}/appointments/${created.body.data.id}/complete`);
      expect(notEnded.status).toBe(422);
      expect(notEnded.body.error.message).toBe('Cannot complete an appointment that has not ended yet');
    });

    it('rejects a booking in the past with 422', async () => {
      const tenant = await seedTenant(engine);
      const service = await seedService(engine, tenant.id);

      const res = await request(app)
        .post(`/v1/tenants/${tenant.id}/appointments`)
        .send({
          serviceId: service.id,
          customer: { name: 'Alex Doe', phone: '+10000000001' },
          scheduledAt: '2030-01-06T10:00:00Z',
        });

      expect(res.status).toBe(422);
      expect(res.body.error).toEqual({ code: 'INVALID_TIME_WINDOW', message: 'Cannot book appointments in the past' });
    });
  });

  describe('raffle flow', () => {
    it('reserves, rejects a taken number, confirms and reads the order', async () => {
      const tenant = await seedTenant(engine);
      const raffle = await seedRaffle(engine, tenant.id);
      const base = `/v1/tenants/${tenant.id}`;
      const buyer = { id: 'contact-1', phone: '+10000000001' };

      const reserved = await request(app)
        .post(`${base}/raffles/${raffle.id}/reservations`)
        .send({ numbers: [4], contact: buyer });
      expect(reserved.status).toBe(201);
      expect(reserved.body.data).toMatchObject({ status: 'PENDING_PAYMENT', qty: 1, totalAmount: 10 });

      const taken = await request(app)
        .post(`${base}/raffles/${raffle.id}/reservations`)
        .send({ numbers: [2, 4], contact: { id: 'contact-2', phone: '+10000000002' } });
      expect(taken.status).toBe(409);
      expect(taken.body.error).toEqual({
        code: 'INVALID_TICKET_NUMBERS',
        message: 'Tickets not available: 4',
        details: { unavailable: [4] },
      });

      const orderId: string = reserved.body.data.id;
      const paid = await request(app).post(`${base}/orders/${orderId}/confirm-payment`).send({});
      expect(paid.status).toBe(200);
      expect(paid.body).toMatchObject({ message: 'Payment confirmed', data: { status: 'PAID' } });

      const read = await request(app).get(`${base}/orders/${orderId}`);
      expect(read.body.data).toMatchObject({ status: 'PAID', ticketNumbers: [4] });

      const availability = await request(app).get(`${base}/raffles/${raffle.id}/availability`);
      expect(availability.body.data).toMatchObject({ availableCount: 9, soldCount: 1 });
    });

    it('rejects an oversized random request with 400', async () => {
      const tenant = await seedTenant(engine);
      const raffle = await seedRaffle(engine, tenant.id);

      const res = await request(app)
        .post(`/v1/tenants/${tenant.id}/raffles/${raffle.id}/reservations/random`)
        .send({ qty: 11, contact: { id: 'contact-1', phone: '+10000000001' } });

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'INVALID_QUANTITY',
        message: 'Only 10 ticket(s) available, you requested 11',
        details: { available: 10, requested: 11 },
      });
    });

    it('answers 503 with Retry-After when the raffle lock is busy', async () => {
      const tenant = await seedTenant(engine);
      const raffle = await seedRaffle(engine, tenant.id);
      const gate = deferred();
      const holder = engine.store.atomic(async (tx) => {
        await tx.raffles.lock(raffle.id);
        await gate.promise;
      });
      await tick();

      const res = await request(app)
        .post(`/v1/tenants/${tenant.id}/raffles/${raffle.id}/reservations`)
        .send({ numbers: [1], contact: { id: 'contact-1', phone: '+10000000001' } });
      gate.resolve();
      await holder;

      expect(res.status).toBe(503);
      expect(res.headers['retry-after']).toBe('1');
      expect(res.body.error).toMatchObject({ code: 'LOCK_TIMEOUT', details: { retryable: true } });
    });

    it('expires overdue orders through the maintenance endpoint', async () => {
      const tenant = await seedTenant(engine);
      const raffle = await seedRaffle(engine, tenant.id);
      const order = await engine.container.allocator.reserveSpecific(raffle.id, [1], {
        id: 'contact-1',
        phone: '+10000000001',
      });
      engine.clock.advanceMinutes(16);

      const res = await request(app).post('/v1/maintenance/expire-orders').send({});

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        data: { expiredCount: 1, expiredOrderIds: [order.id], failedOrderIds: [] },
        message: 'Expired 1 order',
      });
    });
  });
});
