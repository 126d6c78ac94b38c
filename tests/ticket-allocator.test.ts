import { describe, it, expect, beforeEach } from 'vitest';
import { OrderStatus, TicketStatus, type Raffle } from '../src/types/raffle.types';
import { ErrorCode } from '../src/types/error.types';
import type { Tenant } from '../src/types/tenant.types';
import { contact, createTestEngine, seedRaffle, seedTenant, type TestEngine } from './helpers';

describe('TicketAllocatorService', () => {
  let engine: TestEngine;
  let tenant: Tenant;
  let raffle: Raffle;

  beforeEach(async () => {
    engine = createTestEngine();
    tenant = await seedTenant(engine);
    raffle = await seedRaffle(engine, tenant.id);
  });

  const counts = () => engine.store.atomic((tx) => tx.tickets.counts(raffle.id));
  const numbersWith = (status: TicketStatus) =>
    engine.store.atomic((tx) => tx.tickets.listNumbers(raffle.id, status));

  describe('reserveSpecific', () => {
    it('holds the requested tickets for a pending order', async () => {
      const order = await engine.container.allocator.reserveSpecific(raffle.id, [3, 1], contact());

      expect(order).toMatchObject({
        tenantId: tenant.id,
        raffleId: raffle.id,
        contactId: 'contact-1',
        contactPhone: '+10000000001',
        contactName: 'Test Buyer',
        qty: 2,
        totalAmount: 20,
        currency: 'USD',
        status: OrderStatus.PENDING_PAYMENT,
      });
      expect(order.expiresAt?.toISOString()).toBe('2030-01-07T08:15:00.000Z');
      expect(await numbersWith(TicketStatus.RESERVED)).toEqual([1, 3]);

      const withTickets = await engine.container.orders.getOrder(order.id);
      expect(withTickets.ticketNumbers).toEqual([1, 3]);
    });

    it('rejects numbers held by another order and keeps the rest available', async () => {
      await engine.container.allocator.reserveSpecific(raffle.id, [4, 5], contact('contact-a'));

      await expect(
        engine.container.allocator.reserveSpecific(raffle.id, [2, 4], contact('contact-b'))
      ).rejects.toMatchObject({
        code: ErrorCode.INVALID_TICKET_NUMBERS,
        statusCode: 409,
        message: 'Tickets not available: 4',
        details: { unavailable: [4] },
      });
      expect(await counts()).toEqual({ total: 10, available: 8, reserved: 2, sold: 0 });
      expect(engine.store.tables.orders.size).toBe(1);
    });

    it('rejects numbers outside the raffle range', async () => {
      await expect(
        engine.container.allocator.reserveSpecific(raffle.id, [0, 11, 3], contact())
      ).rejects.toMatchObject({
        code: ErrorCode.INVALID_TICKET_NUMBERS,
        message: 'Invalid numbers: 0, 11',
        details: { invalid: [0, 11] },
      });
    });

    it('rejects duplicate numbers', async () => {
      await expect(engine.container.allocator.reserveSpecific(raffle.id, [2, 2], contact())).rejects.toMatchObject({
        code: ErrorCode.INVALID_TICKET_NUMBERS,
        message: 'Duplicate numbers are not allowed',
      });
    });

    it('reports numbers whose tickets were never generated', async () => {
      const bare = await engine.container.raffles.createRaffle(tenant.id, {
        title: 'Bare Raffle',
        ticketPrice: 5,
        maxNumber: 5,
      });

      await expect(engine.container.allocator.reserveSpecific(bare.id, [1], contact())).rejects.toMatchObject({
        code: ErrorCode.INVALID_TICKET_NUMBERS,
        message: 'Tickets not found: 1',
      });
    });

    it('enforces the maximum order size', async () => {
      engine = createTestEngine({ options: { maxTicketsPerOrder: 3 } });
      tenant = await seedTenant(engine);
      raffle = await seedRaffle(engine, tenant.id);

      await expect(
        engine.container.allocator.reserveSpecific(raffle.id, [1, 2, 3, 4], contact())
      ).rejects.toMatchObject({
        code: ErrorCode.INVALID_QUANTITY,
        statusCode: 400,
        message: 'Maximum 3 tickets allowed',
      });
    });

    it('checks the quantity before the numbers', async () => {
      await expect(engine.container.allocator.reserveSpecific(raffle.id, [], contact())).rejects.toMatchObject({
        code: ErrorCode.INVALID_QUANTITY,
        message: 'Minimum 1 ticket(s) required',
      });
    });

    it('hides inactive raffles and raffles of other tenants', async () => {
      const inactive = await seedRaffle(engine, tenant.id, { title: 'Closed', isActive: false });
      const other = await seedTenant(engine);

      await expect(engine.container.allocator.reserveSpecific(inactive.id, [1], contact())).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND_OR_INACTIVE,
        statusCode: 404,
        message: 'Raffle not found or is not active',
      });
      await expect(
        engine.container.allocator.reserveSpecific(raffle.id, [1], contact(), other.id)
      ).rejects.toMatchObject({ message: 'Raffle not found or is not active' });
    });

    it('applies tenant overrides for timeout and order size', async () => {
      const strict = await seedTenant(engine, { reservationTimeoutMinutes: 5, maxTicketsPerOrder: 2 });
      const strictRaffle = await seedRaffle(engine, strict.id);

      const order = await engine.container.allocator.reserveSpecific(strictRaffle.id, [1, 2], contact());

      expect(order.expiresAt?.toISOString()).toBe('2030-01-07T08:05:00.000Z');
      await expect(
        engine.container.allocator.reserveSpecific(strictRaffle.id, [3, 4, 5], contact())
      ).rejects.toMatchObject({ message: 'Maximum 2 tickets allowed' });
    });
  });

  describe('lazy expiry', () => {
    it('keeps a hold until its expiry instant has passed', async () => {
      await engine.container.allocator.reserveSpecific(raffle.id, [1], contact('contact-a'));
      engine.clock.advanceMinutes(15);

      await expect(
        engine.container.allocator.reserveSpecific(raffle.id, [1], contact('contact-b'))
      ).rejects.toMatchObject({ message: 'Tickets not available: 1' });
    });

    it('reallocates a lapsed hold without any sweep job', async () => {
      const first = await engine.container.allocator.reserveSpecific(raffle.id, [1, 2], contact('contact-a'));
      engine.clock.advanceMinutes(16);

      const second = await engine.container.allocator.reserveSpecific(raffle.id, [1], contact('contact-b'));

      expect(second.status).toBe(OrderStatus.PENDING_PAYMENT);
      expect(await numbersWith(TicketStatus.RESERVED)).toEqual([1]);
      expect(await numbersWith(TicketStatus.AVAILABLE)).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 10]);

      const stale = await engine.container.orders.getOrder(first.id);
      expect(stale.status).toBe(OrderStatus.EXPIRED);
    });
  });

  describe('reserveRandom', () => {
    it('holds the requested quantity of distinct tickets', async () => {
      const order = await engine.container.allocator.reserveRandom(raffle.id, 3, contact());

      const reserved = await numbersWith(TicketStatus.RESERVED);
      expect(order.qty).toBe(3);
      expect(order.totalAmount).toBe(30);
      expect(reserved).toHaveLength(3);
      expect(new Set(reserved).size).toBe(3);
      expect((await engine.container.orders.getOrder(order.id)).ticketNumbers).toEqual(reserved);
    });

    it('never picks a held ticket', async () => {
      await engine.container.allocator.reserveSpecific(raffle.id, [1, 2, 3, 4, 5, 6, 7], contact('contact-a'));

      await engine.container.allocator.reserveRandom(raffle.id, 3, contact('contact-b'));

      expect(await counts()).toEqual({ total: 10, available: 0, reserved: 10, sold: 0 });
    });

    it('reports how many tickets are left when there are too few', async () => {
      await engine.container.allocator.reserveSpecific(raffle.id, [1, 2, 3, 4, 5, 6, 7, 8], contact('contact-a'));

      await expect(engine.container.allocator.reserveRandom(raffle.id, 3, contact('contact-b'))).rejects.toMatchObject({
        code: ErrorCode.INVALID_QUANTITY,
        message: 'Only 2 ticket(s) available, you requested 3',
        details: { available: 2, requested: 3 },
      });
      expect(await counts()).toMatchObject({ available: 2, reserved: 8 });
    });

    it('rejects a non-positive quantity', async () => {
      await expect(engine.container.allocator.reserveRandom(raffle.id, 0, contact())).rejects.toMatchObject({
        code: ErrorCode.INVALID_QUANTITY,
        message: 'Minimum 1 ticket(s) required',
      });
    });

    it('draws from tickets released by lazy expiry', async () => {
      await engine.container.allocator.reserveSpecific(raffle.id, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10], contact('a'));
      engine.clock.advanceMinutes(16);

      const order = await engine.container.allocator.reserveRandom(raffle.id, 10, contact('b'));

      expect(order.qty).toBe(10);
      expect(await counts()).toEqual({ total: 10, available: 0, reserved: 10, sold: 0 });
    });
  });
});
