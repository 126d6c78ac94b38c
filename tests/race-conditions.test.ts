import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode } from '../src/types/error.types';
import { OrderStatus, TicketStatus, type Order, type Raffle } from '../src/types/raffle.types';
import { contact, createTestEngine, seedRaffle, seedTenant, type TestEngine } from './helpers';

/**
 * Race conditions
 *
 * Competing transitions on one order. Whichever commits first decides the
 * outcome; the loser either sees the new status or is rejected, and the
 * tickets always agree with the final order status.
 */
describe('order race conditions', () => {
  let engine: TestEngine;
  let raffle: Raffle;
  let order: Order;

  beforeEach(async () => {
    engine = createTestEngine();
    const tenant = await seedTenant(engine);
    raffle = await seedRaffle(engine, tenant.id);
    order = await engine.container.allocator.reserveSpecific(raffle.id, [2, 7], contact());
  });

  const counts = () => engine.store.atomic((tx) => tx.tickets.counts(raffle.id));
  const finalStatus = async () => (await engine.container.orders.getOrder(order.id)).status;

  it('confirm vs expire: tickets follow the winner', async () => {
    engine.clock.advanceMinutes(16);

    const [confirm, expire] = await Promise.allSettled([
      engine.container.orders.confirmPaid(order.id),
      engine.container.orders.markExpired(order.id),
    ]);

    const status = await finalStatus();
    if (confirm.status === 'fulfilled') {
      expect(status).toBe(OrderStatus.PAID);
      expect(expire).toMatchObject({ status: 'fulfilled', value: { expired: false } });
      expect(await counts()).toMatchObject({ sold: 2, reserved: 0 });
    } else {
      expect(status).toBe(OrderStatus.EXPIRED);
      expect(confirm.reason).toMatchObject({ code: ErrorCode.INVALID_STATE_TRANSITION });
      expect(await counts()).toMatchObject({ available: 10, sold: 0 });
    }
  });

  it('release vs confirm: exactly one wins', async () => {
    const results = await Promise.allSettled([
      engine.container.orders.releaseReservations(order.id),
      engine.container.orders.confirmPaid(order.id),
    ]);

    const winners = results.filter((r) => r.status === 'fulfilled');
    expect(winners).toHaveLength(1);

    const status = await finalStatus();
    const ticketCounts = await counts();
    if (status === OrderStatus.PAID) {
      expect(ticketCounts).toMatchObject({ sold: 2, available: 8 });
      expect(engine.notifier.paid).toHaveLength(1);
    } else {
      expect(status).toBe(OrderStatus.CANCELLED);
      expect(ticketCounts).toMatchObject({ sold: 0, available: 10 });
      expect(engine.notifier.paid).toHaveLength(0);
    }
  });

  it('release vs expire: the order ends cancelled with every ticket free', async () => {
    engine.clock.advanceMinutes(16);

    const [release, expire] = await Promise.allSettled([
      engine.container.orders.releaseReservations(order.id),
      engine.container.orders.markExpired(order.id),
    ]);

    expect(release.status).toBe('fulfilled');
    expect(expire.status).toBe('fulfilled');
    const released =
      (release.status === 'fulfilled' ? release.value.released : 0) +
      (expire.status === 'fulfilled' ? expire.value.released : 0);
    expect(released).toBe(2);
    expect(await finalStatus()).toBe(OrderStatus.CANCELLED);
    expect(await counts()).toMatchObject({ available: 10, reserved: 0 });
  });

  it('multiple expiries: only one releases the tickets', async () => {
    engine.clock.advanceMinutes(16);

    const results = await Promise.all(
      Array.from({ length: 5 }, () => engine.container.orders.markExpired(order.id))
    );

    expect(results.filter((r) => r.expired)).toHaveLength(1);
    expect(results.reduce((sum, r) => sum + r.released, 0)).toBe(2);
  });

  it('concurrent releases: one succeeds, the rest are rejected', async () => {
    const results = await Promise.allSettled(
      Array.from({ length: 5 }, () => engine.container.orders.releaseReservations(order.id))
    );

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    for (const result of results.filter((r) => r.status === 'rejected')) {
      expect(result).toMatchObject({
        reason: { message: 'Cannot release tickets for order with status: CANCELLED' },
      });
    }
  });

  it('concurrent confirmations: one payment, one notification', async () => {
    const results = await Promise.allSettled(
      Array.from({ length: 5 }, () => engine.container.orders.confirmPaid(order.id))
    );

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(engine.notifier.paid).toHaveLength(1);
    expect(await counts()).toMatchObject({ sold: 2 });
  });

  it('sweep vs reallocation: the new order keeps the tickets', async () => {
    engine.clock.advanceMinutes(16);

    const [sweep, reallocation] = await Promise.all([
      engine.container.maintenance.expireOrders(),
      engine.container.allocator.reserveSpecific(raffle.id, [2, 7], contact('contact-2')),
    ]);

    expect(sweep.expiredOrderIds).toEqual([order.id]);
    expect(await finalStatus()).toBe(OrderStatus.EXPIRED);

    const held = engine.store.tables.tickets
      .all()
      .filter((t) => t.status === TicketStatus.RESERVED)
      .map((t) => ({ number: t.number, orderId: t.reservedByOrderId }))
      .sort((a, b) => a.number - b.number);
    expect(held).toEqual([
      { number: 2, orderId: reallocation.id },
      { number: 7, orderId: reallocation.id },
    ]);
  });
});
