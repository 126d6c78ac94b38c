import type { Store, Transaction } from '../store/store';
import {
  OrderStatus,
  canTransitionOrder,
  isOrderExpired,
  type ExpireOrderResult,
  type Order,
  type OrderPatch,
  type OrderWithTickets,
  type ReleaseResult,
} from '../types/raffle.types';
import { ErrorCode, ReservationError } from '../types/error.types';
import type { Clock } from '../utils/clock';
import { logger } from '../config/logger';
import type { NotificationSink } from './notification.service';

/**
 * Order Lifecycle
 *
 * DRAFT -> PENDING_PAYMENT | CANCELLED
 * PENDING_PAYMENT -> PAID | CANCELLED | EXPIRED
 * EXPIRED -> CANCELLED
 *
 * Ticket side effects belong to the transition itself: entering PAID sells
 * the order's held tickets, entering CANCELLED or EXPIRED releases them.
 * Locks are taken raffle first, then order, like the allocator.
 */
export class OrderLifecycleService {
  constructor(
    private store: Store,
    private clock: Clock,
    private notifier: NotificationSink
  ) {}

  isExpired(order: Pick<Order, 'status' | 'expiresAt'>, now: Date = this.clock.now()): boolean {
    return isOrderExpired(order, now);
  }

  /**
   * Cancel the order and return its held tickets to AVAILABLE.
   * Tickets no longer held by the order are left alone and not counted.
   */
  async releaseReservations(orderId: string, tenantId?: string): Promise<ReleaseResult> {
    return this.store.atomic(async (tx) => {
      const order = await this.lockOrder(tx, orderId, tenantId);
      if (!canTransitionOrder(order.status, OrderStatus.CANCELLED)) {
        throw new ReservationError(
          ErrorCode.INVALID_STATE_TRANSITION,
          `Cannot release tickets for order with status: ${order.status}`,
          { from: order.status, to: OrderStatus.CANCELLED }
        );
      }
      return this.transition(tx, order, OrderStatus.CANCELLED);
    });
  }

  /**
   * Mark a PENDING_PAYMENT order PAID and its held tickets SOLD.
   * The confirmation notification goes out after commit.
   */
  async confirmPaid(orderId: string, paymentProofMediaId?: string, tenantId?: string): Promise<Order> {
    const paid = await this.store.atomic(async (tx) => {
      const order = await this.lockOrder(tx, orderId, tenantId);
      if (order.status !== OrderStatus.PENDING_PAYMENT) {
        throw new ReservationError(
          ErrorCode.INVALID_STATE_TRANSITION,
          `Cannot confirm order with status: ${order.status}`,
          { from: order.status, to: OrderStatus.PAID }
        );
      }

      const held = await tx.tickets.countReservedForOrder(order.id);
      if (held === 0) {
        throw new ReservationError(ErrorCode.NO_RESERVED_INVENTORY, 'No tickets found for this order');
      }

      const patch: OrderPatch = {};
      if (paymentProofMediaId) {
        patch.paymentProofMediaId = paymentProofMediaId;
      }
      const result = await this.transition(tx, order, OrderStatus.PAID, patch);
      return result.order;
    });

    await this.notifyPaid(paid);
    return paid;
  }

  /**
   * Expire the order if it is still due. Safe to race with
   * releaseReservations: whichever commits second sees the new status.
   */
  async markExpired(orderId: string, tenantId?: string): Promise<ExpireOrderResult> {
    return this.store.atomic(async (tx) => {
      const order = await this.lockOrder(tx, orderId, tenantId);
      return this.expireIfDue(tx, order);
    });
  }

  /**
   * Order with its linked ticket numbers, after applying lazy expiry
   */
  async getOrder(orderId: string, tenantId?: string): Promise<OrderWithTickets> {
    return this.store.atomic(async (tx) => {
      const locked = await this.lockOrder(tx, orderId, tenantId);
      const { order } = await this.expireIfDue(tx, locked);
      const ticketNumbers = await tx.orders.linkedTicketNumbers(order.id);
      return { ...order, ticketNumbers };
    });
  }

  private async expireIfDue(tx: Transaction, order: Order): Promise<ExpireOrderResult> {
    if (!this.isExpired(order)) {
      return { order, expired: false, released: 0 };
    }
    const { order: expired, released } = await this.transition(tx, order, OrderStatus.EXPIRED);
    return { order: expired, expired: true, released };
  }

  /**
   * Raffle lock, then order lock. An order outside `tenantId` reads as missing.
   */
  private async lockOrder(tx: Transaction, orderId: string, tenantId?: string): Promise<Order> {
    const snapshot = await tx.orders.findById(orderId);
    if (!snapshot || (tenantId !== undefined && snapshot.tenantId !== tenantId)) {
      throw new ReservationError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Order not found');
    }

    await tx.raffles.lock(snapshot.raffleId);
    const order = await tx.orders.lock(orderId);
    if (!order) {
      throw new ReservationError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Order not found');
    }
    return order;
  }

  /**
   * Apply a status change together with its ticket side effects
   */
  private async transition(
    tx: Transaction,
    order: Order,
    target: OrderStatus,
    extra: OrderPatch = {}
  ): Promise<ReleaseResult> {
    if (!canTransitionOrder(order.status, target)) {
      throw new ReservationError(
        ErrorCode.INVALID_STATE_TRANSITION,
        `Cannot move order from ${order.status} to ${target}`,
        { from: order.status, to: target }
      );
    }

    const patch: OrderPatch = { ...extra, status: target };
    let released = 0;

    switch (target) {
      case OrderStatus.PAID: {
        const sold = await tx.tickets.sellForOrder(order.id);
        patch.paidAt = order.paidAt ?? this.clock.now();
        logger.info('Tickets sold', { orderId: order.id, sold });
        break;
      }
      case OrderStatus.CANCELLED:
      case OrderStatus.EXPIRED:
        released = await tx.tickets.releaseForOrder(order.id);
        break;
      default:
        break;
    }

    const updated = await tx.orders.update(order.id, patch);
    logger.info('Order status changed', { orderId: order.id, from: order.status, to: target, released });
    return { order: updated, released };
  }

  private async notifyPaid(order: Order): Promise<void> {
    try {
      await this.notifier.notifyPaymentConfirmed(order);
    } catch (error) {
      logger.error('Failed to send payment confirmation', {
        orderId: order.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
