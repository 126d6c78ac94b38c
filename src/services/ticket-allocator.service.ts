import type { Store, Transaction } from '../store/store';
import {
  OrderStatus,
  TicketStatus,
  type Contact,
  type Order,
  type Raffle,
  type TicketNumber,
} from '../types/raffle.types';
import { ErrorCode, ReservationError } from '../types/error.types';
import { resolveTenantSettings } from '../validators/tenant.validator';
import type { Clock } from '../utils/clock';
import type { RandomSource } from '../utils/random';
import { multiplyAmount } from '../utils/money';
import { addMinutes } from '../utils/time';
import { logger } from '../config/logger';

export interface AllocatorOptions {
  reservationTimeoutMinutes: number;
  minTicketsPerOrder: number;
  maxTicketsPerOrder: number;
  // Page size of the AVAILABLE-ticket cursor used by reserveRandom
  scanBatchSize: number;
}

type ReservationLimits = Omit<AllocatorOptions, 'scanBatchSize'>;

const list = (numbers: number[]): string => numbers.join(', ');

/**
 * Ticket Allocator
 *
 * Both entry points hold the raffle row lock for the whole transaction:
 * the first caller to take it wins and later callers see its reservations.
 * Expired holds are released at the start of every allocation, so a lapsed
 * RESERVED ticket is allocatable again without any background job.
 */
export class TicketAllocatorService {
  constructor(
    private store: Store,
    private clock: Clock,
    private random: RandomSource,
    private options: AllocatorOptions
  ) {}

  async reserveSpecific(raffleId: string, numbers: number[], contact: Contact, tenantId?: string): Promise<Order> {
    logger.info('Reserving specific tickets', { raffleId, numbers, contactId: contact.id });

    const order = await this.store.atomic(async (tx) => {
      const { raffle, limits } = await this.lockRaffle(tx, raffleId, tenantId);
      this.checkQuantity(numbers.length, limits);

      const invalid = numbers.filter((n) => !Number.isInteger(n) || n < raffle.minNumber || n > raffle.maxNumber);
      if (invalid.length > 0) {
        throw new ReservationError(ErrorCode.INVALID_TICKET_NUMBERS, `Invalid numbers: ${list(invalid)}`, {
          invalid,
        });
      }
      if (new Set(numbers).size !== numbers.length) {
        throw new ReservationError(ErrorCode.INVALID_TICKET_NUMBERS, 'Duplicate numbers are not allowed');
      }

      const now = this.clock.now();
      await this.sweepExpired(tx, raffle.id, now);

      const tickets = await tx.tickets.lockByNumbers(raffle.id, numbers);
      this.assertAllAvailable(numbers, tickets);

      return this.placeOrder(tx, raffle, tickets, contact, limits, now);
    });

    logger.info('Tickets reserved', { orderId: order.id, raffleId, qty: order.qty, expiresAt: order.expiresAt });
    return order;
  }

  /**
   * Reserve `qty` tickets drawn uniformly from those AVAILABLE.
   *
   * The AVAILABLE set is streamed through a keyset cursor into a reservoir,
   * so memory stays proportional to qty whatever the raffle size.
   */
  async reserveRandom(raffleId: string, qty: number, contact: Contact, tenantId?: string): Promise<Order> {
    logger.info('Reserving random tickets', { raffleId, qty, contactId: contact.id });

    const order = await this.store.atomic(async (tx) => {
      const { raffle, limits } = await this.lockRaffle(tx, raffleId, tenantId);
      this.checkQuantity(qty, limits);

      const now = this.clock.now();
      await this.sweepExpired(tx, raffle.id, now);

      const sample = await this.random.sampleWithoutReplacement(
        tx.tickets.scanAvailable(raffle.id, this.options.scanBatchSize),
        qty
      );
      if (sample.seen < qty) {
        throw new ReservationError(
          ErrorCode.INVALID_QUANTITY,
          `Only ${sample.seen} ticket(s) available, you requested ${qty}`,
          { available: sample.seen, requested: qty }
        );
      }

      const numbers = sample.items.map((t) => t.number);
      const tickets = await tx.tickets.lockByNumbers(raffle.id, numbers);
      this.assertAllAvailable(numbers, tickets);

      return this.placeOrder(tx, raffle, tickets, contact, limits, now);
    });

    logger.info('Tickets reserved', { orderId: order.id, raffleId, qty: order.qty, expiresAt: order.expiresAt });
    return order;
  }

  /**
   * Lock the raffle row and resolve the reservation limits of its tenant.
   * A raffle of another tenant is reported exactly like a missing one.
   */
  private async lockRaffle(
    tx: Transaction,
    raffleId: string,
    tenantId?: string
  ): Promise<{ raffle: Raffle; limits: ReservationLimits }> {
    const raffle = await tx.raffles.lock(raffleId);
    if (!raffle || !raffle.isActive || (tenantId !== undefined && raffle.tenantId !== tenantId)) {
      throw new ReservationError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Raffle not found or is not active');
    }

    const tenant = await tx.tenants.findById(raffle.tenantId);
    const settings = tenant ? resolveTenantSettings(tenant.settings) : null;

    return {
      raffle,
      limits: {
        reservationTimeoutMinutes: settings?.reservationTimeoutMinutes ?? this.options.reservationTimeoutMinutes,
        minTicketsPerOrder: settings?.minTicketsPerOrder ?? this.options.minTicketsPerOrder,
        maxTicketsPerOrder: settings?.maxTicketsPerOrder ?? this.options.maxTicketsPerOrder,
      },
    };
  }

  private checkQuantity(qty: number, limits: ReservationLimits): void {
    if (!Number.isInteger(qty) || qty < limits.minTicketsPerOrder) {
      throw new ReservationError(ErrorCode.INVALID_QUANTITY, `Minimum ${limits.minTicketsPerOrder} ticket(s) required`);
    }
    if (qty > limits.maxTicketsPerOrder) {
      throw new ReservationError(ErrorCode.INVALID_QUANTITY, `Maximum ${limits.maxTicketsPerOrder} tickets allowed`);
    }
  }

  private async sweepExpired(tx: Transaction, raffleId: string, now: Date): Promise<void> {
    const released = await tx.tickets.releaseExpired(raffleId, now);
    if (released > 0) {
      logger.info('Released expired ticket holds', { raffleId, released });
    }
  }

  private assertAllAvailable(requested: number[], locked: TicketNumber[]): void {
    const found = new Set(locked.map((t) => t.number));
    const missing = requested.filter((n) => !found.has(n)).sort((a, b) => a - b);
    if (missing.length > 0) {
      throw new ReservationError(ErrorCode.INVALID_TICKET_NUMBERS, `Tickets not found: ${list(missing)}`, {
        missing,
      });
    }

    const unavailable = locked.filter((t) => t.status !== TicketStatus.AVAILABLE).map((t) => t.number);
    if (unavailable.length > 0) {
      throw new ReservationError(ErrorCode.INVALID_TICKET_NUMBERS, `Tickets not available: ${list(unavailable)}`, {
        unavailable,
      });
    }
  }

  private async placeOrder(
    tx: Transaction,
    raffle: Raffle,
    tickets: TicketNumber[],
    contact: Contact,
    limits: ReservationLimits,
    now: Date
  ): Promise<Order> {
    const expiresAt = addMinutes(now, limits.reservationTimeoutMinutes);
    const order = await tx.orders.insert({
      tenantId: raffle.tenantId,
      raffleId: raffle.id,
      contact,
      qty: tickets.length,
      totalAmount: multiplyAmount(raffle.ticketPrice, tickets.length),
      currency: raffle.currency,
      status: OrderStatus.PENDING_PAYMENT,
      expiresAt,
    });

    const ticketIds = tickets.map((t) => t.id);
    await tx.tickets.markReserved(ticketIds, order.id, expiresAt);
    await tx.orders.linkTickets(order.id, ticketIds);
    return order;
  }
}
