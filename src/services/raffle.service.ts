import type { Store, Transaction } from '../store/store';
import {
  TicketStatus,
  totalTickets,
  type CreateRaffleInput,
  type GenerateTicketsResult,
  type Raffle,
  type RaffleAvailability,
} from '../types/raffle.types';
import { AppError, ErrorCode, ReservationError, statusForCode } from '../types/error.types';
import type { Clock } from '../utils/clock';
import { isWholeCents } from '../utils/money';
import { logger } from '../config/logger';

export const TICKET_INSERT_BATCH_SIZE = 1000;

export interface GenerateTicketsOptions {
  force?: boolean;
  tenantId?: string;
}

/**
 * Raffle Service
 *
 * Raffle administration: creation, ticket generation and availability
 * reporting. Allocation itself lives in the ticket allocator.
 */
export class RaffleService {
  constructor(
    private store: Store,
    private clock: Clock
  ) {}

  async createRaffle(tenantId: string, input: CreateRaffleInput): Promise<Raffle> {
    const minNumber = input.minNumber ?? 1;
    if (!Number.isInteger(minNumber) || minNumber < 1) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'minNumber must be at least 1');
    }
    if (input.maxNumber < minNumber) {
      throw new AppError(
        ErrorCode.VALIDATION_ERROR,
        'maxNumber must be greater than or equal to minNumber',
        statusForCode(ErrorCode.VALIDATION_ERROR),
        { minNumber, maxNumber: input.maxNumber }
      );
    }
    if (input.ticketPrice <= 0) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'ticketPrice must be positive');
    }
    if (!isWholeCents(input.ticketPrice)) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'ticketPrice must be in whole cents');
    }

    const raffle = await this.store.atomic(async (tx) => {
      const tenant = await tx.tenants.findById(tenantId);
      if (!tenant || !tenant.isActive) {
        throw new ReservationError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Tenant not found or inactive');
      }
      return tx.raffles.insert({
        tenantId,
        title: input.title,
        description: input.description ?? '',
        ticketPrice: input.ticketPrice,
        currency: input.currency ?? 'USD',
        isActive: input.isActive ?? true,
        minNumber,
        maxNumber: input.maxNumber,
        drawDate: input.drawDate ?? null,
      });
    });

    logger.info('Raffle created', { raffleId: raffle.id, tenantId, totalTickets: totalTickets(raffle) });
    return raffle;
  }

  async getRaffle(tenantId: string, raffleId: string): Promise<Raffle> {
    const raffle = await this.store.atomic((tx) => tx.raffles.findById(raffleId));
    if (!raffle || raffle.tenantId !== tenantId) {
      throw new ReservationError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Raffle not found');
    }
    return raffle;
  }

  /**
   * Create one AVAILABLE ticket per number in [minNumber, maxNumber].
   *
   * Existing tickets block generation unless `force` is set, and even then
   * only AVAILABLE tickets may be replaced.
   */
  async generateTickets(raffleId: string, options: GenerateTicketsOptions = {}): Promise<GenerateTicketsResult> {
    const result = await this.store.atomic(async (tx) => {
      const raffle = await this.lockRaffle(tx, raffleId, options.tenantId);
      const counts = await tx.tickets.counts(raffle.id);

      let deleted = 0;
      if (counts.total > 0) {
        if (!options.force) {
          throw new ReservationError(
            ErrorCode.TICKETS_ALREADY_GENERATED,
            `Raffle "${raffle.title}" already has ${counts.total} tickets. Use force to regenerate.`,
            { existing: counts.total }
          );
        }
        const held = counts.reserved + counts.sold;
        if (held > 0) {
          throw new ReservationError(
            ErrorCode.TICKETS_ALREADY_GENERATED,
            `Cannot regenerate tickets while ${held} are reserved or sold`,
            { reserved: counts.reserved, sold: counts.sold }
          );
        }
        deleted = await tx.tickets.deleteAll(raffle.id);
        logger.warn('Deleted existing tickets', { raffleId: raffle.id, deleted });
      }

      let generated = 0;
      for (let start = raffle.minNumber; start <= raffle.maxNumber; start += TICKET_INSERT_BATCH_SIZE) {
        const end = Math.min(start + TICKET_INSERT_BATCH_SIZE - 1, raffle.maxNumber);
        const batch = Array.from({ length: end - start + 1 }, (_, i) => start + i);
        generated += await tx.tickets.insertMany(raffle.id, batch);
      }

      return { raffleId: raffle.id, generated, deleted };
    });

    logger.info('Tickets generated', result);
    return result;
  }

  /**
   * Ticket counts and the AVAILABLE numbers in ascending order.
   * Lapsed holds are released first so the report matches what an
   * allocation would see.
   */
  async getAvailability(raffleId: string, tenantId?: string): Promise<RaffleAvailability> {
    return this.store.atomic(async (tx) => {
      const raffle = await this.lockRaffle(tx, raffleId, tenantId);
      await tx.tickets.releaseExpired(raffle.id, this.clock.now());

      const counts = await tx.tickets.counts(raffle.id);
      const availableNumbers = await tx.tickets.listNumbers(raffle.id, TicketStatus.AVAILABLE);

      return {
        raffleId: raffle.id,
        totalTickets: counts.total,
        availableCount: counts.available,
        reservedCount: counts.reserved,
        soldCount: counts.sold,
        availableNumbers,
      };
    });
  }

  private async lockRaffle(tx: Transaction, raffleId: string, tenantId?: string): Promise<Raffle> {
    const raffle = await tx.raffles.lock(raffleId);
    if (!raffle || (tenantId !== undefined && raffle.tenantId !== tenantId)) {
      throw new ReservationError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Raffle not found');
    }
    return raffle;
  }
}
