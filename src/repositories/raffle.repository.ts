import type { SqlClient } from '../config/database';
import type { NewRaffle, Raffle, RaffleRow } from '../types/raffle.types';
import type { RaffleRepository } from '../store/store';
import { firstRow, toAmount } from './row-mapping';

/**
 * Raffle Repository
 *
 * The raffle row is the parent lock for every ticket allocation
 */
export class PgRaffleRepository implements RaffleRepository {
  constructor(private client: SqlClient) {}

  async findById(raffleId: string): Promise<Raffle | null> {
    const { rows } = await this.client.query<RaffleRow>('SELECT * FROM raffles WHERE id = $1', [raffleId]);
    const row = rows[0];
    return row ? this.mapToRaffle(row) : null;
  }

  async lock(raffleId: string): Promise<Raffle | null> {
    const { rows } = await this.client.query<RaffleRow>('SELECT * FROM raffles WHERE id = $1 FOR UPDATE', [
      raffleId,
    ]);
    const row = rows[0];
    return row ? this.mapToRaffle(row) : null;
  }

  async insert(raffle: NewRaffle): Promise<Raffle> {
    const { rows } = await this.client.query<RaffleRow>(
      `INSERT INTO raffles (
         tenant_id, title, description, ticket_price, currency,
         is_active, min_number, max_number, draw_date
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING *`,
      [
        raffle.tenantId,
        raffle.title,
        raffle.description,
        raffle.ticketPrice,
        raffle.currency,
        raffle.isActive,
        raffle.minNumber,
        raffle.maxNumber,
        raffle.drawDate,
      ]
    );
    return this.mapToRaffle(firstRow(rows, 'raffles'));
  }

  private mapToRaffle(row: RaffleRow): Raffle {
    return {
      id: row.id,
      tenantId: row.tenant_id,
      title: row.title,
      description: row.description,
      ticketPrice: toAmount(row.ticket_price),
      currency: row.currency,
      isActive: row.is_active,
      minNumber: row.min_number,
      maxNumber: row.max_number,
      drawDate: row.draw_date,
      winnerNumber: row.winner_number,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
