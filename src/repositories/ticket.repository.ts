import type { SqlClient } from '../config/database';
import { TicketStatus, type TicketCounts, type TicketNumber, type TicketNumberRow } from '../types/raffle.types';
import type { TicketRepository } from '../store/store';
import { toEnum } from './row-mapping';

interface CountRow {
  status: string;
  count: string;
}

/**
 * Ticket Number Repository
 *
 * All bulk state changes are single UPDATE statements so they run under the
 * raffle lock the caller already holds.
 */
export class PgTicketRepository implements TicketRepository {
  constructor(private client: SqlClient) {}

  async counts(raffleId: string): Promise<TicketCounts> {
    const { rows } = await this.client.query<CountRow>(
      'SELECT status, COUNT(*) AS count FROM ticket_numbers WHERE raffle_id = $1 GROUP BY status',
      [raffleId]
    );

    const counts: TicketCounts = { total: 0, available: 0, reserved: 0, sold: 0 };
    for (const row of rows) {
      const count = Number(row.count);
      counts.total += count;
      const status = toEnum(TicketStatus, row.status, 'ticket_numbers.status');
      if (status === TicketStatus.AVAILABLE) counts.available = count;
      else if (status === TicketStatus.RESERVED) counts.reserved = count;
      else counts.sold = count;
    }
    return counts;
  }

  async listNumbers(raffleId: string, status: TicketStatus): Promise<number[]> {
    const { rows } = await this.client.query<{ number: number }>(
      'SELECT number FROM ticket_numbers WHERE raffle_id = $1 AND status = $2 ORDER BY number',
      [raffleId, status]
    );
    return rows.map((row) => row.number);
  }

  async insertMany(raffleId: string, numbers: number[]): Promise<number> {
    if (numbers.length === 0) return 0;
    const result = await this.client.query(
      `INSERT INTO ticket_numbers (raffle_id, number, status)
       SELECT $1, n, 'AVAILABLE' FROM unnest($2::int[]) AS n`,
      [raffleId, numbers]
    );
    return result.rowCount ?? 0;
  }

  async deleteAll(raffleId: string): Promise<number> {
    const result = await this.client.query('DELETE FROM ticket_numbers WHERE raffle_id = $1', [raffleId]);
    return result.rowCount ?? 0;
  }

  async releaseExpired(raffleId: string, now: Date): Promise<number> {
    const result = await this.client.query(
      `UPDATE ticket_numbers
       SET status = 'AVAILABLE', reserved_by_order_id = NULL, reserved_until = NULL, updated_at = now()
       WHERE raffle_id = $1 AND status = 'RESERVED' AND reserved_until < $2`,
      [raffleId, now]
    );
    return result.rowCount ?? 0;
  }

  async lockByNumbers(raffleId: string, numbers: number[]): Promise<TicketNumber[]> {
    const { rows } = await this.client.query<TicketNumberRow>(
      `SELECT * FROM ticket_numbers
       WHERE raffle_id = $1 AND number = ANY($2::int[])
       ORDER BY number
       FOR UPDATE`,
      [raffleId, numbers]
    );
    return rows.map((row) => this.mapToTicket(row));
  }

  async *scanAvailable(raffleId: string, batchSize: number): AsyncIterable<TicketNumber> {
    let after = -1;

    for (;;) {
      const { rows } = await this.client.query<TicketNumberRow>(
        `SELECT * FROM ticket_numbers
         WHERE raffle_id = $1 AND status = 'AVAILABLE' AND number > $2
         ORDER BY number
         LIMIT $3`,
        [raffleId, after, batchSize]
      );

      for (const row of rows) {
        yield this.mapToTicket(row);
      }

      const last = rows[rows.length - 1];
      if (!last || rows.length < batchSize) return;
      after = last.number;
    }
  }

  async markReserved(ticketIds: string[], orderId: string, until: Date): Promise<void> {
    await this.client.query(
      `UPDATE ticket_numbers
       SET status = 'RESERVED', reserved_by_order_id = $2, reserved_until = $3, updated_at = now()
       WHERE id = ANY($1::uuid[])`,
      [ticketIds, orderId, until]
    );
  }

  async countReservedForOrder(orderId: string): Promise<number> {
    const { rows } = await this.client.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ticket_numbers
       WHERE reserved_by_order_id = $1 AND status = 'RESERVED'`,
      [orderId]
    );
    return Number(rows[0]?.count ?? 0);
  }

  async releaseForOrder(orderId: string): Promise<number> {
    const result = await this.client.query(
      `UPDATE ticket_numbers
       SET status = 'AVAILABLE', reserved_by_order_id = NULL, reserved_until = NULL, updated_at = now()
       WHERE reserved_by_order_id = $1 AND status = 'RESERVED'`,
      [orderId]
    );
    return result.rowCount ?? 0;
  }

  async sellForOrder(orderId: string): Promise<number> {
    const result = await this.client.query(
      `UPDATE ticket_numbers
       SET status = 'SOLD', reserved_until = NULL, updated_at = now()
       WHERE reserved_by_order_id = $1 AND status = 'RESERVED'`,
      [orderId]
    );
    return result.rowCount ?? 0;
  }

  private mapToTicket(row: TicketNumberRow): TicketNumber {
    return {
      id: row.id,
      raffleId: row.raffle_id,
      number: row.number,
      status: toEnum(TicketStatus, row.status, 'ticket_numbers.status'),
      reservedByOrderId: row.reserved_by_order_id,
      reservedUntil: row.reserved_until,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
