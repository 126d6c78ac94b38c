import type { SqlClient } from '../config/database';
import { OrderStatus, type NewOrder, type Order, type OrderPatch, type OrderRow } from '../types/raffle.types';
import type { OrderRepository } from '../store/store';
import { firstRow, patchAssignments, toAmount, toEnum } from './row-mapping';

const PATCH_COLUMNS: Record<keyof OrderPatch, string> = {
  status: 'status',
  paymentProofMediaId: 'payment_proof_media_id',
  paidAt: 'paid_at',
};

/**
 * Order Repository
 *
 * Handles orders and their order_tickets audit links. Links are never
 * removed when tickets are released.
 */
export class PgOrderRepository implements OrderRepository {
  constructor(private client: SqlClient) {}

  async findById(orderId: string): Promise<Order | null> {
    const { rows } = await this.client.query<OrderRow>('SELECT * FROM orders WHERE id = $1', [orderId]);
    const row = rows[0];
    return row ? this.mapToOrder(row) : null;
  }

  async lock(orderId: string): Promise<Order | null> {
    const { rows } = await this.client.query<OrderRow>('SELECT * FROM orders WHERE id = $1 FOR UPDATE', [orderId]);
    const row = rows[0];
    return row ? this.mapToOrder(row) : null;
  }

  async insert(order: NewOrder): Promise<Order> {
    const { rows } = await this.client.query<OrderRow>(
      `INSERT INTO orders (
         tenant_id, raffle_id, contact_id, contact_phone, contact_name,
         qty, total_amount, currency, status, expires_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING *`,
      [
        order.tenantId,
        order.raffleId,
        order.contact.id,
        order.contact.phone,
        order.contact.name ?? null,
        order.qty,
        order.totalAmount,
        order.currency,
        order.status,
        order.expiresAt,
      ]
    );
    return this.mapToOrder(firstRow(rows, 'orders'));
  }

  async update(orderId: string, patch: OrderPatch): Promise<Order> {
    const values: unknown[] = [orderId];
    const assignments = patchAssignments(patch, PATCH_COLUMNS, values);
    const { rows } = await this.client.query<OrderRow>(
      `UPDATE orders SET ${assignments} WHERE id = $1 RETURNING *`,
      values
    );
    return this.mapToOrder(firstRow(rows, 'orders'));
  }

  async linkTickets(orderId: string, ticketIds: string[]): Promise<void> {
    if (ticketIds.length === 0) return;
    await this.client.query(
      `INSERT INTO order_tickets (order_id, ticket_id)
       SELECT $1, t FROM unnest($2::uuid[]) AS t`,
      [orderId, ticketIds]
    );
  }

  async linkedTicketNumbers(orderId: string): Promise<number[]> {
    const { rows } = await this.client.query<{ number: number }>(
      `SELECT t.number FROM order_tickets ot
       JOIN ticket_numbers t ON t.id = ot.ticket_id
       WHERE ot.order_id = $1
       ORDER BY t.number`,
      [orderId]
    );
    return rows.map((row) => row.number);
  }

  async findExpiredIds(now: Date, limit: number): Promise<string[]> {
    const { rows } = await this.client.query<{ id: string }>(
      `SELECT id FROM orders
       WHERE status = $1 AND expires_at < $2
       ORDER BY expires_at
       LIMIT $3`,
      [OrderStatus.PENDING_PAYMENT, now, limit]
    );
    return rows.map((row) => row.id);
  }

  private mapToOrder(row: OrderRow): Order {
    return {
      id: row.id,
      tenantId: row.tenant_id,
      raffleId: row.raffle_id,
      contactId: row.contact_id,
      contactPhone: row.contact_phone,
      contactName: row.contact_name,
      qty: row.qty,
      totalAmount: toAmount(row.total_amount),
      currency: row.currency,
      status: toEnum(OrderStatus, row.status, 'orders.status'),
      paymentProofMediaId: row.payment_proof_media_id,
      paidAt: row.paid_at,
      expiresAt: row.expires_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
