import type { SqlClient } from '../config/database';
import {
  PaymentProvider,
  PaymentTransactionStatus,
  type NewPaymentTransaction,
  type PaymentTarget,
  type PaymentTransaction,
  type PaymentTransactionRow,
} from '../types/payment.types';
import type { PaymentRepository } from '../store/store';
import { firstRow, toAmount, toEnum } from './row-mapping';

/**
 * Payment Transaction Repository
 *
 * The target union is stored as two nullable references guarded by a
 * CHECK that exactly one is set.
 */
export class PgPaymentRepository implements PaymentRepository {
  constructor(private client: SqlClient) {}

  async findById(tenantId: string, paymentId: string): Promise<PaymentTransaction | null> {
    const { rows } = await this.client.query<PaymentTransactionRow>(
      'SELECT * FROM payment_transactions WHERE id = $1 AND tenant_id = $2',
      [paymentId, tenantId]
    );
    const row = rows[0];
    return row ? this.mapToPayment(row) : null;
  }

  async insert(payment: NewPaymentTransaction): Promise<PaymentTransaction> {
    const { target } = payment;
    const { rows } = await this.client.query<PaymentTransactionRow>(
      `INSERT INTO payment_transactions (
         tenant_id, provider, external_id, amount, currency, status,
         order_id, appointment_id, raw_response, notes, confirmed_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       RETURNING *`,
      [
        payment.tenantId,
        payment.provider,
        payment.externalId,
        payment.amount,
        payment.currency,
        payment.status,
        target.kind === 'ORDER' ? target.orderId : null,
        target.kind === 'APPOINTMENT' ? target.appointmentId : null,
        JSON.stringify(payment.rawResponse),
        payment.notes,
        payment.confirmedAt,
      ]
    );
    return this.mapToPayment(firstRow(rows, 'payment_transactions'));
  }

  private mapToPayment(row: PaymentTransactionRow): PaymentTransaction {
    return {
      id: row.id,
      tenantId: row.tenant_id,
      provider: toEnum(PaymentProvider, row.provider, 'payment_transactions.provider'),
      externalId: row.external_id,
      amount: toAmount(row.amount),
      currency: row.currency,
      status: toEnum(PaymentTransactionStatus, row.status, 'payment_transactions.status'),
      target: this.mapToTarget(row),
      rawResponse: row.raw_response,
      notes: row.notes,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      confirmedAt: row.confirmed_at,
    };
  }

  private mapToTarget(row: PaymentTransactionRow): PaymentTarget {
    if (row.order_id !== null) {
      return { kind: 'ORDER', orderId: row.order_id };
    }
    if (row.appointment_id !== null) {
      return { kind: 'APPOINTMENT', appointmentId: row.appointment_id };
    }
    throw new Error(`Payment transaction ${row.id} has no target`);
  }
}
