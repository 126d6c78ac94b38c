import type { SqlClient } from '../config/database';
import {
  AppointmentStatus,
  PaymentStatus,
  type Appointment,
  type AppointmentPatch,
  type AppointmentRow,
  type NewAppointment,
} from '../types/appointment.types';
import type { AppointmentRepository } from '../store/store';
import { firstRow, patchAssignments, toAmount, toEnum } from './row-mapping';

// Patchable fields and their columns
const PATCH_COLUMNS: Record<keyof AppointmentPatch, string> = {
  status: 'status',
  paymentStatus: 'payment_status',
  paymentTransactionId: 'payment_transaction_id',
  internalNotes: 'internal_notes',
  confirmedAt: 'confirmed_at',
  cancelledAt: 'cancelled_at',
  completedAt: 'completed_at',
};

/**
 * Appointment Repository
 */
export class PgAppointmentRepository implements AppointmentRepository {
  constructor(private client: SqlClient) {}

  async findById(tenantId: string, appointmentId: string): Promise<Appointment | null> {
    const { rows } = await this.client.query<AppointmentRow>(
      'SELECT * FROM appointments WHERE id = $1 AND tenant_id = $2',
      [appointmentId, tenantId]
    );
    const row = rows[0];
    return row ? this.mapToAppointment(row) : null;
  }

  async lock(tenantId: string, appointmentId: string): Promise<Appointment | null> {
    const { rows } = await this.client.query<AppointmentRow>(
      'SELECT * FROM appointments WHERE id = $1 AND tenant_id = $2 FOR UPDATE',
      [appointmentId, tenantId]
    );
    const row = rows[0];
    return row ? this.mapToAppointment(row) : null;
  }

  async insert(appointment: NewAppointment): Promise<Appointment> {
    const { rows } = await this.client.query<AppointmentRow>(
      `INSERT INTO appointments (
         tenant_id, service_id, customer_id, scheduled_at, duration_minutes,
         status, payment_status, total_amount, currency, customer_notes
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING *`,
      [
        appointment.tenantId,
        appointment.serviceId,
        appointment.customerId,
        appointment.scheduledAt,
        appointment.durationMinutes,
        AppointmentStatus.PENDING,
        PaymentStatus.PENDING,
        appointment.totalAmount,
        appointment.currency,
        appointment.customerNotes,
      ]
    );
    return this.mapToAppointment(firstRow(rows, 'appointments'));
  }

  async update(appointmentId: string, patch: AppointmentPatch): Promise<Appointment> {
    const values: unknown[] = [appointmentId];
    const assignments = patchAssignments(patch, PATCH_COLUMNS, values);

    const { rows } = await this.client.query<AppointmentRow>(
      `UPDATE appointments SET ${assignments} WHERE id = $1 RETURNING *`,
      values
    );
    return this.mapToAppointment(firstRow(rows, 'appointments'));
  }

  async findActiveStartingBetween(
    tenantId: string,
    serviceId: string,
    from: Date,
    to: Date
  ): Promise<Appointment[]> {
    const { rows } = await this.client.query<AppointmentRow>(
      `SELECT * FROM appointments
       WHERE tenant_id = $1
         AND service_id = $2
         AND status IN ('PENDING', 'CONFIRMED')
         AND scheduled_at >= $3
         AND scheduled_at < $4
       ORDER BY scheduled_at`,
      [tenantId, serviceId, from, to]
    );
    return rows.map((row) => this.mapToAppointment(row));
  }

  private mapToAppointment(row: AppointmentRow): Appointment {
    return {
      id: row.id,
      tenantId: row.tenant_id,
      serviceId: row.service_id,
      customerId: row.customer_id,
      scheduledAt: row.scheduled_at,
      durationMinutes: row.duration_minutes,
      status: toEnum(AppointmentStatus, row.status, 'appointments.status'),
      paymentStatus: toEnum(PaymentStatus, row.payment_status, 'appointments.payment_status'),
      totalAmount: toAmount(row.total_amount),
      currency: row.currency,
      paymentTransactionId: row.payment_transaction_id,
      customerNotes: row.customer_notes,
      internalNotes: row.internal_notes,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      confirmedAt: row.confirmed_at,
      cancelledAt: row.cancelled_at,
      completedAt: row.completed_at,
    };
  }
}
