import type { SqlClient } from '../config/database';
import type { Customer, CustomerRow, CustomerUpsert } from '../types/appointment.types';
import type { CustomerRepository } from '../store/store';
import { firstRow } from './row-mapping';

/**
 * Customer Repository
 *
 * (tenant_id, phone) is unique, so concurrent first bookings from the same
 * phone converge on one row through ON CONFLICT.
 */
export class PgCustomerRepository implements CustomerRepository {
  constructor(private client: SqlClient) {}

  async findById(tenantId: string, customerId: string): Promise<Customer | null> {
    const { rows } = await this.client.query<CustomerRow>(
      'SELECT * FROM customers WHERE id = $1 AND tenant_id = $2',
      [customerId, tenantId]
    );
    const row = rows[0];
    return row ? this.mapToCustomer(row) : null;
  }

  async upsertByPhone(customer: CustomerUpsert): Promise<Customer> {
    const { rows } = await this.client.query<CustomerRow>(
      `INSERT INTO customers (tenant_id, name, phone, email)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (tenant_id, phone) DO UPDATE SET
         name = CASE WHEN EXCLUDED.name <> '' THEN EXCLUDED.name ELSE customers.name END,
         email = COALESCE(EXCLUDED.email, customers.email),
         updated_at = now()
       RETURNING *`,
      [customer.tenantId, customer.name, customer.phone, customer.email || null]
    );
    return this.mapToCustomer(firstRow(rows, 'customers'));
  }

  async setLastAppointmentAt(customerId: string, at: Date): Promise<void> {
    await this.client.query(
      'UPDATE customers SET last_appointment_at = $2, updated_at = now() WHERE id = $1',
      [customerId, at]
    );
  }

  private mapToCustomer(row: CustomerRow): Customer {
    return {
      id: row.id,
      tenantId: row.tenant_id,
      name: row.name,
      email: row.email,
      phone: row.phone,
      notes: row.notes,
      lastAppointmentAt: row.last_appointment_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
