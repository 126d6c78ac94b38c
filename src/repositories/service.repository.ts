import type { SqlClient } from '../config/database';
import type { NewService, Service, ServiceRow } from '../types/appointment.types';
import type { ServiceRepository } from '../store/store';
import { firstRow, toAmount } from './row-mapping';

/**
 * Service Repository
 *
 * The service row is the parent lock for every booking against it
 */
export class PgServiceRepository implements ServiceRepository {
  constructor(private client: SqlClient) {}

  async findById(tenantId: string, serviceId: string): Promise<Service | null> {
    const { rows } = await this.client.query<ServiceRow>(
      'SELECT * FROM services WHERE id = $1 AND tenant_id = $2',
      [serviceId, tenantId]
    );
    const row = rows[0];
    return row ? this.mapToService(row) : null;
  }

  async lock(tenantId: string, serviceId: string): Promise<Service | null> {
    const { rows } = await this.client.query<ServiceRow>(
      'SELECT * FROM services WHERE id = $1 AND tenant_id = $2 FOR UPDATE',
      [serviceId, tenantId]
    );
    const row = rows[0];
    return row ? this.mapToService(row) : null;
  }

  async insert(service: NewService): Promise<Service> {
    const { rows } = await this.client.query<ServiceRow>(
      `INSERT INTO services (
         tenant_id, name, description, duration_minutes, price, currency,
         is_active, buffer_time_minutes, max_bookings_per_day, advance_booking_days
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING *`,
      [
        service.tenantId,
        service.name,
        service.description,
        service.durationMinutes,
        service.price,
        service.currency,
        service.isActive,
        service.bufferTimeMinutes,
        service.maxBookingsPerDay,
        service.advanceBookingDays,
      ]
    );
    return this.mapToService(firstRow(rows, 'services'));
  }

  private mapToService(row: ServiceRow): Service {
    return {
      id: row.id,
      tenantId: row.tenant_id,
      name: row.name,
      description: row.description,
      durationMinutes: row.duration_minutes,
      price: toAmount(row.price),
      currency: row.currency,
      isActive: row.is_active,
      bufferTimeMinutes: row.buffer_time_minutes,
      maxBookingsPerDay: row.max_bookings_per_day,
      advanceBookingDays: row.advance_booking_days,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
