import type { SqlClient } from '../config/database';
import type { NewTenant, Tenant, TenantRow } from '../types/tenant.types';
import type { TenantRepository } from '../store/store';
import { firstRow } from './row-mapping';

/**
 * Tenant Repository
 *
 * Handles all database operations for tenants table
 */
export class PgTenantRepository implements TenantRepository {
  constructor(private client: SqlClient) {}

  async findById(tenantId: string): Promise<Tenant | null> {
    const { rows } = await this.client.query<TenantRow>('SELECT * FROM tenants WHERE id = $1', [tenantId]);
    const row = rows[0];
    return row ? this.mapToTenant(row) : null;
  }

  async insert(tenant: NewTenant): Promise<Tenant> {
    const { rows } = await this.client.query<TenantRow>(
      `INSERT INTO tenants (slug, name, is_active, settings)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [tenant.slug, tenant.name, tenant.isActive, JSON.stringify(tenant.settings)]
    );
    return this.mapToTenant(firstRow(rows, 'tenants'));
  }

  /**
   * Map database row to domain model
   */
  private mapToTenant(row: TenantRow): Tenant {
    return {
      id: row.id,
      slug: row.slug,
      name: row.name,
      isActive: row.is_active,
      settings: row.settings,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
