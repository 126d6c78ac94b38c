/**
 * Tenant domain types
 */

export interface BusinessHours {
  start: number;
  end: number;
}

export interface TenantSettings {
  timezone: string;
  businessHours: BusinessHours;
  slotIntervalMinutes: number;
  minTicketsPerOrder?: number;
  maxTicketsPerOrder?: number;
  reservationTimeoutMinutes?: number;
}

export interface Tenant {
  id: string;
  slug: string;
  name: string;
  isActive: boolean;
  settings: TenantSettings;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewTenant {
  slug: string;
  name: string;
  isActive: boolean;
  settings: TenantSettings;
}

// Create tenant input (settings are merged over defaults)
export interface CreateTenantInput {
  slug: string;
  name: string;
  settings?: Partial<TenantSettings>;
}

// Database row type (snake_case from PostgreSQL)
export interface TenantRow {
  id: string;
  slug: string;
  name: string;
  is_active: boolean;
  settings: TenantSettings;
  created_at: Date;
  updated_at: Date;
}
