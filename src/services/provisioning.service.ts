import type { Store } from '../store/store';
import type { CreateTenantInput, Tenant } from '../types/tenant.types';
import type { CreateServiceInput, Service } from '../types/appointment.types';
import { AppError, ErrorCode } from '../types/error.types';
import { resolveTenantSettings } from '../validators/tenant.validator';
import { logger } from '../config/logger';

/**
 * Provisioning Service
 *
 * Tenants and the services they offer
 */
export class ProvisioningService {
  constructor(private store: Store) {}

  async createTenant(input: CreateTenantInput): Promise<Tenant> {
    const tenant = await this.store.atomic((tx) =>
      tx.tenants.insert({
        slug: input.slug,
        name: input.name,
        isActive: true,
        settings: resolveTenantSettings(input.settings),
      })
    );

    logger.info('Tenant created', { tenantId: tenant.id, slug: tenant.slug });
    return tenant;
  }

  async getTenant(tenantId: string): Promise<Tenant> {
    const tenant = await this.store.atomic((tx) => tx.tenants.findById(tenantId));
    if (!tenant) {
      throw new AppError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Tenant not found');
    }
    return { ...tenant, settings: resolveTenantSettings(tenant.settings) };
  }

  async createService(tenantId: string, input: CreateServiceInput): Promise<Service> {
    const service = await this.store.atomic(async (tx) => {
      const tenant = await tx.tenants.findById(tenantId);
      if (!tenant || !tenant.isActive) {
        throw new AppError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Tenant not found or inactive');
      }
      return tx.services.insert({
        tenantId,
        name: input.name,
        description: input.description ?? '',
        durationMinutes: input.durationMinutes,
        price: input.price,
        currency: input.currency ?? 'USD',
        isActive: input.isActive ?? true,
        bufferTimeMinutes: input.bufferTimeMinutes ?? 0,
        maxBookingsPerDay: input.maxBookingsPerDay ?? 20,
        advanceBookingDays: input.advanceBookingDays ?? 30,
      });
    });

    logger.info('Service created', { serviceId: service.id, tenantId, name: service.name });
    return service;
  }

  async getService(tenantId: string, serviceId: string): Promise<Service> {
    const service = await this.store.atomic((tx) => tx.services.findById(tenantId, serviceId));
    if (!service) {
      throw new AppError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Service not found');
    }
    return service;
  }
}
