import { Router } from 'express';
import type { Container } from '../container';
import type { HealthCheckResponse } from '../types/api.types';
import { createTenantRoutes } from './v1/tenants.routes';
import { createAppointmentRoutes } from './v1/appointments.routes';
import { createRaffleRoutes } from './v1/raffles.routes';
import { createOrderRoutes } from './v1/orders.routes';
import { createPaymentRoutes } from './v1/payments.routes';
import { createMaintenanceRoutes } from './v1/maintenance.routes';

/**
 * API Routes Aggregator
 */
export function createRoutes(container: Container): Router {
  const router = Router();

  // v1 routes; the nested routers read :tenantId through mergeParams
  router.use('/v1/tenants/:tenantId/appointments', createAppointmentRoutes(container));
  router.use('/v1/tenants/:tenantId/raffles', createRaffleRoutes(container));
  router.use('/v1/tenants/:tenantId/orders', createOrderRoutes(container));
  router.use('/v1/tenants/:tenantId/payments', createPaymentRoutes(container));
  router.use('/v1/tenants', createTenantRoutes(container));
  router.use('/v1/maintenance', createMaintenanceRoutes(container));

  // Health check endpoint
  router.get('/health', (_req, res) => {
    const body: HealthCheckResponse = {
      status: 'healthy',
      timestamp: container.clock.now().toISOString(),
      store: container.store.driver,
      uptime: process.uptime(),
    };
    res.status(200).json(body);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Booking & Allocation API',
    });
  });

  return router;
}
