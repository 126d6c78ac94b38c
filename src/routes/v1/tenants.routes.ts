import { Router } from 'express';
import type { Container } from '../../container';
import { TenantController } from '../../controllers/tenant.controller';
import { AvailabilityController } from '../../controllers/availability.controller';

/**
 * Tenant, service and availability routes (v1)
 */
export function createTenantRoutes(container: Container): Router {
  const router = Router();
  const tenantController = new TenantController(container.provisioning);
  const availabilityController = new AvailabilityController(container.availability);

  /**
   * @swagger
   * /v1/tenants:
   *   post:
   *     summary: Create a tenant
   *     tags: [Tenants]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [slug, name]
   *             properties:
   *               slug:
   *                 type: string
   *                 pattern: '^[a-z0-9-]+$'
   *               name:
   *                 type: string
   *               settings:
   *                 $ref: '#/components/schemas/TenantSettings'
   *     responses:
   *       201:
   *         description: Tenant created
   *       409:
   *         description: Slug already taken
   */
  router.post('/', tenantController.createTenant);

  /**
   * @swagger
   * /v1/tenants/{tenantId}:
   *   get:
   *     summary: Get a tenant
   *     tags: [Tenants]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *     responses:
   *       200:
   *         description: Tenant retrieved
   *       404:
   *         description: Tenant not found
   */
  router.get('/:tenantId', tenantController.getTenant);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/services:
   *   post:
   *     summary: Create a bookable service
   *     tags: [Services]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name, durationMinutes, price]
   *             properties:
   *               name:
   *                 type: string
   *               description:
   *                 type: string
   *               durationMinutes:
   *                 type: integer
   *                 minimum: 5
   *               price:
   *                 type: number
   *               currency:
   *                 type: string
   *               bufferTimeMinutes:
   *                 type: integer
   *               maxBookingsPerDay:
   *                 type: integer
   *               advanceBookingDays:
   *                 type: integer
   *     responses:
   *       201:
   *         description: Service created
   *       404:
   *         description: Tenant not found or inactive
   */
  router.post('/:tenantId/services', tenantController.createService);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/services/{serviceId}:
   *   get:
   *     summary: Get a service
   *     tags: [Services]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/ServiceId'
   *     responses:
   *       200:
   *         description: Service retrieved
   *       404:
   *         description: Service not found
   */
  router.get('/:tenantId/services/:serviceId', tenantController.getService);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/services/{serviceId}/slots:
   *   get:
   *     summary: Available start times on a date
   *     tags: [Availability]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/ServiceId'
   *       - in: query
   *         name: date
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: duration
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Available slots in ascending order
   */
  router.get('/:tenantId/services/:serviceId/slots', availabilityController.getSlots);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/services/{serviceId}/next-slot:
   *   get:
   *     summary: First available slot within the next 30 days
   *     tags: [Availability]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/ServiceId'
   *       - in: query
   *         name: from
   *         schema:
   *           type: string
   *           format: date-time
   *     responses:
   *       200:
   *         description: The slot, or null when none is free
   */
  router.get('/:tenantId/services/:serviceId/next-slot', availabilityController.getNextSlot);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/services/{serviceId}/calendar:
   *   get:
   *     summary: Per-day availability for an inclusive date range
   *     tags: [Availability]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/ServiceId'
   *       - in: query
   *         name: startDate
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: endDate
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   *     responses:
   *       200:
   *         description: Calendar keyed by date
   *       400:
   *         description: Invalid or oversized range
   */
  router.get('/:tenantId/services/:serviceId/calendar', availabilityController.getCalendar);

  return router;
}
