import { Router } from 'express';
import type { Container } from '../../container';
import { MaintenanceController } from '../../controllers/maintenance.controller';

/**
 * Maintenance routes (v1)
 */
export function createMaintenanceRoutes(container: Container): Router {
  const router = Router();
  const maintenanceController = new MaintenanceController(container.maintenance);

  /**
   * @swagger
   * /v1/maintenance/expire-orders:
   *   post:
   *     summary: Expire overdue PENDING_PAYMENT orders
   *     tags: [Maintenance]
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               limit:
   *                 type: integer
   *                 default: 100
   *     responses:
   *       200:
   *         description: Sweep result; orders that could not be expired this run are listed in failedOrderIds
   */
  router.post('/expire-orders', maintenanceController.expireOrders);

  return router;
}
