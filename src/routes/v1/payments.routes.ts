import { Router } from 'express';
import type { Container } from '../../container';
import { PaymentController } from '../../controllers/payment.controller';

/**
 * Payment routes (v1), mounted under /v1/tenants/:tenantId/payments
 */
export function createPaymentRoutes(container: Container): Router {
  const router = Router({ mergeParams: true });
  const paymentController = new PaymentController(container.payments);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/payments:
   *   post:
   *     summary: Record a payment transaction for an order or appointment
   *     tags: [Payments]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [provider, externalId, amount, currency, status, target]
   *             properties:
   *               provider:
   *                 type: string
   *                 enum: [BANCARD, MANUAL]
   *               externalId:
   *                 type: string
   *               amount:
   *                 type: number
   *               currency:
   *                 type: string
   *               status:
   *                 type: string
   *                 enum: [PENDING, PAID, FAILED, REFUNDED]
   *               target:
   *                 oneOf:
   *                   - type: object
   *                     properties:
   *                       kind:
   *                         type: string
   *                         enum: [ORDER]
   *                       orderId:
   *                         type: string
   *                   - type: object
   *                     properties:
   *                       kind:
   *                         type: string
   *                         enum: [APPOINTMENT]
   *                       appointmentId:
   *                         type: string
   *     responses:
   *       201:
   *         description: Transaction recorded
   *       404:
   *         description: Target not found
   */
  router.post('/', paymentController.recordPayment);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/payments/{paymentId}:
   *   get:
   *     summary: Get a payment transaction
   *     tags: [Payments]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - in: path
   *         name: paymentId
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Transaction retrieved
   *       404:
   *         description: Transaction not found
   */
  router.get('/:paymentId', paymentController.getPayment);

  return router;
}
