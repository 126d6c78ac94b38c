import { Router } from 'express';
import type { Container } from '../../container';
import { OrderController } from '../../controllers/order.controller';

/**
 * Order routes (v1), mounted under /v1/tenants/:tenantId/orders
 */
export function createOrderRoutes(container: Container): Router {
  const router = Router({ mergeParams: true });
  const orderController = new OrderController(container.orders);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/orders/{orderId}:
   *   get:
   *     summary: Get an order with its ticket numbers
   *     description: An overdue PENDING_PAYMENT order is expired before it is returned.
   *     tags: [Orders]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/OrderId'
   *     responses:
   *       200:
   *         description: Order retrieved
   *       404:
   *         description: Order not found
   */
  router.get('/:orderId', orderController.getOrder);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/orders/{orderId}/confirm-payment:
   *   post:
   *     summary: Mark the order PAID and its tickets SOLD
   *     tags: [Orders]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/OrderId'
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               paymentProofMediaId:
   *                 type: string
   *     responses:
   *       200:
   *         description: Order paid
   *       409:
   *         description: Not PENDING_PAYMENT or no tickets held
   */
  router.post('/:orderId/confirm-payment', orderController.confirmPayment);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/orders/{orderId}/release:
   *   post:
   *     summary: Cancel the order and release its held tickets
   *     tags: [Orders]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/OrderId'
   *     responses:
   *       200:
   *         description: Order cancelled
   *       409:
   *         description: Order is PAID or already CANCELLED
   */
  router.post('/:orderId/release', orderController.releaseOrder);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/orders/{orderId}/expire:
   *   post:
   *     summary: Expire the order if it is overdue
   *     tags: [Orders]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/OrderId'
   *     responses:
   *       200:
   *         description: Whether the order was expired and how many tickets were released
   */
  router.post('/:orderId/expire', orderController.expireOrder);

  return router;
}
