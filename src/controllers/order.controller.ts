import { Request, Response } from 'express';
import type { OrderLifecycleService } from '../services/order-lifecycle.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { confirmPaymentSchema, orderParamsSchema } from '../validators/order.validator';

/**
 * Order Controller
 *
 * HTTP request handlers for the order lifecycle
 */
export class OrderController {
  constructor(private orders: OrderLifecycleService) {}

  /**
   * GET /v1/tenants/:tenantId/orders/:orderId
   */
  getOrder = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(orderParamsSchema, req);

    const order = await this.orders.getOrder(params.orderId, params.tenantId);

    res.status(200).json(createSuccessResponse(order));
  });

  /**
   * POST /v1/tenants/:tenantId/orders/:orderId/confirm-payment
   */
  confirmPayment = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(confirmPaymentSchema, req);

    const order = await this.orders.confirmPaid(params.orderId, body.paymentProofMediaId, params.tenantId);

    res.status(200).json(createSuccessResponse(order, 'Payment confirmed'));
  });

  /**
   * POST /v1/tenants/:tenantId/orders/:orderId/release
   */
  releaseOrder = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(orderParamsSchema, req);

    const result = await this.orders.releaseReservations(params.orderId, params.tenantId);

    res.status(200).json(createSuccessResponse(result, `Released ${result.released} tickets`));
  });

  /**
   * POST /v1/tenants/:tenantId/orders/:orderId/expire
   */
  expireOrder = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(orderParamsSchema, req);

    const result = await this.orders.markExpired(params.orderId, params.tenantId);

    res.status(200).json(createSuccessResponse(result));
  });
}
