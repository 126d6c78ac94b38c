import { Request, Response } from 'express';
import type { PaymentService } from '../services/payment.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { paymentParamsSchema, recordPaymentSchema } from '../validators/payment.validator';

/**
 * Payment Controller
 */
export class PaymentController {
  constructor(private payments: PaymentService) {}

  /**
   * POST /v1/tenants/:tenantId/payments
   */
  recordPayment = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(recordPaymentSchema, req);

    const payment = await this.payments.recordTransaction(params.tenantId, body);

    res.status(201).json(createSuccessResponse(payment));
  });

  /**
   * GET /v1/tenants/:tenantId/payments/:paymentId
   */
  getPayment = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(paymentParamsSchema, req);

    const payment = await this.payments.getTransaction(params.tenantId, params.paymentId);

    res.status(200).json(createSuccessResponse(payment));
  });
}
