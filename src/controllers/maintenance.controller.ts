import { Request, Response } from 'express';
import type { MaintenanceService } from '../services/maintenance.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { expireOrdersSchema } from '../validators/order.validator';

export class MaintenanceController {
  constructor(private maintenance: MaintenanceService) {}

  /**
   * POST /v1/maintenance/expire-orders
   * Sweeps overdue PENDING_PAYMENT orders; `limit` caps one run.
   */
  expireOrders = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(expireOrdersSchema, req);
    const result = await this.maintenance.expireOrders(body.limit);
    const summary = result.expiredCount === 1 ? 'Expired 1 order' : `Expired ${result.expiredCount} orders`;
    res.json(createSuccessResponse(result, summary));
  });
}
