import { Request, Response } from 'express';
import type { ProvisioningService } from '../services/provisioning.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { createServiceSchema, createTenantSchema, tenantParamsSchema } from '../validators/tenant.validator';
import { serviceParamsSchema } from '../validators/appointment.validator';

/**
 * Tenant Controller
 *
 * HTTP request handlers for tenant and service provisioning
 */
export class TenantController {
  constructor(private provisioning: ProvisioningService) {}

  /**
   * POST /v1/tenants
   */
  createTenant = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createTenantSchema, req);

    const tenant = await this.provisioning.createTenant(body);

    res.status(201).json(createSuccessResponse(tenant));
  });

  /**
   * GET /v1/tenants/:tenantId
   */
  getTenant = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(tenantParamsSchema, req);

    const tenant = await this.provisioning.getTenant(params.tenantId);

    res.status(200).json(createSuccessResponse(tenant));
  });

  /**
   * POST /v1/tenants/:tenantId/services
   */
  createService = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(createServiceSchema, req);

    const service = await this.provisioning.createService(params.tenantId, body);

    res.status(201).json(createSuccessResponse(service));
  });

  /**
   * GET /v1/tenants/:tenantId/services/:serviceId
   */
  getService = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(serviceParamsSchema, req);

    const service = await this.provisioning.getService(params.tenantId, params.serviceId);

    res.status(200).json(createSuccessResponse(service));
  });
}
