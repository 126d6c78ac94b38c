import { Request, Response } from 'express';
import type { AvailabilityService } from '../services/availability.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { availableSlotsSchema, calendarSchema, nextSlotSchema } from '../validators/appointment.validator';

/**
 * Availability Controller
 *
 * Read-only slot discovery for a tenant's service
 */
export class AvailabilityController {
  constructor(private availability: AvailabilityService) {}

  /**
   * GET /v1/tenants/:tenantId/services/:serviceId/slots?date=YYYY-MM-DD
   */
  getSlots = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = parseRequest(availableSlotsSchema, req);

    const slots = await this.availability.computeAvailableSlots(
      params.tenantId,
      params.serviceId,
      query.date,
      query.duration
    );

    res.status(200).json(createSuccessResponse({ date: query.date, slots }));
  });

  /**
   * GET /v1/tenants/:tenantId/services/:serviceId/next-slot
   */
  getNextSlot = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = parseRequest(nextSlotSchema, req);

    const slot = await this.availability.nextAvailableSlot(params.tenantId, params.serviceId, query.from);

    res.status(200).json(createSuccessResponse({ slot }));
  });

  /**
   * GET /v1/tenants/:tenantId/services/:serviceId/calendar?startDate=&endDate=
   */
  getCalendar = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = parseRequest(calendarSchema, req);

    const calendar = await this.availability.availabilityCalendar(
      params.tenantId,
      params.serviceId,
      query.startDate,
      query.endDate
    );

    res.status(200).json(createSuccessResponse(calendar));
  });
}
