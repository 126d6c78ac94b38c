import { Request, Response } from 'express';
import type { RaffleService } from '../services/raffle.service';
import type { TicketAllocatorService } from '../services/ticket-allocator.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import {
  createRaffleSchema,
  generateTicketsSchema,
  raffleParamsSchema,
  reserveRandomSchema,
  reserveSpecificSchema,
} from '../validators/raffle.validator';

/**
 * Raffle Controller
 *
 * Raffle administration and ticket reservation endpoints
 */
export class RaffleController {
  constructor(
    private raffles: RaffleService,
    private allocator: TicketAllocatorService
  ) {}

  /**
   * POST /v1/tenants/:tenantId/raffles
   */
  createRaffle = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(createRaffleSchema, req);

    const raffle = await this.raffles.createRaffle(params.tenantId, body);

    res.status(201).json(createSuccessResponse(raffle));
  });

  /**
   * GET /v1/tenants/:tenantId/raffles/:raffleId
   */
  getRaffle = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(raffleParamsSchema, req);

    const raffle = await this.raffles.getRaffle(params.tenantId, params.raffleId);

    res.status(200).json(createSuccessResponse(raffle));
  });

  /**
   * POST /v1/tenants/:tenantId/raffles/:raffleId/tickets
   */
  generateTickets = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(generateTicketsSchema, req);

    const result = await this.raffles.generateTickets(params.raffleId, {
      force: body.force,
      tenantId: params.tenantId,
    });

    res.status(201).json(createSuccessResponse(result, `Generated ${result.generated} tickets`));
  });

  /**
   * GET /v1/tenants/:tenantId/raffles/:raffleId/availability
   */
  getAvailability = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(raffleParamsSchema, req);

    const availability = await this.raffles.getAvailability(params.raffleId, params.tenantId);

    res.status(200).json(createSuccessResponse(availability));
  });

  /**
   * POST /v1/tenants/:tenantId/raffles/:raffleId/reservations
   */
  reserveSpecific = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(reserveSpecificSchema, req);

    const order = await this.allocator.reserveSpecific(params.raffleId, body.numbers, body.contact, params.tenantId);

    res.status(201).json(createSuccessResponse(order));
  });

  /**
   * POST /v1/tenants/:tenantId/raffles/:raffleId/reservations/random
   */
  reserveRandom = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(reserveRandomSchema, req);

    const order = await this.allocator.reserveRandom(params.raffleId, body.qty, body.contact, params.tenantId);

    res.status(201).json(createSuccessResponse(order));
  });
}
