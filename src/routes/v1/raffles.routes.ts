import { Router } from 'express';
import type { Container } from '../../container';
import { RaffleController } from '../../controllers/raffle.controller';

/**
 * Raffle routes (v1), mounted under /v1/tenants/:tenantId/raffles
 */
export function createRaffleRoutes(container: Container): Router {
  const router = Router({ mergeParams: true });
  const raffleController = new RaffleController(container.raffles, container.allocator);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/raffles:
   *   post:
   *     summary: Create a raffle
   *     tags: [Raffles]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [title, ticketPrice, maxNumber]
   *             properties:
   *               title:
   *                 type: string
   *               ticketPrice:
   *                 type: number
   *               minNumber:
   *                 type: integer
   *                 default: 1
   *               maxNumber:
   *                 type: integer
   *               currency:
   *                 type: string
   *               drawDate:
   *                 type: string
   *                 format: date-time
   *     responses:
   *       201:
   *         description: Raffle created
   */
  router.post('/', raffleController.createRaffle);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/raffles/{raffleId}:
   *   get:
   *     summary: Get a raffle
   *     tags: [Raffles]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/RaffleId'
   *     responses:
   *       200:
   *         description: Raffle retrieved
   *       404:
   *         description: Raffle not found
   */
  router.get('/:raffleId', raffleController.getRaffle);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/raffles/{raffleId}/tickets:
   *   post:
   *     summary: Generate one ticket per number in the raffle range
   *     tags: [Raffles]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/RaffleId'
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               force:
   *                 type: boolean
   *     responses:
   *       201:
   *         description: Tickets generated
   *       409:
   *         description: Tickets already exist
   */
  router.post('/:raffleId/tickets', raffleController.generateTickets);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/raffles/{raffleId}/availability:
   *   get:
   *     summary: Ticket counts and available numbers
   *     tags: [Raffles]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/RaffleId'
   *     responses:
   *       200:
   *         description: Availability report
   */
  router.get('/:raffleId/availability', raffleController.getAvailability);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/raffles/{raffleId}/reservations:
   *   post:
   *     summary: Reserve specific ticket numbers
   *     tags: [Reservations]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/RaffleId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [numbers, contact]
   *             properties:
   *               numbers:
   *                 type: array
   *                 items:
   *                   type: integer
   *               contact:
   *                 $ref: '#/components/schemas/Contact'
   *     responses:
   *       201:
   *         description: Order created in PENDING_PAYMENT
   *       400:
   *         description: Quantity outside the allowed range
   *       409:
   *         description: Invalid, missing or unavailable numbers
   */
  router.post('/:raffleId/reservations', raffleController.reserveSpecific);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/raffles/{raffleId}/reservations/random:
   *   post:
   *     summary: Reserve randomly chosen available tickets
   *     tags: [Reservations]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/RaffleId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [qty, contact]
   *             properties:
   *               qty:
   *                 type: integer
   *                 minimum: 1
   *               contact:
   *                 $ref: '#/components/schemas/Contact'
   *     responses:
   *       201:
   *         description: Order created in PENDING_PAYMENT
   *       400:
   *         description: Quantity outside the allowed range or not enough tickets left
   */
  router.post('/:raffleId/reservations/random', raffleController.reserveRandom);

  return router;
}
