import { Request, Response } from 'express';
import type { BookingService } from '../services/booking.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import {
  appointmentParamsSchema,
  cancelAppointmentSchema,
  confirmAppointmentSchema,
  createAppointmentSchema,
} from '../validators/appointment.validator';

/**
 * Appointment Controller
 *
 * HTTP request handlers for the booking lifecycle
 */
export class AppointmentController {
  constructor(private bookings: BookingService) {}

  /**
   * POST /v1/tenants/:tenantId/appointments
   */
  createAppointment = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(createAppointmentSchema, req);

    const appointment = await this.bookings.create(
      params.tenantId,
      body.serviceId,
      body.customer,
      body.scheduledAt,
      body.notes
    );

    res.status(201).json(createSuccessResponse(appointment));
  });

  /**
   * GET /v1/tenants/:tenantId/appointments/:appointmentId
   */
  getAppointment = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(appointmentParamsSchema, req);

    const appointment = await this.bookings.getAppointment(params.tenantId, params.appointmentId);

    res.status(200).json(createSuccessResponse(appointment));
  });

  /**
   * POST /v1/tenants/:tenantId/appointments/:appointmentId/confirm
   */
  confirmAppointment = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(confirmAppointmentSchema, req);

    const appointment = await this.bookings.confirm(
      params.tenantId,
      params.appointmentId,
      body.paymentTransactionId
    );

    res.status(200).json(createSuccessResponse(appointment, 'Appointment confirmed'));
  });

  /**
   * POST /v1/tenants/:tenantId/appointments/:appointmentId/cancel
   */
  cancelAppointment = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(cancelAppointmentSchema, req);

    const appointment = await this.bookings.cancel(params.tenantId, params.appointmentId, body.reason);

    res.status(200).json(createSuccessResponse(appointment, 'Appointment cancelled'));
  });

  /**
   * POST /v1/tenants/:tenantId/appointments/:appointmentId/complete
   */
  completeAppointment = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(appointmentParamsSchema, req);

    const appointment = await this.bookings.complete(params.tenantId, params.appointmentId);

    res.status(200).json(createSuccessResponse(appointment, 'Appointment completed'));
  });

  /**
   * POST /v1/tenants/:tenantId/appointments/:appointmentId/no-show
   */
  markNoShow = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(appointmentParamsSchema, req);

    const appointment = await this.bookings.markNoShow(params.tenantId, params.appointmentId);

    res.status(200).json(createSuccessResponse(appointment, 'Appointment marked as no-show'));
  });
}
