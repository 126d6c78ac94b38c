import { Router } from 'express';
import type { Container } from '../../container';
import { AppointmentController } from '../../controllers/appointment.controller';

/**
 * Appointment routes (v1), mounted under /v1/tenants/:tenantId/appointments
 */
export function createAppointmentRoutes(container: Container): Router {
  const router = Router({ mergeParams: true });
  const appointmentController = new AppointmentController(container.bookings);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/appointments:
   *   post:
   *     summary: Book an appointment
   *     tags: [Appointments]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [serviceId, customer, scheduledAt]
   *             properties:
   *               serviceId:
   *                 type: string
   *                 format: uuid
   *               customer:
   *                 type: object
   *                 required: [phone]
   *                 properties:
   *                   name:
   *                     type: string
   *                   phone:
   *                     type: string
   *                   email:
   *                     type: string
   *               scheduledAt:
   *                 type: string
   *                 format: date-time
   *               notes:
   *                 type: string
   *     responses:
   *       201:
   *         description: Appointment created as PENDING
   *       409:
   *         description: Slot unavailable
   *       422:
   *         description: In the past or beyond the advance booking window
   */
  router.post('/', appointmentController.createAppointment);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/appointments/{appointmentId}:
   *   get:
   *     summary: Get an appointment
   *     tags: [Appointments]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/AppointmentId'
   *     responses:
   *       200:
   *         description: Appointment retrieved
   *       404:
   *         description: Appointment not found
   */
  router.get('/:appointmentId', appointmentController.getAppointment);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/appointments/{appointmentId}/confirm:
   *   post:
   *     summary: Confirm a PENDING appointment after payment
   *     tags: [Appointments]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/AppointmentId'
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               paymentTransactionId:
   *                 type: string
   *                 format: uuid
   *     responses:
   *       200:
   *         description: Appointment confirmed
   *       409:
   *         description: Not PENDING
   */
  router.post('/:appointmentId/confirm', appointmentController.confirmAppointment);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/appointments/{appointmentId}/cancel:
   *   post:
   *     summary: Cancel a PENDING or CONFIRMED appointment
   *     tags: [Appointments]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/AppointmentId'
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               reason:
   *                 type: string
   *     responses:
   *       200:
   *         description: Appointment cancelled
   *       409:
   *         description: Already terminal
   */
  router.post('/:appointmentId/cancel', appointmentController.cancelAppointment);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/appointments/{appointmentId}/complete:
   *   post:
   *     summary: Complete a CONFIRMED appointment that has ended
   *     tags: [Appointments]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/AppointmentId'
   *     responses:
   *       200:
   *         description: Appointment completed
   *       409:
   *         description: Not CONFIRMED
   *       422:
   *         description: Appointment has not ended yet
   */
  router.post('/:appointmentId/complete', appointmentController.completeAppointment);

  /**
   * @swagger
   * /v1/tenants/{tenantId}/appointments/{appointmentId}/no-show:
   *   post:
   *     summary: Mark a started CONFIRMED appointment as no-show
   *     tags: [Appointments]
   *     parameters:
   *       - $ref: '#/components/parameters/TenantId'
   *       - $ref: '#/components/parameters/AppointmentId'
   *     responses:
   *       200:
   *         description: Appointment marked as no-show
   *       409:
   *         description: Not CONFIRMED
   *       422:
   *         description: Appointment is in the future
   */
  router.post('/:appointmentId/no-show', appointmentController.markNoShow);

  return router;
}
