import type { Store, Transaction } from '../store/store';
import {
  AppointmentStatus,
  PaymentStatus,
  appointmentEndTime,
  canTransitionAppointment,
  type Appointment,
  type AppointmentPatch,
  type CustomerData,
} from '../types/appointment.types';
import type { Tenant } from '../types/tenant.types';
import { BookingError, ErrorCode } from '../types/error.types';
import { resolveTenantSettings } from '../validators/tenant.validator';
import type { Clock } from '../utils/clock';
import { addDays, formatLocalDateTime } from '../utils/time';
import { logger } from '../config/logger';
import type { AvailabilityService } from './availability.service';

type AppointmentTarget = Exclude<AppointmentStatus, AppointmentStatus.PENDING>;

const REJECTION_MESSAGES: Record<AppointmentTarget, (current: AppointmentStatus) => string> = {
  [AppointmentStatus.CONFIRMED]: (current) => `Cannot confirm an appointment with status: ${current}`,
  [AppointmentStatus.CANCELLED]: (current) => `Cannot cancel an appointment with status: ${current}`,
  [AppointmentStatus.COMPLETED]: (current) =>
    `Only confirmed appointments can be completed. Current status: ${current}`,
  [AppointmentStatus.NO_SHOW]: (current) =>
    `Only confirmed appointments can be marked as no-show. Current status: ${current}`,
};

function appendNote(existing: string, line: string): string {
  return existing ? `${existing}\n\n${line}` : line;
}

/**
 * Booking Lifecycle
 *
 * PENDING -> CONFIRMED | CANCELLED
 * CONFIRMED -> COMPLETED | CANCELLED | NO_SHOW
 *
 * Creation locks the service row before the conflict check, so two bookings
 * for the same service are decided one after the other. Every transition
 * locks the appointment row and writes the customer in the same transaction.
 */
export class BookingService {
  constructor(
    private store: Store,
    private availability: AvailabilityService,
    private clock: Clock
  ) {}

  async create(
    tenantId: string,
    serviceId: string,
    customerData: CustomerData,
    scheduledAt: Date,
    notes = ''
  ): Promise<Appointment> {
    logger.info('Creating appointment', { tenantId, serviceId, scheduledAt });

    const appointment = await this.store.atomic(async (tx) => {
      const tenant = await this.loadTenant(tx, tenantId);

      // Parent lock first: serialises every booking for this service
      const service = await tx.services.lock(tenantId, serviceId);
      if (!service || !service.isActive) {
        throw new BookingError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Service not found or inactive');
      }

      const now = this.clock.now();
      if (scheduledAt.getTime() <= now.getTime()) {
        throw new BookingError(ErrorCode.INVALID_TIME_WINDOW, 'Cannot book appointments in the past');
      }
      if (scheduledAt.getTime() > addDays(now, service.advanceBookingDays).getTime()) {
        throw new BookingError(
          ErrorCode.INVALID_TIME_WINDOW,
          `Cannot book more than ${service.advanceBookingDays} days in advance`
        );
      }

      const check = await this.availability.checkSlot(tx, tenant, service, scheduledAt);
      if (!check.available) {
        throw new BookingError(ErrorCode.SLOT_UNAVAILABLE, 'This time slot is not available', {
          reason: check.reason,
        });
      }

      const customer = await tx.customers.upsertByPhone({ tenantId, ...customerData });

      return tx.appointments.insert({
        tenantId,
        serviceId: service.id,
        customerId: customer.id,
        scheduledAt,
        durationMinutes: service.durationMinutes,
        totalAmount: service.price,
        currency: service.currency,
        customerNotes: notes,
      });
    });

    logger.info('Appointment created', {
      appointmentId: appointment.id,
      customerId: appointment.customerId,
      scheduledAt: appointment.scheduledAt,
    });
    return appointment;
  }

  /**
   * Confirm after payment: CONFIRMED, PAID and the customer's last visit
   */
  async confirm(tenantId: string, appointmentId: string, paymentTransactionId?: string): Promise<Appointment> {
    return this.transition(tenantId, appointmentId, AppointmentStatus.CONFIRMED, async (tx, appointment, now) => {
      const patch: AppointmentPatch = {
        status: AppointmentStatus.CONFIRMED,
        paymentStatus: PaymentStatus.PAID,
        confirmedAt: now,
      };
      if (paymentTransactionId) {
        patch.paymentTransactionId = paymentTransactionId;
      }
      await tx.customers.setLastAppointmentAt(appointment.customerId, now);
      return patch;
    });
  }

  async cancel(tenantId: string, appointmentId: string, reason?: string): Promise<Appointment> {
    return this.transition(tenantId, appointmentId, AppointmentStatus.CANCELLED, async (_tx, appointment, now) => {
      const patch: AppointmentPatch = { status: AppointmentStatus.CANCELLED, cancelledAt: now };
      if (reason) {
        patch.internalNotes = appendNote(appointment.internalNotes, `Cancelled: ${reason}`);
      }
      return patch;
    });
  }

  async complete(tenantId: string, appointmentId: string): Promise<Appointment> {
    return this.transition(tenantId, appointmentId, AppointmentStatus.COMPLETED, async (tx, appointment, now) => {
      if (appointmentEndTime(appointment).getTime() > now.getTime()) {
        throw new BookingError(
          ErrorCode.INVALID_TIME_WINDOW,
          'Cannot complete an appointment that has not ended yet'
        );
      }
      await tx.customers.setLastAppointmentAt(appointment.customerId, now);
      return { status: AppointmentStatus.COMPLETED, completedAt: now };
    });
  }

  async markNoShow(tenantId: string, appointmentId: string): Promise<Appointment> {
    return this.transition(
      tenantId,
      appointmentId,
      AppointmentStatus.NO_SHOW,
      async (_tx, appointment, now, tenant) => {
        if (appointment.scheduledAt.getTime() > now.getTime()) {
          throw new BookingError(ErrorCode.INVALID_TIME_WINDOW, 'Cannot mark a future appointment as no-show');
        }
        const stamp = formatLocalDateTime(now, tenant.settings.timezone);
        return {
          status: AppointmentStatus.NO_SHOW,
          internalNotes: appendNote(appointment.internalNotes, `Marked as no-show on ${stamp}`),
        };
      }
    );
  }

  async getAppointment(tenantId: string, appointmentId: string): Promise<Appointment> {
    const appointment = await this.store.atomic((tx) => tx.appointments.findById(tenantId, appointmentId));
    if (!appointment) {
      throw new BookingError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Appointment not found');
    }
    return appointment;
  }

  /**
   * Lock the appointment, reject sources the state machine does not list,
   * then apply the patch `apply` builds inside the same transaction.
   */
  private async transition(
    tenantId: string,
    appointmentId: string,
    target: AppointmentTarget,
    apply: (tx: Transaction, appointment: Appointment, now: Date, tenant: Tenant) => Promise<AppointmentPatch>
  ): Promise<Appointment> {
    const updated = await this.store.atomic(async (tx) => {
      const tenant = await this.loadTenant(tx, tenantId);
      const appointment = await tx.appointments.lock(tenantId, appointmentId);
      if (!appointment) {
        throw new BookingError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Appointment not found');
      }
      if (!canTransitionAppointment(appointment.status, target)) {
        throw new BookingError(ErrorCode.INVALID_STATE_TRANSITION, REJECTION_MESSAGES[target](appointment.status), {
          from: appointment.status,
          to: target,
        });
      }

      const patch = await apply(tx, appointment, this.clock.now(), tenant);
      return tx.appointments.update(appointment.id, patch);
    });

    logger.info('Appointment status changed', { appointmentId, status: updated.status });
    return updated;
  }

  private async loadTenant(tx: Transaction, tenantId: string): Promise<Tenant> {
    const tenant = await tx.tenants.findById(tenantId);
    if (!tenant || !tenant.isActive) {
      throw new BookingError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Tenant not found or inactive');
    }
    return { ...tenant, settings: resolveTenantSettings(tenant.settings) };
  }
}
