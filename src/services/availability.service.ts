import type { Store, Transaction } from '../store/store';
import type { Tenant, TenantSettings } from '../types/tenant.types';
import {
  MAX_SERVICE_DURATION_MINUTES,
  appointmentEndTime,
  type Appointment,
  type AvailabilityCalendar,
  type Service,
  type SlotCheck,
} from '../types/appointment.types';
import { AppError, BookingError, ErrorCode } from '../types/error.types';
import { resolveTenantSettings } from '../validators/tenant.validator';
import type { Clock } from '../utils/clock';
import {
  addDaysToDateString,
  addMinutes,
  dayWindowForDate,
  daysBetween,
  localDayWindow,
  toLocalDateString,
  zonedDateTime,
  type DayWindow,
} from '../utils/time';
import { logger } from '../config/logger';

export const NEXT_SLOT_SEARCH_DAYS = 30;
export const MAX_CALENDAR_DAYS = 62;

/**
 * Candidate start instants for `date`: from the opening hour, every
 * slotIntervalMinutes, while the slot still ends by closing time.
 *
 * Each call returns a fresh generator, so the sequence can be restarted.
 */
export function* candidateSlots(
  settings: TenantSettings,
  date: string,
  durationMinutes: number
): Generator<Date> {
  const opening = zonedDateTime(date, settings.businessHours.start, 0, settings.timezone);
  const closing = zonedDateTime(date, settings.businessHours.end, 0, settings.timezone);

  for (
    let slot = opening;
    addMinutes(slot, durationMinutes).getTime() <= closing.getTime();
    slot = addMinutes(slot, settings.slotIntervalMinutes)
  ) {
    yield slot;
  }
}

/**
 * Conflict check against preloaded active appointments of the service.
 *
 * An existing appointment conflicts when its own [start, end) intersects
 * the candidate window widened by the buffer on both sides. The daily limit
 * counts appointments starting inside `day`.
 */
export function evaluateSlot(
  active: readonly Appointment[],
  service: Pick<Service, 'durationMinutes' | 'bufferTimeMinutes' | 'maxBookingsPerDay'>,
  scheduledAt: Date,
  day: DayWindow
): SlotCheck {
  const windowStart = addMinutes(scheduledAt, -service.bufferTimeMinutes).getTime();
  const windowEnd = addMinutes(scheduledAt, service.durationMinutes + service.bufferTimeMinutes).getTime();

  const overlaps = active.some(
    (a) => a.scheduledAt.getTime() < windowEnd && appointmentEndTime(a).getTime() > windowStart
  );
  if (overlaps) {
    return { available: false, reason: 'overlap' };
  }

  const bookedThatDay = countStartingIn(active, day);
  if (bookedThatDay >= service.maxBookingsPerDay) {
    return { available: false, reason: 'daily_limit' };
  }

  return { available: true };
}

function countStartingIn(appointments: readonly Appointment[], day: DayWindow): number {
  return appointments.filter(
    (a) => a.scheduledAt.getTime() >= day.start.getTime() && a.scheduledAt.getTime() < day.end.getTime()
  ).length;
}

interface BookingContext {
  tenant: Tenant;
  service: Service;
}

/**
 * Availability Engine
 *
 * Read-side slot discovery. Active appointments are loaded once per local
 * day and every candidate is evaluated in memory against them.
 */
export class AvailabilityService {
  constructor(
    private store: Store,
    private clock: Clock
  ) {}

  /**
   * Future slots of `date` that pass the conflict check.
   * `durationOverride` only changes which candidates fit before closing time.
   */
  async computeAvailableSlots(
    tenantId: string,
    serviceId: string,
    date: string,
    durationOverride?: number
  ): Promise<Date[]> {
    return this.store.atomic(async (tx) => {
      const context = await this.loadContext(tx, tenantId, serviceId);
      const day = await this.loadDay(tx, context, date);
      return this.availableOn(context, day, durationOverride);
    });
  }

  async isSlotAvailable(tenantId: string, serviceId: string, scheduledAt: Date): Promise<boolean> {
    const check = await this.store.atomic(async (tx) => {
      const { tenant, service } = await this.loadContext(tx, tenantId, serviceId);
      return this.checkSlot(tx, tenant, service, scheduledAt);
    });
    return check.available;
  }

  /**
   * Transaction-scoped conflict check. Run it after locking the service row
   * so that the answer holds until commit.
   */
  async checkSlot(tx: Transaction, tenant: Tenant, service: Service, scheduledAt: Date): Promise<SlotCheck> {
    const settings = resolveTenantSettings(tenant.settings);
    const day = localDayWindow(scheduledAt, settings.timezone);
    const active = await this.loadActive(tx, tenant.id, service, scheduledAt, addMinutes(scheduledAt, 1), day);
    return evaluateSlot(active, service, scheduledAt, day);
  }

  /**
   * First available slot scanning forward from the local date of `from`,
   * at most NEXT_SLOT_SEARCH_DAYS days. Null when none is found.
   */
  async nextAvailableSlot(tenantId: string, serviceId: string, from: Date = this.clock.now()): Promise<Date | null> {
    return this.store.atomic(async (tx) => {
      const context = await this.loadContext(tx, tenantId, serviceId);
      const firstDate = toLocalDateString(from, context.tenant.settings.timezone);

      for (let offset = 0; offset < NEXT_SLOT_SEARCH_DAYS; offset++) {
        const day = await this.loadDay(tx, context, addDaysToDateString(firstDate, offset));
        const [first] = this.availableOn(context, day);
        if (first) return first;
      }
      return null;
    });
  }

  /**
   * Per-day availability for an inclusive date range
   */
  async availabilityCalendar(
    tenantId: string,
    serviceId: string,
    startDate: string,
    endDate: string
  ): Promise<AvailabilityCalendar> {
    const span = daysBetween(startDate, endDate);
    if (span < 0) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'endDate must not be before startDate');
    }
    if (span + 1 > MAX_CALENDAR_DAYS) {
      throw new AppError(
        ErrorCode.VALIDATION_ERROR,
        `Calendar range must not exceed ${MAX_CALENDAR_DAYS} days`
      );
    }

    return this.store.atomic(async (tx) => {
      const context = await this.loadContext(tx, tenantId, serviceId);
      const calendar: AvailabilityCalendar = {};

      for (let offset = 0; offset <= span; offset++) {
        const date = addDaysToDateString(startDate, offset);
        const day = await this.loadDay(tx, context, date);
        const slots = this.availableOn(context, day);
        calendar[date] = {
          availableCount: slots.length,
          bookedCount: countStartingIn(day.active, day.window),
          slots,
        };
      }

      logger.debug('Availability calendar computed', { tenantId, serviceId, startDate, endDate });
      return calendar;
    });
  }

  async isServiceAvailableOnDate(tenantId: string, serviceId: string, date: string): Promise<boolean> {
    const slots = await this.computeAvailableSlots(tenantId, serviceId, date);
    return slots.length > 0;
  }

  /**
   * Active tenant and service, or NOT_FOUND_OR_INACTIVE
   */
  async loadContext(tx: Transaction, tenantId: string, serviceId: string): Promise<BookingContext> {
    const tenant = await tx.tenants.findById(tenantId);
    if (!tenant || !tenant.isActive) {
      throw new BookingError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Tenant not found or inactive');
    }
    const service = await tx.services.findById(tenantId, serviceId);
    if (!service || !service.isActive) {
      throw new BookingError(ErrorCode.NOT_FOUND_OR_INACTIVE, 'Service not found or inactive');
    }
    return { tenant: { ...tenant, settings: resolveTenantSettings(tenant.settings) }, service };
  }

  private async loadDay(tx: Transaction, context: BookingContext, date: string): Promise<LoadedDay> {
    const { tenant, service } = context;
    const window = dayWindowForDate(date, tenant.settings.timezone);
    const active = await this.loadActive(tx, tenant.id, service, window.start, window.end, window);
    return { date, window, active };
  }

  private availableOn(context: BookingContext, day: LoadedDay, durationOverride?: number): Date[] {
    const { tenant, service } = context;
    const now = this.clock.now().getTime();
    const duration = durationOverride ?? service.durationMinutes;
    const slots: Date[] = [];

    for (const slot of candidateSlots(tenant.settings, day.date, duration)) {
      if (slot.getTime() <= now) continue;
      if (evaluateSlot(day.active, service, slot, day.window).available) {
        slots.push(slot);
      }
    }
    return slots;
  }

  /**
   * Active appointments that can matter for candidates starting in [from, to):
   * anything overlapping the buffered windows, plus everything in `day`.
   */
  private async loadActive(
    tx: Transaction,
    tenantId: string,
    service: Service,
    from: Date,
    to: Date,
    day: DayWindow
  ): Promise<Appointment[]> {
    const lookBack = addMinutes(from, -(service.bufferTimeMinutes + MAX_SERVICE_DURATION_MINUTES));
    const lookAhead = addMinutes(to, service.durationMinutes + service.bufferTimeMinutes);
    const rangeStart = lookBack.getTime() < day.start.getTime() ? lookBack : day.start;
    const rangeEnd = lookAhead.getTime() > day.end.getTime() ? lookAhead : day.end;
    return tx.appointments.findActiveStartingBetween(tenantId, service.id, rangeStart, rangeEnd);
  }
}

interface LoadedDay {
  date: string;
  window: DayWindow;
  active: Appointment[];
}
