import { describe, it, expect, beforeEach } from 'vitest';
import { evaluateSlot, candidateSlots } from '../src/services/availability.service';
import {
  AppointmentStatus,
  PaymentStatus,
  type Appointment,
  type Service,
} from '../src/types/appointment.types';
import { ErrorCode } from '../src/types/error.types';
import { dayWindowForDate } from '../src/utils/time';
import type { Tenant } from '../src/types/tenant.types';
import { createTestEngine, customer, seedService, seedTenant, type TestEngine } from './helpers';

const iso = (dates: Date[]) => dates.map((d) => d.toISOString());

function appointmentAt(start: string, durationMinutes = 60): Appointment {
  const at = new Date(start);
  return {
    id: `appt-${start}`,
    tenantId: 'tenant-1',
    serviceId: 'service-1',
    customerId: 'customer-1',
    scheduledAt: at,
    durationMinutes,
    status: AppointmentStatus.PENDING,
    paymentStatus: PaymentStatus.PENDING,
    totalAmount: 25,
    currency: 'USD',
    paymentTransactionId: null,
    customerNotes: '',
    internalNotes: '',
    createdAt: at,
    updatedAt: at,
    confirmedAt: null,
    cancelledAt: null,
    completedAt: null,
  };
}

describe('candidateSlots', () => {
  it('steps from opening until the slot no longer fits before closing', () => {
    const settings = { timezone: 'UTC', businessHours: { start: 9, end: 12 }, slotIntervalMinutes: 45 };

    const slots = Array.from(candidateSlots(settings, '2030-01-07', 60));

    expect(iso(slots)).toEqual([
      '2030-01-07T09:00:00.000Z',
      '2030-01-07T09:45:00.000Z',
      '2030-01-07T10:30:00.000Z',
    ]);
  });
});

describe('evaluateSlot', () => {
  const day = dayWindowForDate('2030-01-07', 'UTC');
  const service = { durationMinutes: 60, bufferTimeMinutes: 0, maxBookingsPerDay: 20 };
  const existing = [appointmentAt('2030-01-07T10:00:00Z')];

  it('allows back-to-back slots', () => {
    expect(evaluateSlot(existing, service, new Date('2030-01-07T09:00:00Z'), day)).toEqual({ available: true });
    expect(evaluateSlot(existing, service, new Date('2030-01-07T11:00:00Z'), day)).toEqual({ available: true });
  });

  it('rejects an overlapping slot', () => {
    expect(evaluateSlot(existing, service, new Date('2030-01-07T10:30:00Z'), day)).toEqual({
      available: false,
      reason: 'overlap',
    });
  });

  it('widens the candidate window by the buffer on both sides', () => {
    const buffered = { ...service, bufferTimeMinutes: 30 };

    expect(evaluateSlot(existing, buffered, new Date('2030-01-07T11:30:00Z'), day)).toEqual({ available: true });
    expect(evaluateSlot(existing, buffered, new Date('2030-01-07T11:15:00Z'), day).available).toBe(false);
    expect(evaluateSlot(existing, buffered, new Date('2030-01-07T08:30:00Z'), day)).toEqual({ available: true });
    expect(evaluateSlot(existing, buffered, new Date('2030-01-07T08:45:00Z'), day).available).toBe(false);
  });

  it('reports the daily limit once the day is full', () => {
    const capped = { ...service, maxBookingsPerDay: 1 };

    expect(evaluateSlot(existing, capped, new Date('2030-01-07T14:00:00Z'), day)).toEqual({
      available: false,
      reason: 'daily_limit',
    });
  });
});

describe('AvailabilityService', () => {
  let engine: TestEngine;
  let tenant: Tenant;
  let service: Service;

  beforeEach(async () => {
    engine = createTestEngine();
    tenant = await seedTenant(engine);
    service = await seedService(engine, tenant.id);
  });

  const book = (at: string, phone = '+10000000001') =>
    engine.container.bookings.create(tenant.id, service.id, customer(phone), new Date(at));

  describe('computeAvailableSlots', () => {
    it('lists every slot of an empty day', async () => {
      const slots = await engine.container.availability.computeAvailableSlots(tenant.id, service.id, '2030-01-07');

      expect(slots).toHaveLength(17);
      expect(slots[0]?.toISOString()).toBe('2030-01-07T09:00:00.000Z');
      expect(slots[16]?.toISOString()).toBe('2030-01-07T17:00:00.000Z');
    });

    it('drops slots that overlap an active appointment', async () => {
      await book('2030-01-07T10:00:00Z');

      const slots = await engine.container.availability.computeAvailableSlots(tenant.id, service.id, '2030-01-07');

      expect(slots).toHaveLength(14);
      expect(iso(slots).slice(0, 3)).toEqual([
        '2030-01-07T09:00:00.000Z',
        '2030-01-07T11:00:00.000Z',
        '2030-01-07T11:30:00.000Z',
      ]);
    });

    it('applies the service buffer', async () => {
      const buffered = await seedService(engine, tenant.id, { name: 'Colour', bufferTimeMinutes: 15 });
      await engine.container.bookings.create(
        tenant.id,
        buffered.id,
        customer(),
        new Date('2030-01-07T10:00:00Z')
      );

      const slots = await engine.container.availability.computeAvailableSlots(tenant.id, buffered.id, '2030-01-07');

      expect(slots).toHaveLength(12);
      expect(iso(slots).slice(0, 1)).toEqual(['2030-01-07T11:30:00.000Z']);
    });

    it('frees the slot again when the appointment is cancelled', async () => {
      const appointment = await book('2030-01-07T10:00:00Z');
      await engine.container.bookings.cancel(tenant.id, appointment.id);

      const slots = await engine.container.availability.computeAvailableSlots(tenant.id, service.id, '2030-01-07');

      expect(slots).toHaveLength(17);
    });

    it('skips slots that have already started', async () => {
      engine.clock.set('2030-01-07T12:10:00Z');

      const slots = await engine.container.availability.computeAvailableSlots(tenant.id, service.id, '2030-01-07');

      expect(slots).toHaveLength(10);
      expect(slots[0]?.toISOString()).toBe('2030-01-07T12:30:00.000Z');
    });

    it('uses a duration override to decide which candidates fit', async () => {
      const slots = await engine.container.availability.computeAvailableSlots(
        tenant.id,
        service.id,
        '2030-01-07',
        120
      );

      expect(slots).toHaveLength(15);
      expect(slots[14]?.toISOString()).toBe('2030-01-07T16:00:00.000Z');
    });

    it('follows the tenant time zone', async () => {
      const eastern = await seedTenant(engine, { timezone: 'America/New_York' });
      const easternService = await seedService(engine, eastern.id);

      const slots = await engine.container.availability.computeAvailableSlots(
        eastern.id,
        easternService.id,
        '2030-01-07'
      );

      expect(slots).toHaveLength(17);
      expect(slots[0]?.toISOString()).toBe('2030-01-07T14:00:00.000Z');
    });

    it('returns nothing once the daily limit is reached', async () => {
      const capped = await seedService(engine, tenant.id, { name: 'Massage', maxBookingsPerDay: 2 });
      await engine.container.bookings.create(tenant.id, capped.id, customer(), new Date('2030-01-07T09:00:00Z'));
      await engine.container.bookings.create(tenant.id, capped.id, customer(), new Date('2030-01-07T11:00:00Z'));

      const today = await engine.container.availability.computeAvailableSlots(tenant.id, capped.id, '2030-01-07');
      const tomorrow = await engine.container.availability.isServiceAvailableOnDate(
        tenant.id,
        capped.id,
        '2030-01-08'
      );

      expect(today).toEqual([]);
      expect(tomorrow).toBe(true);
    });

    it('rejects an inactive service', async () => {
      const retired = await seedService(engine, tenant.id, { name: 'Retired', isActive: false });

      await expect(
        engine.container.availability.computeAvailableSlots(tenant.id, retired.id, '2030-01-07')
      ).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND_OR_INACTIVE, message: 'Service not found or inactive' });
    });

    it('does not expose another tenant\'s service', async () => {
      const other = await seedTenant(engine);

      await expect(
        engine.container.availability.computeAvailableSlots(other.id, service.id, '2030-01-07')
      ).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND_OR_INACTIVE, message: 'Service not found or inactive' });
    });
  });

  describe('isSlotAvailable', () => {
    it('answers for a single instant', async () => {
      await book('2030-01-07T10:00:00Z');

      await expect(
        engine.container.availability.isSlotAvailable(tenant.id, service.id, new Date('2030-01-07T10:30:00Z'))
      ).resolves.toBe(false);
      await expect(
        engine.container.availability.isSlotAvailable(tenant.id, service.id, new Date('2030-01-07T11:00:00Z'))
      ).resolves.toBe(true);
    });
  });

  describe('nextAvailableSlot', () => {
    it('finds the first free slot today', async () => {
      const slot = await engine.container.availability.nextAvailableSlot(tenant.id, service.id);

      expect(slot?.toISOString()).toBe('2030-01-07T09:00:00.000Z');
    });

    it('moves to the next day after closing', async () => {
      engine.clock.set('2030-01-07T17:30:00Z');

      const slot = await engine.container.availability.nextAvailableSlot(tenant.id, service.id);

      expect(slot?.toISOString()).toBe('2030-01-08T09:00:00.000Z');
    });

    it('returns null when no slot ever fits', async () => {
      const marathon = await seedService(engine, tenant.id, { name: 'Marathon', durationMinutes: 600 });

      const slot = await engine.container.availability.nextAvailableSlot(tenant.id, marathon.id);

      expect(slot).toBeNull();
    });
  });

  describe('availabilityCalendar', () => {
    it('summarises each day of the range', async () => {
      await book('2030-01-07T10:00:00Z');

      const calendar = await engine.container.availability.availabilityCalendar(
        tenant.id,
        service.id,
        '2030-01-07',
        '2030-01-08'
      );

      expect(Object.keys(calendar)).toEqual(['2030-01-07', '2030-01-08']);
      expect(calendar['2030-01-07']).toMatchObject({ availableCount: 14, bookedCount: 1 });
      expect(calendar['2030-01-08']).toMatchObject({ availableCount: 17, bookedCount: 0 });
      expect(calendar['2030-01-08']?.slots).toHaveLength(17);
    });

    it('rejects a reversed range', async () => {
      await expect(
        engine.container.availability.availabilityCalendar(tenant.id, service.id, '2030-01-08', '2030-01-07')
      ).rejects.toMatchObject({ code: ErrorCode.VALIDATION_ERROR, message: 'endDate must not be before startDate' });
    });

    it('rejects a range longer than 62 days', async () => {
      await expect(
        engine.container.availability.availabilityCalendar(tenant.id, service.id, '2030-01-01', '2030-03-04')
      ).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Calendar range must not exceed 62 days',
      });
    });
  });
});
