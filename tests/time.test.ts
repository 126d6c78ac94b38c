import { describe, it, expect } from 'vitest';
import {
  addDaysToDateString,
  addMinutes,
  dayWindowForDate,
  daysBetween,
  formatLocalDateTime,
  isValidDateString,
  isValidTimeZone,
  toLocalDateString,
  zonedDateTime,
} from '../src/utils/time';

describe('time utilities', () => {
  it('adds minutes to an instant', () => {
    expect(addMinutes(new Date('2030-01-01T00:00:00Z'), 90).toISOString()).toBe('2030-01-01T01:30:00.000Z');
  });

  it('validates calendar dates', () => {
    expect(isValidDateString('2028-02-29')).toBe(true);
    expect(isValidDateString('2030-02-29')).toBe(false);
    expect(isValidDateString('2030-13-01')).toBe(false);
    expect(isValidDateString('2030-1-01')).toBe(false);
  });

  it('validates IANA time zones', () => {
    expect(isValidTimeZone('UTC')).toBe(true);
    expect(isValidTimeZone('America/New_York')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });

  describe('zonedDateTime', () => {
    it('resolves wall-clock time in UTC', () => {
      expect(zonedDateTime('2030-01-07', 9, 0, 'UTC').toISOString()).toBe('2030-01-07T09:00:00.000Z');
    });

    it('applies standard and daylight offsets', () => {
      expect(zonedDateTime('2030-01-07', 9, 0, 'America/New_York').toISOString()).toBe('2030-01-07T14:00:00.000Z');
      expect(zonedDateTime('2030-07-01', 9, 0, 'America/New_York').toISOString()).toBe('2030-07-01T13:00:00.000Z');
    });

    it('rolls hour 24 into the next day', () => {
      expect(zonedDateTime('2030-01-07', 24, 0, 'UTC').toISOString()).toBe('2030-01-08T00:00:00.000Z');
    });

    it('rejects impossible dates', () => {
      expect(() => zonedDateTime('2030-02-30', 9, 0, 'UTC')).toThrow(RangeError);
    });
  });

  it('formats instants in a tenant time zone', () => {
    expect(toLocalDateString(new Date('2030-01-08T03:00:00Z'), 'America/New_York')).toBe('2030-01-07');
    expect(formatLocalDateTime(new Date('2030-01-07T14:05:00Z'), 'America/New_York')).toBe('2030-01-07 09:05');
  });

  it('does calendar arithmetic on date strings', () => {
    expect(addDaysToDateString('2030-01-31', 1)).toBe('2030-02-01');
    expect(addDaysToDateString('2030-03-01', -1)).toBe('2030-02-28');
    expect(daysBetween('2030-01-01', '2030-03-01')).toBe(59);
    expect(daysBetween('2030-01-02', '2030-01-01')).toBe(-1);
  });

  describe('dayWindowForDate', () => {
    it('spans local midnight to midnight', () => {
      const window = dayWindowForDate('2030-01-07', 'America/New_York');
      expect(window.start.toISOString()).toBe('2030-01-07T05:00:00.000Z');
      expect(window.end.toISOString()).toBe('2030-01-08T05:00:00.000Z');
    });

    it('is 23 hours long on the spring-forward day', () => {
      const window = dayWindowForDate('2030-03-10', 'America/New_York');
      expect(window.start.toISOString()).toBe('2030-03-10T05:00:00.000Z');
      expect(window.end.toISOString()).toBe('2030-03-11T04:00:00.000Z');
      expect((window.end.getTime() - window.start.getTime()) / 3_600_000).toBe(23);
    });
  });
});
