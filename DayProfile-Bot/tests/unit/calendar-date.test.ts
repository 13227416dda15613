import { describe, it, expect } from 'vitest';
import {
  addDays,
  dayOfWeek,
  daysBetween,
  isValidTimeZone,
  julianDayNumber,
  parseIsoDate,
  toIsoDate,
  todayIn,
} from '../../src/profile/calendar-date.js';

describe('parseIsoDate', () => {
  it('parses a real calendar date', () => {
    expect(parseIsoDate('2025-11-30')).toEqual({ year: 2025, month: 11, day: 30 });
  });

  it('accepts 29 February in a leap year', () => {
    expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it.each(['2025-02-30', '2023-02-29', '2025-13-01', '2025-00-10', '2025-04-31', '2025-01-00'])(
    'rejects the impossible date %s',
    (text) => {
      expect(parseIsoDate(text)).toBeNull();
    }
  );

  it.each(['', 'today', '30.11.2025', '2025-1-5', '2025-11-30T00:00', ' 2025-11-30', '20251130'])(
    'rejects the malformed text "%s"',
    (text) => {
      expect(parseIsoDate(text)).toBeNull();
    }
  );

  it('keeps two-digit years in the first century', () => {
    expect(parseIsoDate('0050-03-01')).toEqual({ year: 50, month: 3, day: 1 });
  });
});

describe('toIsoDate', () => {
  it('pads every component', () => {
    expect(toIsoDate({ year: 987, month: 1, day: 5 })).toBe('0987-01-05');
  });
});

describe('date arithmetic', () => {
  it('adds days across month and year ends', () => {
    expect(addDays({ year: 2025, month: 12, day: 29 }, 7)).toEqual({ year: 2026, month: 1, day: 5 });
    expect(addDays({ year: 2024, month: 3, day: 1 }, -1)).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it('counts days in both directions', () => {
    const a = { year: 2025, month: 1, day: 1 };
    const b = { year: 2025, month: 3, day: 1 };
    expect(daysBetween(a, b)).toBe(59);
    expect(daysBetween(b, a)).toBe(-59);
  });

  it('gives the weekday with Sunday as 0', () => {
    expect(dayOfWeek({ year: 2025, month: 11, day: 30 })).toBe(0);
    expect(dayOfWeek({ year: 2024, month: 6, day: 1 })).toBe(6);
  });

  it('computes the Julian Day Number', () => {
    expect(julianDayNumber({ year: 2000, month: 1, day: 1 })).toBe(2451545);
    expect(julianDayNumber({ year: 2012, month: 12, day: 21 })).toBe(2456283);
  });
});

describe('todayIn', () => {
  const instant = new Date('2025-11-30T22:30:00Z');

  it('reads the calendar date in the given zone', () => {
    expect(todayIn('UTC', instant)).toEqual({ year: 2025, month: 11, day: 30 });
    expect(todayIn('Europe/Moscow', instant)).toEqual({ year: 2025, month: 12, day: 1 });
    expect(todayIn('America/New_York', instant)).toEqual({ year: 2025, month: 11, day: 30 });
  });
});

describe('isValidTimeZone', () => {
  it('accepts IANA names and rejects unknown ones', () => {
    expect(isValidTimeZone('Europe/Moscow')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus')).toBe(false);
  });
});
