import { daysBetween, type CalendarDate } from '../profile/calendar-date.js';
import type { Biorhythms } from '../profile/schema.js';

export const BIORHYTHM_PERIODS = {
  physical: 23,
  emotional: 28,
  intellectual: 33,
  spiritual: 53,
} as const;

function cyclePercent(days: number, period: number): number {
  const value = Math.round(Math.sin((2 * Math.PI * days) / period) * 100);
  // collapse -0
  return value === 0 ? 0 : value;
}

export function biorhythms(birthDate: CalendarDate, date: CalendarDate): Biorhythms {
  const days = daysBetween(birthDate, date);
  return {
    physical: cyclePercent(days, BIORHYTHM_PERIODS.physical),
    emotional: cyclePercent(days, BIORHYTHM_PERIODS.emotional),
    intellectual: cyclePercent(days, BIORHYTHM_PERIODS.intellectual),
    spiritual: cyclePercent(days, BIORHYTHM_PERIODS.spiritual),
  };
}
