import { julianDayNumber, type CalendarDate } from '../profile/calendar-date.js';
import { MOON_PHASE_CODES, type MoonPhaseCode } from '../profile/schema.js';

export const SYNODIC_MONTH = 29.530588853;
/** Julian date of the new moon of 2000-01-06 18:14 UTC. */
const REFERENCE_NEW_MOON_JD = 2451550.26;

export interface LunarState {
  phaseCode: MoonPhaseCode;
  age: number;
  illumination: number;
}

/**
 * Mean lunar phase at noon UTC of the date. Eight equal buckets, centred on
 * the principal phases, so "new" covers the last and first 1.85 days.
 */
export function lunarState(date: CalendarDate): LunarState {
  const jd = julianDayNumber(date);
  const cycles = (jd - REFERENCE_NEW_MOON_JD) / SYNODIC_MONTH;
  const fraction = cycles - Math.floor(cycles);
  const age = fraction * SYNODIC_MONTH;

  const bucket = Math.floor(fraction * 8 + 0.5) % 8;
  const illumination = (1 - Math.cos(2 * Math.PI * fraction)) / 2;

  return {
    phaseCode: MOON_PHASE_CODES[bucket],
    age: Math.round(age * 10) / 10,
    illumination: Math.round(illumination * 100) / 100,
  };
}
