import { julianDayNumber, type CalendarDate } from '../profile/calendar-date.js';
import type { CalendarPosition } from '../profile/schema.js';

/** GMT correlation: JDN of the Long Count 13.0.0.0.0, a day 4 Ahau 8 Kumku. */
export const GMT_CORRELATION = 584283;

export const TZOLKIN_NAMES = [
  'Imix', 'Ik', 'Akbal', 'Kan', 'Chikchan', 'Kimi', 'Manik', 'Lamat', 'Muluk', 'Ok',
  'Chuwen', 'Eb', 'Ben', 'Ix', 'Men', 'Kib', 'Kaban', 'Etznab', 'Kawak', 'Ahau',
] as const;

export const HAAB_MONTHS = [
  'Pop', 'Wo', 'Sip', 'Sotz', 'Sek', 'Xul', 'Yaxkin', 'Mol', 'Chen', 'Yax',
  'Sak', 'Keh', 'Mak', 'Kankin', 'Muwan', 'Pax', 'Kayab', 'Kumku', 'Wayeb',
] as const;

// Offsets of the correlation day inside each cycle
const TZOLKIN_NUMBER_OFFSET = 3; // number 4
const TZOLKIN_NAME_OFFSET = 19; // Ahau
const HAAB_OFFSET = 17 * 20 + 8; // 8 Kumku

function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

export function calendarPosition(date: CalendarDate): CalendarPosition {
  const days = julianDayNumber(date) - GMT_CORRELATION;
  const haab = mod(days + HAAB_OFFSET, 365);

  return {
    tzolkinNumber: mod(days + TZOLKIN_NUMBER_OFFSET, 13) + 1,
    tzolkinName: TZOLKIN_NAMES[mod(days + TZOLKIN_NAME_OFFSET, 20)],
    haabDay: haab % 20,
    haabMonth: HAAB_MONTHS[Math.floor(haab / 20)],
  };
}
