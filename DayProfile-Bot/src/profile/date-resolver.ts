import { ParseError } from '../utils/errors.js';
import { parseIsoDate, type CalendarDate } from './calendar-date.js';

/** Supplies the current calendar date in the configured time zone. */
export type TodayProvider = () => CalendarDate;

/**
 * Strict resolution of a command argument. A missing or blank argument means
 * today; anything else must be a real `YYYY-MM-DD` date.
 *
 * @throws ParseError carrying the literal argument
 */
export function resolveDate(argument: string | undefined, today: TodayProvider): CalendarDate {
  const text = argument?.trim() ?? '';
  if (text === '') return today();

  const date = parseIsoDate(text);
  if (!date) {
    throw new ParseError(text);
  }
  return date;
}

/**
 * Lenient resolution of a callback payload: malformed payloads fall back to
 * today instead of failing. Stale or hand-crafted buttons still render.
 */
export function resolveCallbackDate(payload: string, today: TodayProvider): CalendarDate {
  return parseIsoDate(payload) ?? today();
}
