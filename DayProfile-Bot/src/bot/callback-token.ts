import { toIsoDate, type CalendarDate } from '../profile/calendar-date.js';

export const NAVIGATION_ACTIONS = ['day', 'week', 'crowd', 'mode'] as const;
export type NavigationAction = (typeof NAVIGATION_ACTIONS)[number];

/**
 * Decoded callback payload. `date` is kept as the raw text after the
 * separator; resolving it to a calendar date is the router's job.
 */
export type CallbackToken =
  | { action: NavigationAction; date: string }
  | { action: 'unknown'; raw: string };

const SEPARATOR = ':';

function isNavigationAction(value: string): value is NavigationAction {
  return NAVIGATION_ACTIONS.some((action) => action === value);
}

/** Wire form `"{action}:{YYYY-MM-DD}"`, well under Telegram's 64-byte limit. */
export function encodeCallback(action: NavigationAction, date: CalendarDate): string {
  return `${action}${SEPARATOR}${toIsoDate(date)}`;
}

export function decodeCallback(raw: string): CallbackToken {
  const index = raw.indexOf(SEPARATOR);
  if (index === -1) {
    return { action: 'unknown', raw };
  }

  const action = raw.slice(0, index);
  if (!isNavigationAction(action)) {
    return { action: 'unknown', raw };
  }
  return { action, date: raw.slice(index + 1) };
}
