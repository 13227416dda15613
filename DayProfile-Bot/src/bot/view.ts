import type { CalendarDate } from '../profile/calendar-date.js';
import { encodeCallback, type NavigationAction } from './callback-token.js';

export interface NavigationButton {
  text: string;
  data: string;
}

export type NavigationRow = readonly NavigationButton[];

/** Transport-agnostic reply: Markdown text plus inline button rows. */
export interface BotView {
  text: string;
  buttons: readonly NavigationRow[];
}

const LABELS: Record<NavigationAction, string> = {
  day: '📅 День',
  week: '🗓 Неделя',
  crowd: '👥 Толпа',
  mode: '🤖 Режим бота',
};

export function navButton(action: NavigationAction, date: CalendarDate, text = LABELS[action]): NavigationButton {
  return { text, data: encodeCallback(action, date) };
}

export function textView(text: string): BotView {
  return { text, buttons: [] };
}

/** Buttons under the full day view. */
export function dayViewButtons(date: CalendarDate): NavigationRow[] {
  return [[navButton('crowd', date), navButton('mode', date)], [navButton('week', date)]];
}

/** Buttons under the brief /day reply: the day views plus a link to the full report. */
export function briefDayButtons(date: CalendarDate): NavigationRow[] {
  return [
    [navButton('crowd', date), navButton('mode', date)],
    [navButton('week', date), navButton('day', date, '📖 Полный отчёт')],
  ];
}

export function backToDayButtons(date: CalendarDate): NavigationRow[] {
  return [[navButton('day', date, '⬅️ Назад к дню')]];
}

export function menuButtons(today: CalendarDate): NavigationRow[] {
  return [[navButton('day', today, '📅 День (сегодня)'), navButton('week', today, '🗓 Неделя (сегодня)')]];
}
