import { escapeMarkdown } from './document.js';

/** Fixed user-facing texts shared by commands, callbacks and the scheduler. */

export const DATE_FORMAT_HINT = 'Дата должна быть в формате YYYY-MM-DD, пример:\n/day 2025-11-30';

export const AGGREGATION_FAILED = 'Не удалось посчитать энергетику дня. Попробуй позже.';

export function dateCorrection(input: string): string {
  return `Не понимаю дату «${escapeMarkdown(input)}».\n${DATE_FORMAT_HINT}`;
}
