import type { Logger } from '@day-profile/shared/Utils/logger';
import type { CalendarDate } from '../profile/calendar-date.js';
import { resolveDate } from '../profile/date-resolver.js';
import { renderDocument } from '../report/document.js';
import { formatHelp, type CommandHelp } from '../report/formatter.js';
import { AGGREGATION_FAILED, dateCorrection } from '../report/messages.js';
import type { ReportService } from '../report/report-service.js';
import { AggregationError, ParseError } from '../utils/errors.js';
import { briefDayButtons, menuButtons, textView, type BotView } from './view.js';

export type CommandName = 'start' | 'help' | 'day' | 'week' | 'menu' | 'morning_test';

export interface CommandDefinition extends CommandHelp {
  command: CommandName;
}

export const COMMANDS: readonly CommandDefinition[] = [
  { command: 'start', description: 'приветствие и список команд' },
  { command: 'help', description: 'список команд' },
  { command: 'day', description: 'энергетика дня, /day YYYY-MM-DD для другой даты' },
  { command: 'week', description: 'обзор недели, /week YYYY-MM-DD для другой даты' },
  { command: 'menu', description: 'кнопки быстрого доступа' },
  { command: 'morning_test', description: 'утренний отчёт прямо сейчас' },
];

/**
 * Command handlers independent of the transport. Each returns the view to
 * reply with; date and aggregation failures are turned into user-facing
 * texts here, anything else propagates to the adapter.
 */
export class CommandHandlers {
  constructor(
    private readonly reports: ReportService,
    private readonly logger: Logger
  ) {}

  handle(command: CommandName, argument?: string): BotView {
    switch (command) {
      case 'start':
      case 'help':
        return this.help();
      case 'day':
        return this.day(argument);
      case 'week':
        return this.week(argument);
      case 'menu':
        return this.menu();
      case 'morning_test':
        return this.morningTest();
    }
  }

  help(): BotView {
    return textView(renderDocument(formatHelp(COMMANDS)));
  }

  day(argument?: string): BotView {
    return this.withDate(argument, (date) => ({
      text: this.reports.dayReport(date, 'brief'),
      buttons: briefDayButtons(date),
    }));
  }

  week(argument?: string): BotView {
    return this.withDate(argument, (date) => textView(this.reports.weekReport(date)));
  }

  menu(): BotView {
    return { text: 'Выбери отчёт:', buttons: menuButtons(this.reports.today()) };
  }

  morningTest(): BotView {
    return this.guardAggregation('morning_test', () => textView(this.reports.morningReport()));
  }

  private withDate(argument: string | undefined, render: (date: CalendarDate) => BotView): BotView {
    let date: CalendarDate;
    try {
      date = resolveDate(argument, this.reports.today);
    } catch (error) {
      if (error instanceof ParseError) {
        this.logger.debug('Rejected date argument', { input: error.input });
        return textView(dateCorrection(error.input));
      }
      throw error;
    }
    return this.guardAggregation(argument ?? 'today', () => render(date));
  }

  private guardAggregation(label: string, render: () => BotView): BotView {
    try {
      return render();
    } catch (error) {
      if (error instanceof AggregationError) {
        this.logger.error('Aggregation failed', { request: label, error });
        return textView(AGGREGATION_FAILED);
      }
      throw error;
    }
  }
}
