import type { ProfileAggregator } from '../profile/aggregator.js';
import type { CalendarDate } from '../profile/calendar-date.js';
import type { TodayProvider } from '../profile/date-resolver.js';
import type { DetailLevel } from './document.js';
import { renderDocument } from './document.js';
import { formatCrowd, formatDay, formatMode, formatWeek } from './formatter.js';

/**
 * Aggregate-then-format for every view the bot shows. Commands, callbacks
 * and the scheduler all go through here so each view is rendered one way.
 */
export class ReportService {
  constructor(
    private readonly aggregator: ProfileAggregator,
    readonly today: TodayProvider
  ) {}

  dayReport(date: CalendarDate, detail: DetailLevel): string {
    return renderDocument(formatDay(this.aggregator.aggregate(date), detail));
  }

  weekReport(start: CalendarDate): string {
    return renderDocument(formatWeek(this.aggregator.aggregateWeek(start)));
  }

  crowdReport(date: CalendarDate): string {
    return renderDocument(formatCrowd(this.aggregator.aggregateCrowd(date)));
  }

  modeReport(date: CalendarDate): string {
    return renderDocument(formatMode(this.aggregator.aggregateMode(date)));
  }

  /** The scheduled report: full detail for today. */
  morningReport(): string {
    return this.dayReport(this.today(), 'full');
  }
}
