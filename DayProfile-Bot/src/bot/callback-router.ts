import type { Logger } from '@day-profile/shared/Utils/logger';
import { resolveCallbackDate } from '../profile/date-resolver.js';
import { AGGREGATION_FAILED } from '../report/messages.js';
import type { ReportService } from '../report/report-service.js';
import { AggregationError } from '../utils/errors.js';
import { decodeCallback } from './callback-token.js';
import { backToDayButtons, dayViewButtons, type BotView } from './view.js';

export type CallbackOutcome =
  | { kind: 'render'; view: BotView }
  | { kind: 'ignored'; raw: string }
  | { kind: 'failed'; view: BotView };

/**
 * Stateless navigation between the day, week, crowd and mode views. Each
 * button press is decoded and rendered from scratch; nothing is remembered
 * between presses.
 */
export class CallbackRouter {
  constructor(
    private readonly reports: ReportService,
    private readonly logger: Logger
  ) {}

  route(data: string): CallbackOutcome {
    const token = decodeCallback(data);
    if (token.action === 'unknown') {
      this.logger.debug('Ignoring unknown callback', { data });
      return { kind: 'ignored', raw: token.raw };
    }

    const date = resolveCallbackDate(token.date, this.reports.today);
    try {
      switch (token.action) {
        case 'day':
          return render(this.reports.dayReport(date, 'full'), dayViewButtons(date));
        case 'week':
          return render(this.reports.weekReport(date), []);
        case 'crowd':
          return render(this.reports.crowdReport(date), backToDayButtons(date));
        case 'mode':
          return render(this.reports.modeReport(date), backToDayButtons(date));
      }
    } catch (error) {
      if (!(error instanceof AggregationError)) {
        throw error;
      }
      this.logger.error('Callback aggregation failed', { data, error });
      return { kind: 'failed', view: { text: AGGREGATION_FAILED, buttons: [] } };
    }
  }
}

function render(text: string, buttons: BotView['buttons']): CallbackOutcome {
  return { kind: 'render', view: { text, buttons } };
}
