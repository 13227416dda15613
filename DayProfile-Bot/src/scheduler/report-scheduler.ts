import { Cron } from 'croner';
import type { Logger } from '@day-profile/shared/Utils/logger';
import type { SupervisedTask } from '../lifecycle.js';
import type { ReportService } from '../report/report-service.js';

/** Where the scheduled report goes; implemented by the Telegram adapter. */
export interface ReportSink {
  sendReport(chatId: number, text: string): Promise<void>;
}

export interface ReportTime {
  hour: number;
  minute: number;
}

export interface ReportSchedulerOptions {
  reportTime: ReportTime;
  timeZone: string;
  /** Raw chat id from configuration; unset disables delivery. */
  destination?: string;
}

export type SchedulerState = 'idle' | 'firing';

export type FireResult = 'sent' | 'skipped' | 'invalid-destination' | 'failed' | 'busy';

const CHAT_ID_PATTERN = /^-?\d+$/;

/** Telegram chat ids are integers; group ids are negative. */
export function parseChatId(value: string): number | null {
  const trimmed = value.trim();
  if (!CHAT_ID_PATTERN.test(trimmed)) return null;
  const id = Number(trimmed);
  return Number.isSafeInteger(id) ? id : null;
}

export function dailyPattern(time: ReportTime): string {
  return `${time.minute} ${time.hour} * * *`;
}

/**
 * Sends the full report for today once a day at the configured local time.
 * A missed fire time is not made up later.
 */
export class ReportScheduler implements SupervisedTask {
  readonly name = 'scheduler';
  private job: Cron | null = null;
  private currentState: SchedulerState = 'idle';

  constructor(
    private readonly reports: ReportService,
    private readonly sink: ReportSink,
    private readonly options: ReportSchedulerOptions,
    private readonly logger: Logger
  ) {}

  get state(): SchedulerState {
    return this.currentState;
  }

  async start(): Promise<void> {
    if (this.job) return;

    // protect: croner skips a tick while the previous callback is still running
    this.job = new Cron(
      dailyPattern(this.options.reportTime),
      { name: 'morning-report', timezone: this.options.timeZone, protect: true },
      async () => {
        await this.fire();
      }
    );

    this.logger.info('Morning report scheduled', {
      pattern: dailyPattern(this.options.reportTime),
      timeZone: this.options.timeZone,
      nextRun: this.nextRun()?.toISOString() ?? null,
    });
  }

  async stop(): Promise<void> {
    this.job?.stop();
    this.job = null;
  }

  nextRun(): Date | null {
    return this.job?.nextRun() ?? null;
  }

  /**
   * One delivery cycle. Every failure is logged and reported through the
   * result; nothing is thrown, so the next day's cycle is unaffected.
   */
  async fire(): Promise<FireResult> {
    if (this.currentState === 'firing') {
      this.logger.warn('Morning report already in flight, skipping');
      return 'busy';
    }

    this.currentState = 'firing';
    try {
      return await this.deliver();
    } finally {
      this.currentState = 'idle';
    }
  }

  private async deliver(): Promise<FireResult> {
    const { destination } = this.options;
    if (destination === undefined) {
      this.logger.info('REPORT_CHAT_ID not set, morning report skipped');
      return 'skipped';
    }

    const chatId = parseChatId(destination);
    if (chatId === null) {
      this.logger.error('REPORT_CHAT_ID is not a numeric chat id', { destination });
      return 'invalid-destination';
    }

    let text: string;
    try {
      text = this.reports.morningReport();
    } catch (error) {
      this.logger.error('Morning report could not be computed', { error });
      return 'failed';
    }

    try {
      await this.sink.sendReport(chatId, text);
    } catch (error) {
      this.logger.error('Morning report delivery failed', { chatId, error });
      return 'failed';
    }

    this.logger.info('Morning report sent', { chatId });
    return 'sent';
  }
}
