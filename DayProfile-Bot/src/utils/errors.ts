import { BaseError } from '@day-profile/shared/Types/errors';

/**
 * Base error for the day-profile bot
 * Extends shared BaseError for consistent error handling
 */
export class DayProfileError extends BaseError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
    this.name = 'DayProfileError';
  }
}

/**
 * A user-supplied date argument is not a real `YYYY-MM-DD` date.
 * `input` keeps the literal text for the correction prompt.
 */
export class ParseError extends DayProfileError {
  constructor(public readonly input: string) {
    super(`Invalid date "${input}", expected YYYY-MM-DD`, 'PARSE_ERROR', { input });
    this.name = 'ParseError';
  }
}

/**
 * Computing a profile failed. Never shown verbatim to the user.
 */
export class AggregationError extends DayProfileError {
  constructor(
    public readonly date: string,
    cause: unknown
  ) {
    super(`Failed to compute day profile for ${date}`, 'AGGREGATION_ERROR', { date });
    this.name = 'AggregationError';
    this.cause = cause;
  }
}

/**
 * Sending or editing a message failed at the transport boundary.
 */
export class DispatchError extends DayProfileError {
  constructor(
    public readonly operation: 'send' | 'reply' | 'edit' | 'answer',
    cause: unknown
  ) {
    super(`Telegram ${operation} failed`, 'DISPATCH_ERROR', { operation });
    this.name = 'DispatchError';
    this.cause = cause;
  }
}
