import { describe, it, expect, vi } from 'vitest';
import { resolveCallbackDate, resolveDate } from '../../src/profile/date-resolver.js';
import { ParseError } from '../../src/utils/errors.js';
import { TODAY } from '../helpers/stub-engine.js';

describe('resolveDate', () => {
  it('returns today when no argument is given', () => {
    const today = vi.fn(() => TODAY);
    expect(resolveDate(undefined, today)).toEqual(TODAY);
    expect(resolveDate('   ', today)).toEqual(TODAY);
    expect(today).toHaveBeenCalledTimes(2);
  });

  it('parses an explicit date without consulting the clock', () => {
    const today = vi.fn(() => TODAY);
    expect(resolveDate(' 2025-01-15 ', today)).toEqual({ year: 2025, month: 1, day: 15 });
    expect(today).not.toHaveBeenCalled();
  });

  it('throws ParseError carrying the offending text', () => {
    const attempt = () => resolveDate('2025-02-30', () => TODAY);
    expect(attempt).toThrow(ParseError);
    try {
      attempt();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.input).toBe('2025-02-30');
        expect(error.code).toBe('PARSE_ERROR');
      }
    }
  });
});

describe('resolveCallbackDate', () => {
  it('parses a valid payload', () => {
    expect(resolveCallbackDate('2025-01-15', () => TODAY)).toEqual({ year: 2025, month: 1, day: 15 });
  });

  it('falls back to today where the command path would fail', () => {
    for (const payload of ['not-a-date', '2025-02-30']) {
      expect(resolveCallbackDate(payload, () => TODAY)).toEqual(TODAY);
      expect(() => resolveDate(payload, () => TODAY)).toThrow(ParseError);
    }
    expect(resolveCallbackDate('', () => TODAY)).toEqual(TODAY);
  });
});
