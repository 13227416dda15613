import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@day-profile/shared/Types/errors';
import { loadConfig } from '../../src/config.js';

const BASE_ENV = { BOT_TOKEN: 'test-token', TIMEZONE: 'UTC' };

describe('loadConfig', () => {
  it('applies defaults around the required token', () => {
    const config = loadConfig(BASE_ENV);
    expect(config).toEqual({
      botToken: 'test-token',
      birthDate: { year: 1972, month: 11, day: 10 },
      reportChatId: undefined,
      reportTime: { hour: 8, minute: 0 },
      timeZone: 'UTC',
      port: 8000,
      secondaryProfiles: [],
      logLevel: 'info',
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.reportTime)).toBe(true);
  });

  it('reads every variable', () => {
    const config = loadConfig({
      ...BASE_ENV,
      BIRTH_DATE: '1990-05-17',
      REPORT_CHAT_ID: '-1001234567890',
      REPORT_TIME: '7:45',
      TIMEZONE: 'Europe/Moscow',
      PORT: '9100',
      SECONDARY_PROFILES: 'Eastern, sumerian',
      LOG_LEVEL: 'DEBUG',
    });
    expect(config.birthDate).toEqual({ year: 1990, month: 5, day: 17 });
    expect(config.reportChatId).toBe('-1001234567890');
    expect(config.reportTime).toEqual({ hour: 7, minute: 45 });
    expect(config.timeZone).toBe('Europe/Moscow');
    expect(config.port).toBe(9100);
    expect(config.secondaryProfiles).toEqual(['eastern', 'sumerian']);
    expect(config.logLevel).toBe('debug');
  });

  it('refuses to start without a bot token', () => {
    expect(() => loadConfig({ TIMEZONE: 'UTC' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ BOT_TOKEN: '  ', TIMEZONE: 'UTC' })).toThrow(/BOT_TOKEN is required/);
  });

  it.each([
    ['REPORT_TIME', '25:00', /REPORT_TIME must be HH:MM/],
    ['REPORT_TIME', 'eight', /REPORT_TIME must be HH:MM/],
    ['TIMEZONE', 'Mars/Olympus', /Unknown TIMEZONE "Mars\/Olympus"/],
    ['PORT', 'http', /PORT must be a number/],
    ['PORT', '70000', /port/],
    ['BIRTH_DATE', '1990-02-30', /BIRTH_DATE must be YYYY-MM-DD/],
    ['SECONDARY_PROFILES', 'lunar', /secondaryProfiles/],
    ['LOG_LEVEL', 'verbose', /logLevel/],
  ])('rejects %s=%s', (name, value, message) => {
    expect(() => loadConfig({ ...BASE_ENV, [name]: value })).toThrow(message);
  });
});
