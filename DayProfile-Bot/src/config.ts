import { z } from 'zod';
import { ConfigurationError } from '@day-profile/shared/Types/errors';
import { getEnvList, getEnvNumber, getEnvString } from '@day-profile/shared/Utils/config';
import { isValidTimeZone, parseIsoDate } from './profile/calendar-date.js';
import { deepFreeze, type DeepReadonly } from './profile/deep-freeze.js';
import { SecondaryProfileKindSchema } from './profile/schema.js';

export const DEFAULT_BIRTH_DATE = '1972-11-10';
export const DEFAULT_REPORT_TIME = '08:00';
export const DEFAULT_PORT = 8000;

const REPORT_TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Configuration schema with Zod validation
 */
export const ConfigSchema = z.object({
  botToken: z.string({ required_error: 'BOT_TOKEN is required' }).min(1),

  birthDate: z.string().transform((value, ctx) => {
    const date = parseIsoDate(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `BIRTH_DATE must be YYYY-MM-DD, got "${value}"` });
      return z.NEVER;
    }
    return date;
  }),

  // Kept raw: a bad chat id fails the report cycle, not startup
  reportChatId: z.string().optional(),

  reportTime: z.string().transform((value, ctx) => {
    const match = REPORT_TIME_PATTERN.exec(value);
    const hour = Number(match?.[1]);
    const minute = Number(match?.[2]);
    if (!match || hour > 23 || minute > 59) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `REPORT_TIME must be HH:MM, got "${value}"` });
      return z.NEVER;
    }
    return { hour, minute };
  }),

  timeZone: z.string().refine(isValidTimeZone, (value) => ({ message: `Unknown TIMEZONE "${value}"` })),

  port: z.number({ invalid_type_error: 'PORT must be a number' }).int().min(0).max(65535),

  secondaryProfiles: z.array(SecondaryProfileKindSchema),

  logLevel: LogLevelSchema,
});

export type Config = DeepReadonly<z.output<typeof ConfigSchema>>;

type Env = Record<string, string | undefined>;

function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Load configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    botToken: getEnvString('BOT_TOKEN', undefined, env),
    birthDate: getEnvString('BIRTH_DATE', DEFAULT_BIRTH_DATE, env),
    reportChatId: getEnvString('REPORT_CHAT_ID', undefined, env),
    reportTime: getEnvString('REPORT_TIME', DEFAULT_REPORT_TIME, env),
    timeZone: getEnvString('TIMEZONE', systemTimeZone(), env),
    port: getEnvNumber('PORT', DEFAULT_PORT, env),
    secondaryProfiles: getEnvList('SECONDARY_PROFILES', env),
    logLevel: getEnvString('LOG_LEVEL', 'info', env).toLowerCase(),
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, { errors });
  }

  return deepFreeze(result.data);
}
