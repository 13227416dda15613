/**
 * Typed readers for environment variables. Empty strings count as unset.
 */

type Env = Record<string, string | undefined>;

function readRaw(name: string, env: Env): string | undefined {
  const value = env[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export function getEnvString(name: string, defaultValue: string, env?: Env): string;
export function getEnvString(name: string, defaultValue?: undefined, env?: Env): string | undefined;
export function getEnvString(
  name: string,
  defaultValue?: string,
  env: Env = process.env
): string | undefined {
  return readRaw(name, env) ?? defaultValue;
}

/**
 * Parse a number; unparseable values are returned as NaN so schema
 * validation can reject them with the variable's name.
 */
export function getEnvNumber(name: string, defaultValue: number, env: Env = process.env): number {
  const raw = readRaw(name, env);
  if (raw === undefined) return defaultValue;
  return Number(raw);
}

/**
 * Comma-separated list, entries trimmed and lowercased, empties dropped.
 */
export function getEnvList(name: string, env: Env = process.env): string[] {
  const raw = readRaw(name, env);
  if (raw === undefined) return [];
  return raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
}
