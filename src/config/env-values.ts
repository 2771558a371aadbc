/**
 * Environment value helpers
 */

export type EnvRecord = Record<string, string | undefined>;

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

/**
 * Read a string variable, empty when unset
 */
export function getEnvString(env: EnvRecord, key: string): string {
  return env[key] ?? '';
}

/**
 * Parse a boolean variable. Unset or unrecognised values give the fallback.
 */
export function getEnvBool(env: EnvRecord, key: string, fallback: boolean = false): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return fallback;
  }
  if (TRUE_VALUES.has(value)) {
    return true;
  }
  if (FALSE_VALUES.has(value)) {
    return false;
  }
  return fallback;
}

/**
 * Parse an integer variable. Unset or non-integer values give the fallback.
 */
export function getEnvInt(env: EnvRecord, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : fallback;
}
