/**
 * Read numeric and enum settings from the environment, falling back to a default
 * when the variable is unset or blank. Malformed values are reported rather than
 * silently replaced.
 */

import { ConfigurationError } from './errors';

function readRaw(name: string): string | undefined {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') return undefined;
  return value.trim();
}

export function envString(name: string, fallback: string): string {
  return readRaw(name) ?? fallback;
}

export function envNumber(name: string, fallback: number): number {
  const raw = readRaw(name);
  if (raw === undefined) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} must be a number (got "${raw}")`);
  }
  return parsed;
}

export function envBoolean(name: string, fallback: boolean): boolean {
  const raw = readRaw(name);
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

export function envChoice<T extends string>(
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = readRaw(name);
  if (raw === undefined) return fallback;

  const match = choices.find(choice => choice === raw);
  if (!match) {
    throw new ConfigurationError(
      `Environment variable ${name} must be one of ${choices.join(', ')} (got "${raw}")`
    );
  }
  return match;
}
