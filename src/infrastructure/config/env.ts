/**
 * @canopy/core - Environment Configuration
 *
 * Typed readers for `process.env`-style records. Unset or empty variables
 * yield `undefined`; malformed values raise ConfigurationError.
 */

import { ConfigurationError } from '../../domain/exceptions';

export type EnvRecord = Readonly<Record<string, string | undefined>>;

function raw(env: EnvRecord, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

export function readBoolean(env: EnvRecord, key: string): boolean | undefined {
  const value = raw(env, key);
  if (value === undefined) return undefined;

  switch (value.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new ConfigurationError(key, `expected a boolean, got '${value}'`);
  }
}

export function readInteger(
  env: EnvRecord,
  key: string,
  options: { min?: number; max?: number } = {},
): number | undefined {
  const value = raw(env, key);
  if (value === undefined) return undefined;

  if (!/^-?\d+$/.test(value)) {
    throw new ConfigurationError(key, `expected an integer, got '${value}'`);
  }

  const parsed = Number.parseInt(value, 10);
  if (options.min !== undefined && parsed < options.min) {
    throw new ConfigurationError(key, `must be >= ${options.min}`);
  }
  if (options.max !== undefined && parsed > options.max) {
    throw new ConfigurationError(key, `must be <= ${options.max}`);
  }
  return parsed;
}

export function readNumber(
  env: EnvRecord,
  key: string,
  options: { min?: number } = {},
): number | undefined {
  const value = raw(env, key);
  if (value === undefined) return undefined;

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(key, `expected a number, got '${value}'`);
  }
  if (options.min !== undefined && parsed < options.min) {
    throw new ConfigurationError(key, `must be >= ${options.min}`);
  }
  return parsed;
}

export function readEnum<T extends string>(
  env: EnvRecord,
  key: string,
  allowed: readonly T[],
): T | undefined {
  const value = raw(env, key);
  if (value === undefined) return undefined;

  const match = allowed.find((candidate) => candidate.toLowerCase() === value.toLowerCase());
  if (match === undefined) {
    throw new ConfigurationError(
      key,
      `expected one of ${allowed.join(', ')}, got '${value}'`,
    );
  }
  return match;
}
