/**
 * @canopy/core - Initializer Configuration
 */

import { ConfigurationError } from '../../domain/exceptions';
import {
  EnvRecord,
  readBoolean,
  readEnum,
  readInteger,
  readNumber,
} from '../../infrastructure/config';
import { InitializerOptions, ValidationFailurePolicy } from './types';

export const DEFAULT_INITIALIZER_OPTIONS: Readonly<InitializerOptions> = Object.freeze({
  enablePhaseLogging: true,
  phaseDelayMs: 100,
  enableErrorRecovery: true,
  maxRecoveryAttempts: 3,
  retryDelayMs: 50,
  backoffMultiplier: 2,
  maxRetryDelayMs: 1000,
  autoDiscoverManagers: true,
  validateDependenciesAfterInit: true,
  attemptServiceRecovery: true,
  validationFailurePolicy: ValidationFailurePolicy.Warn,
  managerInitTimeoutMs: undefined,
});

/**
 * Environment variables read by {@link loadInitializerOptionsFromEnv}
 */
export const INITIALIZER_ENV = {
  enablePhaseLogging: 'CANOPY_PHASE_LOGGING',
  phaseDelayMs: 'CANOPY_PHASE_DELAY_MS',
  enableErrorRecovery: 'CANOPY_ERROR_RECOVERY',
  maxRecoveryAttempts: 'CANOPY_MAX_RECOVERY_ATTEMPTS',
  retryDelayMs: 'CANOPY_RETRY_DELAY_MS',
  backoffMultiplier: 'CANOPY_BACKOFF_MULTIPLIER',
  maxRetryDelayMs: 'CANOPY_MAX_RETRY_DELAY_MS',
  autoDiscoverManagers: 'CANOPY_AUTO_DISCOVER_MANAGERS',
  validateDependenciesAfterInit: 'CANOPY_VALIDATE_DEPENDENCIES',
  attemptServiceRecovery: 'CANOPY_SERVICE_RECOVERY',
  validationFailurePolicy: 'CANOPY_VALIDATION_FAILURE_POLICY',
  managerInitTimeoutMs: 'CANOPY_MANAGER_INIT_TIMEOUT_MS',
} as const satisfies Record<keyof InitializerOptions, string>;

/**
 * Fill defaults and check ranges
 *
 * @throws ConfigurationError for out-of-range values
 */
export function resolveInitializerOptions(
  overrides: Partial<InitializerOptions> = {},
): InitializerOptions {
  const d = DEFAULT_INITIALIZER_OPTIONS;
  const options: InitializerOptions = {
    enablePhaseLogging: overrides.enablePhaseLogging ?? d.enablePhaseLogging,
    phaseDelayMs: overrides.phaseDelayMs ?? d.phaseDelayMs,
    enableErrorRecovery: overrides.enableErrorRecovery ?? d.enableErrorRecovery,
    maxRecoveryAttempts: overrides.maxRecoveryAttempts ?? d.maxRecoveryAttempts,
    retryDelayMs: overrides.retryDelayMs ?? d.retryDelayMs,
    backoffMultiplier: overrides.backoffMultiplier ?? d.backoffMultiplier,
    maxRetryDelayMs: overrides.maxRetryDelayMs ?? d.maxRetryDelayMs,
    autoDiscoverManagers: overrides.autoDiscoverManagers ?? d.autoDiscoverManagers,
    validateDependenciesAfterInit:
      overrides.validateDependenciesAfterInit ?? d.validateDependenciesAfterInit,
    attemptServiceRecovery: overrides.attemptServiceRecovery ?? d.attemptServiceRecovery,
    validationFailurePolicy: overrides.validationFailurePolicy ?? d.validationFailurePolicy,
    managerInitTimeoutMs: overrides.managerInitTimeoutMs ?? d.managerInitTimeoutMs,
  };

  if (!Number.isInteger(options.maxRecoveryAttempts) || options.maxRecoveryAttempts < 1) {
    throw new ConfigurationError('maxRecoveryAttempts', 'must be an integer >= 1');
  }
  for (const key of ['phaseDelayMs', 'retryDelayMs', 'maxRetryDelayMs'] as const) {
    if (options[key] < 0) {
      throw new ConfigurationError(key, 'must be >= 0');
    }
  }
  if (options.backoffMultiplier < 1) {
    throw new ConfigurationError('backoffMultiplier', 'must be >= 1');
  }
  if (options.managerInitTimeoutMs !== undefined && options.managerInitTimeoutMs <= 0) {
    throw new ConfigurationError('managerInitTimeoutMs', 'must be > 0 when set');
  }

  return options;
}

/**
 * Read overrides from `CANOPY_*` environment variables
 *
 * Unset variables leave their key `undefined`, which
 * {@link resolveInitializerOptions} fills with the default.
 *
 * @example
 * ```typescript
 * const options = resolveInitializerOptions({
 *   ...loadInitializerOptionsFromEnv(process.env),
 *   phaseDelayMs: 0,
 * });
 * ```
 */
export function loadInitializerOptionsFromEnv(
  env: EnvRecord = process.env,
): Partial<InitializerOptions> {
  const e = INITIALIZER_ENV;
  return {
    enablePhaseLogging: readBoolean(env, e.enablePhaseLogging),
    phaseDelayMs: readInteger(env, e.phaseDelayMs, { min: 0 }),
    enableErrorRecovery: readBoolean(env, e.enableErrorRecovery),
    maxRecoveryAttempts: readInteger(env, e.maxRecoveryAttempts, { min: 1 }),
    retryDelayMs: readInteger(env, e.retryDelayMs, { min: 0 }),
    backoffMultiplier: readNumber(env, e.backoffMultiplier, { min: 1 }),
    maxRetryDelayMs: readInteger(env, e.maxRetryDelayMs, { min: 0 }),
    autoDiscoverManagers: readBoolean(env, e.autoDiscoverManagers),
    validateDependenciesAfterInit: readBoolean(env, e.validateDependenciesAfterInit),
    attemptServiceRecovery: readBoolean(env, e.attemptServiceRecovery),
    validationFailurePolicy: readEnum(env, e.validationFailurePolicy, [
      ValidationFailurePolicy.Warn,
      ValidationFailurePolicy.Fail,
    ]),
    managerInitTimeoutMs: readInteger(env, e.managerInitTimeoutMs, { min: 1 }),
  };
}
