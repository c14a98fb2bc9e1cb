/**
 * @fileoverview Unit tests for environment readers and initializer options
 */

import {
  ConfigurationError,
  DEFAULT_INITIALIZER_OPTIONS,
  ValidationFailurePolicy,
  loadInitializerOptionsFromEnv,
  readBoolean,
  readEnum,
  readInteger,
  readNumber,
  resolveInitializerOptions,
} from '../../../src';

describe('Environment readers', () => {
  it('should read boolean spellings', () => {
    const env = { A: 'yes', B: 'OFF', C: ' 1 ', D: '' };

    expect(readBoolean(env, 'A')).toBe(true);
    expect(readBoolean(env, 'B')).toBe(false);
    expect(readBoolean(env, 'C')).toBe(true);
    expect(readBoolean(env, 'D')).toBeUndefined();
    expect(readBoolean(env, 'MISSING')).toBeUndefined();
  });

  it('should reject an unknown boolean', () => {
    expect(() => readBoolean({ FLAG: 'maybe' }, 'FLAG')).toThrow(
      "Invalid configuration for FLAG: expected a boolean, got 'maybe'",
    );
  });

  it('should read bounded integers', () => {
    expect(readInteger({ N: '12' }, 'N', { min: 0, max: 20 })).toBe(12);
    expect(() => readInteger({ N: '1.5' }, 'N')).toThrowErrorType(ConfigurationError);
    expect(() => readInteger({ N: '30' }, 'N', { max: 20 })).toThrow(
      'Invalid configuration for N: must be <= 20',
    );
  });

  it('should read numbers with a minimum', () => {
    expect(readNumber({ X: '1.5' }, 'X', { min: 1 })).toBe(1.5);
    expect(() => readNumber({ X: '0.5' }, 'X', { min: 1 })).toThrow('must be >= 1');
  });

  it('should match enums case-insensitively', () => {
    expect(readEnum({ P: 'FAIL' }, 'P', ['warn', 'fail'])).toBe('fail');
    expect(() => readEnum({ P: 'loud' }, 'P', ['warn', 'fail'])).toThrow(
      "expected one of warn, fail, got 'loud'",
    );
  });
});

describe('Initializer options', () => {
  it('should fill every default', () => {
    expect(resolveInitializerOptions()).toEqual({ ...DEFAULT_INITIALIZER_OPTIONS });
    expect(DEFAULT_INITIALIZER_OPTIONS.phaseDelayMs).toBe(100);
    expect(DEFAULT_INITIALIZER_OPTIONS.maxRecoveryAttempts).toBe(3);
    expect(DEFAULT_INITIALIZER_OPTIONS.validationFailurePolicy).toBe(ValidationFailurePolicy.Warn);
  });

  it('should keep explicit overrides', () => {
    const options = resolveInitializerOptions({ phaseDelayMs: 0, enableErrorRecovery: false });

    expect(options.phaseDelayMs).toBe(0);
    expect(options.enableErrorRecovery).toBe(false);
    expect(options.retryDelayMs).toBe(50);
  });

  it('should reject out-of-range values', () => {
    expect(() => resolveInitializerOptions({ maxRecoveryAttempts: 0 })).toThrow(
      'Invalid configuration for maxRecoveryAttempts: must be an integer >= 1',
    );
    expect(() => resolveInitializerOptions({ retryDelayMs: -1 })).toThrowErrorType(
      ConfigurationError,
    );
    expect(() => resolveInitializerOptions({ managerInitTimeoutMs: 0 })).toThrow(
      'must be > 0 when set',
    );
  });

  it('should read overrides from CANOPY_ variables', () => {
    const loaded = loadInitializerOptionsFromEnv({
      CANOPY_PHASE_DELAY_MS: '0',
      CANOPY_MAX_RECOVERY_ATTEMPTS: '5',
      CANOPY_VALIDATION_FAILURE_POLICY: 'fail',
      CANOPY_ERROR_RECOVERY: 'false',
    });

    const options = resolveInitializerOptions(loaded);

    expect(options.phaseDelayMs).toBe(0);
    expect(options.maxRecoveryAttempts).toBe(5);
    expect(options.validationFailurePolicy).toBe(ValidationFailurePolicy.Fail);
    expect(options.enableErrorRecovery).toBe(false);
    expect(options.backoffMultiplier).toBe(2);
  });

  it('should leave unset variables undefined', () => {
    expect(loadInitializerOptionsFromEnv({}).phaseDelayMs).toBeUndefined();
  });
});
