/**
 * @canopy/core - Resilience Module
 */

export {
  retry,
  withTimeout,
  delay,
  throwIfAborted,
  computeBackoffDelay,
} from './retry';

export type { RetryPolicyOptions, RetryOutcome } from './retry';
