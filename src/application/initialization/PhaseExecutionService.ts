/**
 * @canopy/core - Phase Execution
 *
 * Drives one phase at a time. Managers within a phase run strictly
 * sequentially; a failing manager is retried with backoff and, once the
 * bound is exhausted, recorded and skipped so the rest of the phase
 * still runs.
 */

import { EventHub } from '../../domain/events';
import {
  InitializationCancelledError,
  ManagerInitializationError,
  describeError,
} from '../../domain/exceptions';
import { ILogger, silentLogger } from '../../infrastructure/logging';
import { delay, retry, throwIfAborted, withTimeout } from '../../infrastructure/resilience';
import {
  InitializationPhase,
  InitializationStatistics,
  InitializerEvents,
  InitializerOptions,
  ManagerDescriptor,
  ManagerInitializationOutcome,
  PhaseResult,
} from './types';

export interface PhaseExecutionOptions {
  options: InitializerOptions;
  events?: EventHub<InitializerEvents>;
  logger?: ILogger;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

export class PhaseExecutionService {
  private readonly options: InitializerOptions;
  private readonly events: EventHub<InitializerEvents>;
  private readonly logger: ILogger;

  private initializedCount = 0;
  private failedCount = 0;
  private attemptCount = 0;
  private phaseDurations: Partial<Record<InitializationPhase, number>> = {};

  constructor({ options, events, logger }: PhaseExecutionOptions) {
    this.options = options;
    this.events = events ?? new EventHub<InitializerEvents>();
    this.logger = logger ?? silentLogger;
  }

  /**
   * Run a phase body between `phaseStarted` and `phaseCompleted`, then
   * wait the inter-phase delay
   *
   * A throwing body emits `phaseError` and the error propagates.
   */
  async executePhase<T>(
    phase: InitializationPhase,
    body: (signal?: AbortSignal) => Promise<T> | T,
    signal?: AbortSignal,
  ): Promise<T> {
    throwIfAborted(signal);
    const started = Date.now();

    if (this.options.enablePhaseLogging) {
      this.logger.info(`Phase ${phase} started`);
    }
    this.events.emit('phaseStarted', { phase });

    let value: T;
    try {
      value = await body(signal);
    } catch (error) {
      const failure = toError(error);
      this.logger.error(`Phase ${phase} failed: ${failure.message}`);
      this.events.emit('phaseError', { phase, error: failure });
      throw error;
    }

    const durationMs = Date.now() - started;
    this.phaseDurations[phase] = durationMs;
    if (this.options.enablePhaseLogging) {
      this.logger.info(`Phase ${phase} completed in ${durationMs}ms`);
    }
    this.events.emit('phaseCompleted', { phase, durationMs });

    if (this.options.phaseDelayMs > 0) {
      await delay(this.options.phaseDelayMs, signal);
    }
    return value;
  }

  /**
   * Initialize one category's managers, in the order given
   */
  async initializeManagersByCategory(
    descriptors: readonly ManagerDescriptor[],
    phase: InitializationPhase,
    signal?: AbortSignal,
  ): Promise<PhaseResult> {
    const started = Date.now();
    const outcomes: ManagerInitializationOutcome[] = [];

    for (const descriptor of descriptors) {
      outcomes.push(await this.initializeManager(descriptor, signal));
    }

    const failed = outcomes.filter((outcome) => !outcome.success).length;
    if (failed > 0) {
      this.logger.warn(`${failed} of ${outcomes.length} manager(s) failed in ${phase}`);
    }

    return { phase, durationMs: Date.now() - started, outcomes };
  }

  /**
   * Initialize one manager with bounded retry
   *
   * Emits exactly one `managerInitialized` event. Only cancellation
   * escapes as an error.
   */
  async initializeManager(
    descriptor: ManagerDescriptor,
    signal?: AbortSignal,
  ): Promise<ManagerInitializationOutcome> {
    const started = Date.now();

    if (descriptor.isInitialized) {
      this.logger.debug(`${descriptor.name} already initialized, skipping`);
      const outcome = { descriptor, success: true, attempts: 0, durationMs: 0 };
      this.recordOutcome(outcome);
      return outcome;
    }

    const maxAttempts = this.options.enableErrorRecovery ? this.options.maxRecoveryAttempts : 1;
    const result = await retry((attempt) => this.attempt(descriptor, attempt, signal), {
      maxAttempts,
      delay: this.options.retryDelayMs,
      backoffMultiplier: this.options.backoffMultiplier,
      maxDelay: this.options.maxRetryDelayMs,
      shouldRetry: (error) => !(error instanceof InitializationCancelledError),
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `${descriptor.name} attempt ${attempt}/${maxAttempts} failed: ${describeError(error)}; retrying in ${delayMs}ms`,
        ),
      signal,
    });

    const outcome: ManagerInitializationOutcome = result.success
      ? { descriptor, success: true, attempts: result.attempts, durationMs: Date.now() - started }
      : {
          descriptor,
          success: false,
          attempts: result.attempts,
          durationMs: Date.now() - started,
          error: new ManagerInitializationError(
            descriptor.name,
            result.attempts,
            result.errors[result.errors.length - 1],
          ),
        };

    if (outcome.success) {
      this.logger.info(`${descriptor.name} initialized (${outcome.attempts} attempt(s))`);
    } else {
      this.logger.error(outcome.error?.message ?? `${descriptor.name} failed`);
    }
    this.recordOutcome(outcome);
    return outcome;
  }

  /**
   * Give an uninitialized manager one more attempt, outside any phase
   */
  async attemptRecovery(descriptor: ManagerDescriptor, signal?: AbortSignal): Promise<boolean> {
    if (descriptor.isInitialized) return true;

    this.logger.info(`Attempting recovery of ${descriptor.name}`);
    try {
      await this.attempt(descriptor, 1, signal);
      this.initializedCount++;
      this.failedCount = Math.max(0, this.failedCount - 1);
      this.events.emit('managerRecoveryAttempted', { managerName: descriptor.name, success: true });
      return true;
    } catch (error) {
      if (error instanceof InitializationCancelledError) throw error;
      const failure = toError(error);
      this.logger.error(`Recovery of ${descriptor.name} failed: ${failure.message}`);
      this.events.emit('managerRecoveryAttempted', {
        managerName: descriptor.name,
        success: false,
        error: failure,
      });
      return false;
    }
  }

  getStatistics(): Omit<InitializationStatistics, 'discoveredManagers' | 'isInitialized'> {
    return {
      initializedManagers: this.initializedCount,
      failedInitializations: this.failedCount,
      totalAttempts: this.attemptCount,
      phaseDurations: { ...this.phaseDurations },
    };
  }

  resetStatistics(): void {
    this.initializedCount = 0;
    this.failedCount = 0;
    this.attemptCount = 0;
    this.phaseDurations = {};
  }

  private async attempt(
    descriptor: ManagerDescriptor,
    attempt: number,
    signal?: AbortSignal,
  ): Promise<void> {
    this.attemptCount++;
    this.logger.debug(`Initializing ${descriptor.name} (attempt ${attempt})`);

    await withTimeout(
      (attemptSignal) => descriptor.manager.initialize(attemptSignal),
      this.options.managerInitTimeoutMs,
      `${descriptor.name} initialization`,
      signal,
    );

    if (!descriptor.manager.isInitialized) {
      throw new ManagerInitializationError(descriptor.name, attempt);
    }
  }

  private recordOutcome(outcome: ManagerInitializationOutcome): void {
    if (outcome.success) this.initializedCount++;
    else this.failedCount++;

    this.events.emit('managerInitialized', {
      managerName: outcome.descriptor.name,
      descriptor: outcome.descriptor,
      success: outcome.success,
      attempts: outcome.attempts,
      error: outcome.error,
    });
  }
}
