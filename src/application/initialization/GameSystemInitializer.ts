/**
 * @canopy/core - Game System Initializer
 *
 * Orchestrates one bring-up: discovery, the four category phases and
 * validation, tracked by an explicit state machine.
 */

import { EventHub, IEventSource } from '../../domain/events';
import {
  InitializationInProgressError,
  InvalidStateTransitionError,
  NoManagersDiscoveredError,
  SystemValidationError,
  describeError,
} from '../../domain/exceptions';
import { IManager, ManagerCategory, ManagerType } from '../../domain/managers';
import type { ISessionScanner } from '../../domain/session';
import { ILogger, LogCategory, consoleLogger, withCategory } from '../../infrastructure/logging';
import { throwIfAborted } from '../../infrastructure/resilience';
import type { IServiceContainer } from '../di/IDependencyInjection';
import { ManagerDiscoveryService } from './ManagerDiscoveryService';
import { resolveInitializerOptions } from './options';
import { PhaseExecutionService } from './PhaseExecutionService';
import { SystemValidationService } from './SystemValidationService';
import {
  InitializationPhase,
  InitializationResult,
  InitializationStatistics,
  InitializerEvents,
  InitializerOptions,
  InitializerState,
  ManagerDescriptor,
  ValidationFailurePolicy,
  ValidationSummary,
} from './types';

const ALLOWED_TRANSITIONS: Readonly<Record<InitializerState, readonly InitializerState[]>> = {
  [InitializerState.NotStarted]: [InitializerState.Discovering],
  [InitializerState.Discovering]: [InitializerState.InitializingCore, InitializerState.Error],
  [InitializerState.InitializingCore]: [InitializerState.InitializingDomain, InitializerState.Error],
  [InitializerState.InitializingDomain]: [
    InitializerState.InitializingProgression,
    InitializerState.Error,
  ],
  [InitializerState.InitializingProgression]: [
    InitializerState.InitializingUI,
    InitializerState.Error,
  ],
  [InitializerState.InitializingUI]: [InitializerState.Validating, InitializerState.Error],
  [InitializerState.Validating]: [InitializerState.Running, InitializerState.Error],
  [InitializerState.Running]: [InitializerState.Discovering],
  [InitializerState.Error]: [InitializerState.Discovering],
};

interface CategoryStage {
  category: ManagerCategory;
  phase: InitializationPhase;
  state: InitializerState;
}

/**
 * Category phases in bring-up order
 */
export const CATEGORY_STAGES: readonly CategoryStage[] = [
  {
    category: ManagerCategory.Core,
    phase: InitializationPhase.CoreSystems,
    state: InitializerState.InitializingCore,
  },
  {
    category: ManagerCategory.Domain,
    phase: InitializationPhase.DomainSystems,
    state: InitializerState.InitializingDomain,
  },
  {
    category: ManagerCategory.Progression,
    phase: InitializationPhase.ProgressionSystems,
    state: InitializerState.InitializingProgression,
  },
  {
    category: ManagerCategory.UI,
    phase: InitializationPhase.UISystems,
    state: InitializerState.InitializingUI,
  },
];

export interface GameSystemInitializerOptions {
  container: IServiceContainer;

  /** Scanned for managers when `autoDiscoverManagers` is set */
  session?: ISessionScanner;

  /** Managers registered explicitly, always discovered */
  managers?: IManager[];

  options?: Partial<InitializerOptions>;

  logger?: ILogger;
}

export interface InitializeOptions {
  signal?: AbortSignal;
}

/**
 * GameSystemInitializer - phased manager bring-up
 *
 * @example
 * ```typescript
 * const initializer = new GameSystemInitializer({ container, session });
 * initializer.events.on('managerInitialized', ({ managerName, success }) => {
 *   hud.progress(managerName, success);
 * });
 *
 * const result = await initializer.initializeAllGameSystems();
 * if (!result.success) {
 *   showFatal(result.errorMessage);
 * }
 * ```
 */
export class GameSystemInitializer {
  private readonly hub: EventHub<InitializerEvents>;
  private readonly logger: ILogger;
  private readonly container: IServiceContainer;
  private readonly options: InitializerOptions;
  private readonly discovery: ManagerDiscoveryService;
  private readonly execution: PhaseExecutionService;
  private readonly validation: SystemValidationService;

  private currentState = InitializerState.NotStarted;
  private running = false;
  private lastValidation?: ValidationSummary;

  constructor(init: GameSystemInitializerOptions) {
    this.container = init.container;
    this.options = resolveInitializerOptions(init.options);

    const baseLogger = init.logger ?? consoleLogger;
    this.logger = withCategory(baseLogger, LogCategory.Init, 'GameSystemInitializer');
    this.hub = new EventHub<InitializerEvents>((eventName, error) =>
      this.logger.error(`Listener for ${eventName} failed: ${describeError(error)}`),
    );

    this.discovery = new ManagerDiscoveryService({
      autoDiscover: this.options.autoDiscoverManagers,
      session: init.session,
      events: this.hub,
      logger: withCategory(baseLogger, LogCategory.Init, 'ManagerDiscoveryService'),
    });
    this.execution = new PhaseExecutionService({
      options: this.options,
      events: this.hub,
      logger: withCategory(baseLogger, LogCategory.Init, 'PhaseExecutionService'),
    });
    this.validation = new SystemValidationService({
      events: this.hub,
      logger: withCategory(baseLogger, LogCategory.Validation, 'SystemValidationService'),
    });

    for (const manager of init.managers ?? []) {
      this.discovery.register(manager);
    }
  }

  get events(): IEventSource<InitializerEvents> {
    return this.hub;
  }

  get state(): InitializerState {
    return this.currentState;
  }

  get isInitializing(): boolean {
    return this.running;
  }

  get isInitialized(): boolean {
    return this.currentState === InitializerState.Running;
  }

  get initializerOptions(): Readonly<InitializerOptions> {
    return this.options;
  }

  /**
   * Add a manager for the next bring-up
   */
  registerManager(manager: IManager): this {
    this.discovery.register(manager);
    return this;
  }

  /**
   * Run discovery, every category phase and validation
   *
   * Resolves with a result in every case except a concurrent call, which
   * rejects with InitializationInProgressError.
   */
  async initializeAllGameSystems(options: InitializeOptions = {}): Promise<InitializationResult> {
    if (this.running) {
      throw new InitializationInProgressError();
    }
    this.running = true;

    const { signal } = options;
    const started = Date.now();
    this.execution.resetStatistics();
    this.lastValidation = undefined;

    let result: InitializationResult | undefined;
    try {
      this.transition(InitializerState.Discovering);
      this.logger.info('Starting game system initialization');

      const descriptors = await this.execution.executePhase(
        InitializationPhase.Discovery,
        () => {
          const discovered = this.discovery.discoverAllManagers();
          if (!discovered.success || discovered.descriptors.length === 0) {
            throw new NoManagersDiscoveredError();
          }
          return discovered.descriptors;
        },
        signal,
      );

      for (const stage of CATEGORY_STAGES) {
        this.transition(stage.state);
        const managers = descriptors.filter((descriptor) => descriptor.category === stage.category);
        await this.execution.executePhase(
          stage.phase,
          (phaseSignal) =>
            this.execution.initializeManagersByCategory(managers, stage.phase, phaseSignal),
          signal,
        );
      }

      this.transition(InitializerState.Validating);
      const summary = await this.execution.executePhase(
        InitializationPhase.Validation,
        (phaseSignal) => this.validate(descriptors, phaseSignal),
        signal,
      );

      if (!summary.overallValid) {
        if (this.options.validationFailurePolicy === ValidationFailurePolicy.Fail) {
          throw new SystemValidationError(summary.allErrors);
        }
        this.logger.warn('Validation reported problems; continuing to Running');
      }

      this.transition(InitializerState.Running);
      result = this.buildResult(descriptors, started, true);
      this.logger.info(
        `Initialization completed: ${result.initializedManagerCount}/${result.discoveredManagerCount} manager(s) in ${result.durationMs}ms`,
      );
      return result;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(describeError(error));
      this.logger.error(`Initialization failed: ${failure.message}`);
      if (this.currentState !== InitializerState.Error) {
        this.transition(InitializerState.Error);
      }
      result = {
        ...this.buildResult(this.discovery.getDiscoveredManagers(), started, false),
        errorMessage: failure.message,
        error: failure,
      };
      return result;
    } finally {
      this.running = false;
      if (result) {
        this.hub.emit('initializationCompleted', { result });
      }
    }
  }

  /**
   * True once Running and every discovered manager reports initialized
   */
  isSystemReady(): boolean {
    return (
      this.isInitialized &&
      this.discovery.getDiscoveredManagers().every((descriptor) => descriptor.isInitialized)
    );
  }

  getManager<T extends IManager>(type: ManagerType<T>): T | undefined {
    return this.discovery.getManager(type);
  }

  getDiscoveredManagers(): readonly ManagerDescriptor[] {
    return this.discovery.getDiscoveredManagers();
  }

  getInitializationStatistics(): InitializationStatistics {
    return {
      discoveredManagers: this.discovery.discoveredCount,
      isInitialized: this.isInitialized,
      ...this.execution.getStatistics(),
    };
  }

  getLastValidationSummary(): ValidationSummary | undefined {
    return this.lastValidation;
  }

  /**
   * Shut managers down in reverse bring-up order
   *
   * Failures are logged and do not stop the remaining shutdowns.
   */
  async shutdownAllManagers(): Promise<void> {
    const order = this.discovery.getDiscoveredManagers();
    const byPhase = CATEGORY_STAGES.flatMap((stage) =>
      order.filter((descriptor) => descriptor.category === stage.category),
    );

    for (const descriptor of [...byPhase].reverse()) {
      if (!descriptor.isInitialized) continue;
      try {
        await descriptor.manager.shutdown();
        this.logger.debug(`${descriptor.name} shut down`);
      } catch (error) {
        this.logger.error(`Shutdown of ${descriptor.name} failed: ${describeError(error)}`);
      }
    }
  }

  private async validate(
    descriptors: readonly ManagerDescriptor[],
    signal?: AbortSignal,
  ): Promise<ValidationSummary> {
    if (this.options.attemptServiceRecovery) {
      for (const descriptor of descriptors) {
        if (!descriptor.isInitialized) {
          await this.execution.attemptRecovery(descriptor, signal);
        }
      }
    }
    throwIfAborted(signal);

    const summary = this.validation.validateSystem(descriptors, this.container, {
      validateDependencies: this.options.validateDependenciesAfterInit,
    });
    this.lastValidation = summary;
    return summary;
  }

  private buildResult(
    descriptors: readonly ManagerDescriptor[],
    started: number,
    success: boolean,
  ): InitializationResult {
    return {
      success,
      initializedManagerCount: descriptors.filter((descriptor) => descriptor.isInitialized).length,
      discoveredManagerCount: descriptors.length,
      failedManagers: descriptors
        .filter((descriptor) => !descriptor.isInitialized)
        .map((descriptor) => descriptor.name),
      durationMs: Date.now() - started,
      finalState: this.currentState,
      validation: this.lastValidation,
    };
  }

  private transition(to: InitializerState): void {
    const from = this.currentState;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new InvalidStateTransitionError(from, to);
    }
    this.currentState = to;
    this.logger.debug(`State ${from} -> ${to}`);
    this.hub.emit('stateChanged', { from, to });
  }
}
