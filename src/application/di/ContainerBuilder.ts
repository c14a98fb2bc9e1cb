/**
 * @canopy/core - Container Builder
 *
 * Fluent accumulator of registration actions and modules, applied to a
 * target container in one `build()` call.
 */

import {
  ContainerValidationError,
  InitializationCancelledError,
  ModuleConfigurationError,
  describeError,
} from '../../domain/exceptions';
import { ILogger, LogCategory, silentLogger, withCategory } from '../../infrastructure/logging';
import { throwIfAborted, withTimeout } from '../../infrastructure/resilience';
import {
  BindingInput,
  DefaultConstructor,
  DuplicateRegistrationPolicy,
  IServiceContainer,
  RegistrationCondition,
  ServiceDecorator,
  ServiceFactory,
  ServiceIdentifier,
  ServiceLifetime,
} from './IDependencyInjection';
import type { IServiceModule } from './IServiceModule';
import { ServiceContainer } from './ServiceContainer';

/**
 * Builder options
 */
export interface ContainerBuilderOptions {
  /** Policy of the container created by `build()` when none is supplied */
  duplicatePolicy?: DuplicateRegistrationPolicy;

  /** Applies to modules that do not declare `initializationTimeoutMs` */
  defaultModuleTimeoutMs?: number;

  logger?: ILogger;
}

/**
 * One deferred registration step
 */
export type ContainerAction = (container: IServiceContainer) => void;

export interface BuildOptions {
  /** Container to apply the actions to; a new one is created otherwise */
  container?: IServiceContainer;

  signal?: AbortSignal;
}

/**
 * ContainerBuilder - fluent container configuration
 *
 * @example
 * ```typescript
 * const container = await ContainerBuilder.create()
 *   .addSingleton(TimeServiceToken, SystemTimeService)
 *   .addFactory(SaveGameToken, (r) => new SaveGame(r.resolve(PersistenceToken)))
 *   .addModule(new CoreServicesModule())
 *   .configureIf(process.env.NODE_ENV !== 'production', (c) =>
 *     c.registerDecorator(SaveGameToken, (inner) => new TracingSaveGame(inner)),
 *   )
 *   .validate([TimeServiceToken, SaveGameToken])
 *   .build();
 * ```
 */
export class ContainerBuilder {
  private readonly actions: ContainerAction[] = [];
  private readonly modules: IServiceModule[] = [];
  private readonly verifications: ContainerAction[] = [];
  private readonly logger: ILogger;

  private constructor(private readonly options: ContainerBuilderOptions = {}) {
    this.logger = withCategory(options.logger ?? silentLogger, LogCategory.Builder);
  }

  /**
   * Create a new builder
   */
  static create(options?: ContainerBuilderOptions): ContainerBuilder {
    return new ContainerBuilder(options);
  }

  get actionCount(): number {
    return this.actions.length;
  }

  get moduleCount(): number {
    return this.modules.length;
  }

  // ==================== Registrations ====================

  addSingleton<T>(identifier: ServiceIdentifier<T>, source: BindingInput<T>): this {
    return this.configure((c) => c.registerSingleton(identifier, source));
  }

  addInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this {
    return this.configure((c) => c.registerInstance(identifier, instance));
  }

  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: DefaultConstructor<T>): this {
    return this.configure((c) => c.registerTransient(identifier, implementation));
  }

  addScoped<T>(identifier: ServiceIdentifier<T>, source: BindingInput<T>): this {
    return this.configure((c) => c.registerScoped(identifier, source));
  }

  addFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    lifetime?: ServiceLifetime,
  ): this {
    return this.configure((c) => c.registerFactory(identifier, factory, lifetime));
  }

  addNamed<T>(
    identifier: ServiceIdentifier<T>,
    name: string,
    source: BindingInput<T>,
    lifetime?: ServiceLifetime,
  ): this {
    return this.configure((c) => c.registerNamed(identifier, name, source, lifetime));
  }

  addConditional<T>(
    identifier: ServiceIdentifier<T>,
    condition: RegistrationCondition,
    source: BindingInput<T>,
    lifetime?: ServiceLifetime,
  ): this {
    return this.configure((c) => c.registerConditional(identifier, condition, source, lifetime));
  }

  addDecorator<T>(identifier: ServiceIdentifier<T>, decorator: ServiceDecorator<T>): this {
    return this.configure((c) => c.registerDecorator(identifier, decorator));
  }

  addCollection<T>(
    identifier: ServiceIdentifier<T>,
    members: ReadonlyArray<BindingInput<T>>,
    lifetime?: ServiceLifetime,
  ): this {
    return this.configure((c) => c.registerCollection(identifier, members, lifetime));
  }

  /**
   * Append an arbitrary registration action
   */
  configure(action: ContainerAction): this {
    this.actions.push(action);
    return this;
  }

  /**
   * Append an action only when the condition holds now
   */
  configureIf(condition: boolean | (() => boolean), action: ContainerAction): this {
    const shouldApply = typeof condition === 'function' ? condition() : condition;
    if (shouldApply) {
      this.configure(action);
    }
    return this;
  }

  // ==================== Modules ====================

  addModule(module: IServiceModule): this {
    if (this.modules.some((existing) => existing.name === module.name)) {
      this.logger.warn(`Module '${module.name}' already added, skipping`);
      return this;
    }
    this.modules.push(module);
    return this;
  }

  addModules(...modules: IServiceModule[]): this {
    for (const module of modules) {
      this.addModule(module);
    }
    return this;
  }

  // ==================== Validation & Build ====================

  /**
   * Append a final verification step
   *
   * Fails the build with ContainerValidationError when a binding cannot
   * produce an instance, a required capability is missing, or a module's
   * own checks report problems.
   */
  validate(required: ReadonlyArray<ServiceIdentifier<unknown>> = []): this {
    this.verifications.push((container) => {
      const result = container.verify(required);
      const errors = [...result.errors];

      for (const module of this.modules) {
        errors.push(...this.validateModule(module, container));
      }

      for (const warning of result.warnings) {
        this.logger.warn(warning);
      }

      if (errors.length > 0) {
        throw new ContainerValidationError(errors);
      }
    });
    return this;
  }

  /**
   * Apply actions, configure modules, initialize modules, then verify
   *
   * @throws The first failing action's error, ModuleConfigurationError for
   *   module passes, ContainerValidationError from `validate()`
   */
  async build(options: BuildOptions = {}): Promise<IServiceContainer> {
    const container =
      options.container ??
      new ServiceContainer({
        duplicatePolicy: this.options.duplicatePolicy,
        logger: this.options.logger,
      });
    const started = Date.now();

    this.logger.info(
      `Building container: ${this.actions.length} action(s), ${this.modules.length} module(s)`,
    );

    try {
      for (const action of this.actions) {
        action(container);
      }

      for (const module of this.modules) {
        this.configureModule(module, container);
      }

      for (const module of this.modules) {
        await this.initializeModule(module, container, options.signal);
      }

      for (const verification of this.verifications) {
        verification(container);
      }
    } catch (error) {
      this.logger.error(`Container build failed: ${describeError(error)}`);
      throw error;
    }

    this.logger.info(
      `Container built in ${Date.now() - started}ms with ${container.registrationCount} registration(s)`,
    );
    return container;
  }

  /**
   * Shorthand for `validate(required).build()`
   */
  async buildAndValidate(
    required: ReadonlyArray<ServiceIdentifier<unknown>> = [],
    options: BuildOptions = {},
  ): Promise<IServiceContainer> {
    return this.validate(required).build(options);
  }

  private configureModule(module: IServiceModule, container: IServiceContainer): void {
    try {
      module.configureServices(container);
      this.logger.debug(`Configured module '${module.name}'`);
    } catch (error) {
      throw new ModuleConfigurationError(module.name, 'configure', error);
    }
  }

  private async initializeModule(
    module: IServiceModule,
    container: IServiceContainer,
    signal?: AbortSignal,
  ): Promise<void> {
    throwIfAborted(signal);
    const timeoutMs = module.initializationTimeoutMs ?? this.options.defaultModuleTimeoutMs;

    try {
      await withTimeout(
        (attemptSignal) => module.initialize(container, attemptSignal),
        timeoutMs,
        `Module '${module.name}' initialization`,
        signal,
      );
      this.logger.debug(`Initialized module '${module.name}'`);
    } catch (error) {
      if (error instanceof InitializationCancelledError) throw error;
      throw new ModuleConfigurationError(module.name, 'initialize', error);
    }
  }

  private validateModule(module: IServiceModule, container: IServiceContainer): string[] {
    const problems: string[] = [];

    for (const identifier of module.requiredServices ?? []) {
      if (!container.isRegistered(identifier)) {
        problems.push(`${module.name}: required service '${identifier.name}' is not registered`);
      }
    }

    if (module.validateServices) {
      try {
        for (const problem of module.validateServices(container)) {
          if (!problems.includes(problem)) problems.push(problem);
        }
      } catch (error) {
        problems.push(
          new ModuleConfigurationError(module.name, 'validate', error).message,
        );
      }
    }

    return problems;
  }
}
