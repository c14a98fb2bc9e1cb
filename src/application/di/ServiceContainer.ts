/**
 * @canopy/core - Service Container
 *
 * Register/resolve runtime with Singleton, Transient and Scoped lifetimes,
 * factories, decorators, named, conditional and collection bindings.
 *
 * Not designed for concurrent access: registration and resolution mutate
 * shared maps and rely on the single-threaded event loop.
 */

import {
  CircularResolutionError,
  ContainerDisposedError,
  DuplicateRegistrationError,
  InvalidRegistrationError,
  UnresolvedServiceError,
  describeError,
} from '../../domain/exceptions';
import { EventHub, IEventSource } from '../../domain/events';
import { ILogger, LogCategory, silentLogger, withCategory } from '../../infrastructure/logging';
import {
  BindingInput,
  ContainerEvents,
  ContainerVerificationResult,
  DefaultConstructor,
  DuplicateRegistrationPolicy,
  IServiceContainer,
  RegistrationCondition,
  RegistrationInfo,
  ServiceDecorator,
  ServiceFactory,
  ServiceIdentifier,
  ServiceLifetime,
  ServiceRegistration,
  ServiceRegistrationOptions,
  identifierName,
  isDisposable,
} from './IDependencyInjection';
import { RegistrationStore } from './RegistrationStore';

/**
 * Service container configuration
 */
export interface ServiceContainerOptions {
  /** @defaultValue DuplicateRegistrationPolicy.Strict */
  duplicatePolicy?: DuplicateRegistrationPolicy;

  /** @defaultValue silentLogger */
  logger?: ILogger;

  /** Container consulted when a capability is not bound locally */
  parent?: ServiceContainer;
}

/**
 * ServiceContainer - default IServiceContainer implementation
 *
 * @example
 * ```typescript
 * const container = new ServiceContainer({ logger: consoleLogger });
 *
 * container.registerSingleton(TimeServiceToken, SystemTimeService);
 * container.registerTransient(RandomToken, SeededRandom);
 *
 * container.resolve(TimeServiceToken) === container.resolve(TimeServiceToken); // true
 * container.resolve(RandomToken) === container.resolve(RandomToken); // false
 * ```
 */
export class ServiceContainer implements IServiceContainer {
  readonly duplicatePolicy: DuplicateRegistrationPolicy;

  private readonly store = new RegistrationStore();
  private readonly hub: EventHub<ContainerEvents>;
  private readonly logger: ILogger;
  /** Logger as supplied, handed on to child containers */
  private readonly baseLogger: ILogger;
  private readonly parent?: ServiceContainer;
  private readonly children = new Set<ServiceContainer>();

  /** Registrations currently being constructed, outermost first */
  private readonly resolving: ServiceRegistration<unknown>[] = [];

  /** Owned cached instances in creation order */
  private readonly owned: Array<{ registration: ServiceRegistration<unknown>; value: unknown }> = [];

  private disposed = false;

  constructor(options: ServiceContainerOptions = {}) {
    this.duplicatePolicy = options.duplicatePolicy ?? DuplicateRegistrationPolicy.Strict;
    this.baseLogger = options.logger ?? silentLogger;
    this.logger = withCategory(this.baseLogger, LogCategory.DI);
    this.parent = options.parent;
    this.hub = new EventHub<ContainerEvents>((eventName, error) => {
      this.logger.error(`Listener for '${eventName}' threw: ${describeError(error)}`);
    });
  }

  get events(): IEventSource<ContainerEvents> {
    return this.hub;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get registrationCount(): number {
    return this.store.size;
  }

  // ==================== Registration ====================

  registerSingleton<T>(
    identifier: ServiceIdentifier<T>,
    source: BindingInput<T>,
    options: ServiceRegistrationOptions = {},
  ): this {
    return this.addPrimary(identifier, source, ServiceLifetime.Singleton, options);
  }

  registerInstance<T>(
    identifier: ServiceIdentifier<T>,
    instance: T,
    options: ServiceRegistrationOptions = {},
  ): this {
    return this.addPrimary(identifier, { instance }, ServiceLifetime.Singleton, options);
  }

  registerTransient<T>(
    identifier: ServiceIdentifier<T>,
    implementation: DefaultConstructor<T>,
    options: ServiceRegistrationOptions = {},
  ): this {
    return this.addPrimary(identifier, { implementation }, ServiceLifetime.Transient, options);
  }

  registerFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    lifetime: ServiceLifetime = ServiceLifetime.Transient,
    options: ServiceRegistrationOptions = {},
  ): this {
    return this.addPrimary(identifier, { factory }, lifetime, options);
  }

  registerScoped<T>(
    identifier: ServiceIdentifier<T>,
    source: BindingInput<T>,
    options: ServiceRegistrationOptions = {},
  ): this {
    return this.addPrimary(identifier, source, ServiceLifetime.Scoped, options);
  }

  registerNamed<T>(
    identifier: ServiceIdentifier<T>,
    name: string,
    source: BindingInput<T>,
    lifetime: ServiceLifetime = ServiceLifetime.Singleton,
  ): this {
    this.assertNotDisposed();
    const serviceName = identifierName(identifier);

    if (name.trim() === '') {
      throw new InvalidRegistrationError(serviceName, 'registration name must not be empty');
    }

    const registration = this.createRegistration(identifier, source, lifetime, {}, name);
    const existing = this.store.getNamed(identifier, name);

    if (existing && this.duplicatePolicy === DuplicateRegistrationPolicy.Strict) {
      throw new DuplicateRegistrationError(serviceName, name);
    }
    if (existing) {
      this.logger.warn(`Replacing registration for '${serviceName}' named '${name}'`);
    }

    this.store.setNamed(identifier, name, registration);
    this.announce(registration, existing !== undefined);
    return this;
  }

  registerConditional<T>(
    identifier: ServiceIdentifier<T>,
    condition: RegistrationCondition,
    source: BindingInput<T>,
    lifetime: ServiceLifetime = ServiceLifetime.Singleton,
  ): this {
    this.assertNotDisposed();

    if (!condition(this)) {
      this.logger.debug(`Condition not met, skipping '${identifierName(identifier)}'`);
      return this;
    }
    return this.addPrimary(identifier, source, lifetime, {});
  }

  registerDecorator<T>(
    identifier: ServiceIdentifier<T>,
    decorator: ServiceDecorator<T>,
  ): this {
    this.assertNotDisposed();
    const serviceName = identifierName(identifier);
    const inner = this.store.getActive(identifier);

    if (!inner) {
      throw new UnresolvedServiceError(
        serviceName,
        `Cannot decorate '${serviceName}': no registration found`,
      );
    }

    const decorated: ServiceRegistration<T> = {
      identifier,
      name: inner.name,
      lifetime: inner.lifetime,
      factory: (resolver) => decorator(this.materialize(inner), resolver),
      externallyOwned: false,
      decoratorCount: inner.decoratorCount + 1,
      registeredAt: Date.now(),
    };

    this.store.setPrimary(identifier, decorated);
    this.announce(decorated, true);
    return this;
  }

  registerCollection<T>(
    identifier: ServiceIdentifier<T>,
    members: ReadonlyArray<BindingInput<T>>,
    lifetime: ServiceLifetime = ServiceLifetime.Transient,
  ): this {
    this.assertNotDisposed();

    for (const member of members) {
      const registration = this.createRegistration(identifier, member, lifetime, {});
      this.store.appendToCollection(identifier, registration);
      this.announce(registration, false);
    }
    return this;
  }

  unregister(identifier: ServiceIdentifier<unknown>): boolean {
    const removed = this.store.delete(identifier);
    if (removed.length === 0) return false;

    for (let i = this.owned.length - 1; i >= 0; i--) {
      if (removed.includes(this.owned[i].registration)) {
        this.owned.splice(i, 1);
      }
    }

    this.logger.debug(`Unregistered '${identifierName(identifier)}'`);
    return true;
  }

  clear(): void {
    this.store.clear();
    this.owned.length = 0;
    this.resolving.length = 0;
    this.logger.debug('Container cleared');
  }

  // ==================== Resolution ====================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    this.assertNotDisposed();
    const registration = this.store.getActive(identifier);

    if (!registration) {
      if (this.parent?.isRegistered(identifier)) {
        return this.parent.resolve(identifier);
      }
      throw this.fail(identifier, new UnresolvedServiceError(identifierName(identifier)));
    }

    return this.materialize(registration);
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    if (this.disposed || !this.isRegistered(identifier)) return undefined;

    try {
      return this.resolve(identifier);
    } catch (error) {
      this.logger.debug(
        `tryResolve('${identifierName(identifier)}') failed: ${describeError(error)}`,
      );
      return undefined;
    }
  }

  resolveNamed<T>(identifier: ServiceIdentifier<T>, name: string): T {
    this.assertNotDisposed();
    const registration = this.store.getNamed(identifier, name);

    if (!registration) {
      if (this.parent?.isRegistered(identifier, name)) {
        return this.parent.resolveNamed(identifier, name);
      }
      const serviceName = identifierName(identifier);
      throw this.fail(
        identifier,
        new UnresolvedServiceError(
          serviceName,
          `No registration found for service '${serviceName}' named '${name}'`,
        ),
      );
    }

    return this.materialize(registration);
  }

  tryResolveNamed<T>(identifier: ServiceIdentifier<T>, name: string): T | undefined {
    if (this.disposed || !this.isRegistered(identifier, name)) return undefined;

    try {
      return this.resolveNamed(identifier, name);
    } catch (error) {
      this.logger.debug(
        `tryResolveNamed('${identifierName(identifier)}', '${name}') failed: ${describeError(error)}`,
      );
      return undefined;
    }
  }

  resolveAll<T>(identifier: ServiceIdentifier<T>): T[] {
    this.assertNotDisposed();
    const members = this.store.getCollection(identifier);

    if (members.length > 0) {
      return members.map((member) => this.materialize(member));
    }

    const primary = this.store.getPrimary(identifier);
    if (primary) return [this.materialize(primary)];

    return this.parent ? this.parent.resolveAll(identifier) : [];
  }

  isRegistered(identifier: ServiceIdentifier<unknown>, name?: string): boolean {
    if (this.store.has(identifier, name)) return true;
    return this.parent?.isRegistered(identifier, name) ?? false;
  }

  // ==================== Introspection ====================

  getRegisteredTypes(): ServiceIdentifier<unknown>[] {
    return this.store.identifiers();
  }

  getRegistrationInfo(identifier: ServiceIdentifier<unknown>): RegistrationInfo | undefined {
    const registration = this.store.getActive(identifier) ?? this.firstNamed(identifier);
    if (!registration) return undefined;

    return {
      serviceName: identifierName(identifier),
      name: registration.name,
      lifetime: registration.lifetime,
      implementationName: registration.implementation?.name,
      hasInstance: registration.instance !== undefined,
      hasFactory: registration.factory !== undefined,
      decoratorCount: registration.decoratorCount,
      collectionSize: this.store.collectionSize(identifier),
    };
  }

  getRegistrations(): RegistrationInfo[] {
    const result: RegistrationInfo[] = [];
    for (const identifier of this.store.identifiers()) {
      const info = this.getRegistrationInfo(identifier);
      if (info) result.push(info);
    }
    return result;
  }

  verify(required: ReadonlyArray<ServiceIdentifier<unknown>> = []): ContainerVerificationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (this.store.size === 0 && !this.parent) {
      warnings.push('No services registered');
    }

    for (const registration of this.store.all()) {
      const serviceName = describeRegistration(registration);

      if (!registration.instance && !registration.factory && !registration.implementation) {
        errors.push(`Registration for '${serviceName}' has no instance, factory or implementation`);
      }
      if (
        registration.lifetime === ServiceLifetime.Transient &&
        registration.instance &&
        !registration.factory
      ) {
        warnings.push(`Transient registration for '${serviceName}' always returns the same instance`);
      }
    }

    for (const identifier of required) {
      if (!this.isRegistered(identifier)) {
        errors.push(`Required service '${identifierName(identifier)}' is not registered`);
      }
    }

    return { isValid: errors.length === 0, errors, warnings };
  }

  // ==================== Lifecycle ====================

  createChildContainer(): ServiceContainer {
    this.assertNotDisposed();
    const child = new ServiceContainer({
      duplicatePolicy: this.duplicatePolicy,
      logger: this.baseLogger,
      parent: this,
    });
    this.children.add(child);
    return child;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const errors: unknown[] = [];

    for (const child of [...this.children]) {
      try {
        await child.dispose();
      } catch (error) {
        errors.push(error);
      }
    }

    const released = new Set<unknown>();
    for (const { registration, value } of [...this.owned].reverse()) {
      if (!isDisposable(value) || released.has(value)) continue;
      released.add(value);
      try {
        await value.dispose();
      } catch (error) {
        errors.push(error);
        this.logger.error(
          `Failed to dispose '${describeRegistration(registration)}': ${describeError(error)}`,
        );
      }
    }

    this.owned.length = 0;
    this.store.clear();
    this.hub.clear();
    this.parent?.children.delete(this);

    if (errors.length > 0) {
      throw new AggregateError(errors, `${errors.length} service(s) failed to dispose`);
    }
  }

  // ==================== Internals ====================

  private addPrimary<T>(
    identifier: ServiceIdentifier<T>,
    source: BindingInput<T>,
    lifetime: ServiceLifetime,
    options: ServiceRegistrationOptions,
  ): this {
    this.assertNotDisposed();
    const serviceName = identifierName(identifier);
    const registration = this.createRegistration(identifier, source, lifetime, options);
    const existing = this.store.getActive(identifier);
    const policy = options.policy ?? this.duplicatePolicy;

    if (existing && policy === DuplicateRegistrationPolicy.Strict) {
      throw new DuplicateRegistrationError(serviceName);
    }
    if (existing) {
      this.logger.warn(`Replacing existing registration for '${serviceName}'`);
    }

    this.store.setPrimary(identifier, registration);
    this.announce(registration, existing !== undefined);
    return this;
  }

  private createRegistration<T>(
    identifier: ServiceIdentifier<T>,
    input: BindingInput<T>,
    lifetime: ServiceLifetime,
    options: ServiceRegistrationOptions,
    name?: string,
  ): ServiceRegistration<T> {
    const source = typeof input === 'function' ? { implementation: input } : input;
    const base = {
      identifier,
      name,
      lifetime,
      externallyOwned: options.externallyOwned ?? false,
      decoratorCount: 0,
      registeredAt: Date.now(),
    };

    if ('instance' in source) {
      return { ...base, instance: { value: source.instance } };
    }
    if ('factory' in source) {
      if (typeof source.factory !== 'function') {
        throw new InvalidRegistrationError(identifierName(identifier), 'factory must be a function');
      }
      return { ...base, factory: source.factory };
    }
    if (typeof source.implementation !== 'function') {
      throw new InvalidRegistrationError(
        identifierName(identifier),
        'implementation must be a constructor',
      );
    }
    return { ...base, implementation: source.implementation };
  }

  private materialize<T>(registration: ServiceRegistration<T>): T {
    const serviceName = describeRegistration(registration);

    if (registration.instance) {
      this.hub.emit('serviceResolved', {
        identifier: registration.identifier,
        serviceName,
        lifetime: registration.lifetime,
        fromCache: true,
      });
      return registration.instance.value;
    }

    let value: T;
    try {
      value = this.produce(registration);
    } catch (error) {
      throw this.fail(
        registration.identifier,
        error instanceof Error ? error : new Error(describeError(error)),
      );
    }

    if (registration.lifetime !== ServiceLifetime.Transient) {
      registration.instance = { value };
      if (!registration.externallyOwned) {
        this.owned.push({ registration, value });
      }
    }

    this.hub.emit('serviceResolved', {
      identifier: registration.identifier,
      serviceName,
      lifetime: registration.lifetime,
      fromCache: false,
    });
    this.logger.debug(`Resolved '${serviceName}' (${registration.lifetime})`);
    return value;
  }

  /**
   * Build a value without caching it on the registration
   */
  private produce<T>(registration: ServiceRegistration<T>): T {
    if (registration.instance) return registration.instance.value;

    const cycleStart = this.resolving.indexOf(registration);
    if (cycleStart !== -1) {
      throw new CircularResolutionError(
        [...this.resolving.slice(cycleStart), registration].map(describeRegistration),
      );
    }

    this.resolving.push(registration);
    try {
      if (registration.factory) return registration.factory(this);
      if (registration.implementation) return new registration.implementation();

      const serviceName = describeRegistration(registration);
      throw new UnresolvedServiceError(
        serviceName,
        `Registration for '${serviceName}' has no instance, factory or implementation`,
      );
    } finally {
      this.resolving.pop();
    }
  }

  private firstNamed(identifier: ServiceIdentifier<unknown>): ServiceRegistration<unknown> | undefined {
    return this.store.all().find((registration) => registration.identifier === identifier);
  }

  private announce(registration: ServiceRegistration<unknown>, replaced: boolean): void {
    const serviceName = identifierName(registration.identifier);
    this.hub.emit('serviceRegistered', {
      identifier: registration.identifier,
      serviceName,
      lifetime: registration.lifetime,
      name: registration.name,
      replaced,
    });
    this.logger.debug(
      `Registered '${describeRegistration(registration)}' as ${registration.lifetime}`,
    );
  }

  private fail(identifier: ServiceIdentifier<unknown>, error: Error): Error {
    this.hub.emit('resolutionFailed', {
      identifier,
      serviceName: identifierName(identifier),
      error,
    });
    this.logger.debug(`Resolution of '${identifierName(identifier)}' failed: ${error.message}`);
    return error;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new ContainerDisposedError();
    }
  }
}

function describeRegistration(registration: ServiceRegistration<unknown>): string {
  const serviceName = identifierName(registration.identifier);
  return registration.name ? `${serviceName}[${registration.name}]` : serviceName;
}
