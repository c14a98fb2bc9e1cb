/**
 * @fileoverview Dependency Injection - Service Container Interfaces
 *
 * @packageDocumentation
 * @module @canopy/core/application/di
 *
 * ## Layer: APPLICATION
 *
 * Contracts for the home-grown dependency-injection runtime shared by the
 * game session: capability identifiers, lifetimes, bindings, the container
 * and its resolver view.
 *
 * ## Capabilities
 *
 * A capability is the key a binding is registered and resolved under. It is
 * either a class (abstract or concrete) or an {@link InjectionToken}, which
 * stands in for an interface at runtime:
 *
 * ```typescript
 * interface ITimeService {
 *   now(): number;
 * }
 *
 * const TimeServiceToken = createToken<ITimeService>('ITimeService');
 *
 * container.registerSingleton(TimeServiceToken, SystemTimeService);
 * const time = container.resolve(TimeServiceToken); // ITimeService
 * ```
 *
 * ## Resolution Order
 *
 * ```
 * registration lookup → cached instance → factory → new Implementation()
 * ```
 *
 * Implementations are constructed with no arguments. Anything that needs
 * collaborators must be bound through a factory that receives the resolver.
 */

import 'reflect-metadata';

import type { IEventSource } from '../../domain/events';

// ============================================================================
// Lifetimes & Policies
// ============================================================================

/**
 * How long a resolved instance is reused
 */
export enum ServiceLifetime {
  /**
   * One instance for the lifetime of the owning container.
   */
  Singleton = 'singleton',

  /**
   * A new instance on every resolution.
   */
  Transient = 'transient',

  /**
   * One instance per logical scope.
   *
   * @remarks
   * Currently cached exactly like Singleton on the container that owns the
   * registration.
   */
  Scoped = 'scoped',
}

/**
 * What happens when a capability that already has an active binding is
 * registered again
 */
export enum DuplicateRegistrationPolicy {
  /**
   * Throw DuplicateRegistrationError. Callers that need idempotence check
   * `isRegistered` first.
   */
  Strict = 'strict',

  /**
   * Replace the previous binding and log a warning.
   */
  LastWins = 'last-wins',
}

// ============================================================================
// Capability Identifiers
// ============================================================================

/**
 * Runtime stand-in for an interface capability
 *
 * @template T - Capability type resolved through this token
 */
export class InjectionToken<T> {
  /**
   * @param name - Capability name, conventionally prefixed with `I`
   * @param guard - Recognises live instances of the capability; used by
   *   auto-discovery
   */
  constructor(
    readonly name: string,
    readonly guard?: (value: unknown) => value is T,
  ) {}

  toString(): string {
    return `InjectionToken(${this.name})`;
  }
}

/**
 * Create a capability token
 *
 * @example
 * ```typescript
 * const SettingsToken = createToken<ISettingsService>(
 *   'ISettingsService',
 *   (value): value is ISettingsService =>
 *     typeof value === 'object' && value !== null && 'getSetting' in value,
 * );
 * ```
 */
export function createToken<T>(
  name: string,
  guard?: (value: unknown) => value is T,
): InjectionToken<T> {
  return new InjectionToken<T>(name, guard);
}

/**
 * Class used as a capability key
 */
export type ServiceConstructor<T> = abstract new (...args: never[]) => T;

/**
 * Implementation constructed by the container without arguments
 */
export type DefaultConstructor<T> = new () => T;

/**
 * Key a binding is registered and resolved under
 */
export type ServiceIdentifier<T> = ServiceConstructor<T> | InjectionToken<T>;

/**
 * Check whether a runtime value can key a class binding
 */
export function isServiceConstructor(value: unknown): value is ServiceConstructor<object> {
  return typeof value === 'function' && value.prototype !== undefined;
}

/**
 * Human-readable name of a capability
 */
export function identifierName(identifier: ServiceIdentifier<unknown>): string {
  return identifier.name || 'anonymous';
}

// ============================================================================
// Bindings
// ============================================================================

/**
 * Read-only resolver handed to factories and conditions
 */
export interface IServiceResolver {
  /**
   * Resolve a capability
   *
   * @throws UnresolvedServiceError when nothing is bound
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Resolve a capability, returning `undefined` instead of failing
   *
   * @remarks
   * The sanctioned way to check for optional dependencies.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined;

  /**
   * Resolve a named binding
   */
  resolveNamed<T>(identifier: ServiceIdentifier<T>, name: string): T;

  tryResolveNamed<T>(identifier: ServiceIdentifier<T>, name: string): T | undefined;

  /**
   * Resolve every member of a collection binding
   *
   * @returns Members in registration order, the single active binding when
   *   there is no collection, or an empty array
   */
  resolveAll<T>(identifier: ServiceIdentifier<T>): T[];

  /**
   * Check whether the capability has an active binding
   */
  isRegistered(identifier: ServiceIdentifier<unknown>, name?: string): boolean;
}

/**
 * Builds an instance from the resolver
 */
export type ServiceFactory<T> = (resolver: IServiceResolver) => T;

/**
 * Wraps the previous binding's instance
 */
export type ServiceDecorator<T> = (inner: T, resolver: IServiceResolver) => T;

/**
 * Predicate over the resolver, evaluated once at registration time
 */
export type RegistrationCondition = (resolver: IServiceResolver) => boolean;

/**
 * How a binding produces its instance
 */
export type BindingSource<T> =
  | { instance: T }
  | { factory: ServiceFactory<T> }
  | { implementation: DefaultConstructor<T> };

/**
 * A binding source, or an implementation class as shorthand
 */
export type BindingInput<T> = BindingSource<T> | DefaultConstructor<T>;

/**
 * Extra registration flags
 */
export interface ServiceRegistrationOptions {
  /**
   * Instance is owned by the hosting application; the container will not
   * dispose it.
   */
  externallyOwned?: boolean;

  /**
   * Duplicate policy for this call only.
   */
  policy?: DuplicateRegistrationPolicy;
}

/**
 * Stored binding for one capability
 */
export interface ServiceRegistration<T> {
  /** Requested capability */
  readonly identifier: ServiceIdentifier<T>;

  /** Registration key for named bindings */
  readonly name?: string;

  /** Implementation class constructed without arguments */
  readonly implementation?: DefaultConstructor<T>;

  /** Recipe producing an instance */
  readonly factory?: ServiceFactory<T>;

  readonly lifetime: ServiceLifetime;

  /**
   * Resolved instance: pre-built, or populated on first resolution for
   * cached lifetimes
   */
  instance?: { readonly value: T };

  readonly externallyOwned: boolean;

  /** Number of decorators wrapped around the original binding */
  readonly decoratorCount: number;

  readonly registeredAt: number;
}

/**
 * Introspection snapshot of a registration
 */
export interface RegistrationInfo {
  serviceName: string;
  name?: string;
  lifetime: ServiceLifetime;
  implementationName?: string;
  hasInstance: boolean;
  hasFactory: boolean;
  decoratorCount: number;
  collectionSize: number;
}

/**
 * Outcome of a container health check
 */
export interface ContainerVerificationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================================
// Events
// ============================================================================

export interface ServiceRegisteredEvent {
  identifier: ServiceIdentifier<unknown>;
  serviceName: string;
  lifetime: ServiceLifetime;
  name?: string;
  replaced: boolean;
}

export interface ServiceResolvedEvent {
  identifier: ServiceIdentifier<unknown>;
  serviceName: string;
  lifetime: ServiceLifetime;
  fromCache: boolean;
}

export interface ResolutionFailedEvent {
  identifier: ServiceIdentifier<unknown>;
  serviceName: string;
  error: Error;
}

/**
 * Events raised by a service container
 */
export interface ContainerEvents {
  serviceRegistered: ServiceRegisteredEvent;
  serviceResolved: ServiceResolvedEvent;
  resolutionFailed: ResolutionFailedEvent;
}

// ============================================================================
// Container
// ============================================================================

/**
 * IServiceContainer - registration, resolution and lifecycle
 *
 * Registration methods return the container so calls can be chained.
 *
 * @example
 * ```typescript
 * const container = new ServiceContainer();
 *
 * container
 *   .registerSingleton(TimeServiceToken, SystemTimeService)
 *   .registerFactory(
 *     SaveGameServiceToken,
 *     (r) => new SaveGameService(r.resolve(PersistenceServiceToken)),
 *   )
 *   .registerDecorator(SaveGameServiceToken, (inner) => new LoggingSaveGame(inner));
 *
 * const saves = container.resolve(SaveGameServiceToken);
 * ```
 */
export interface IServiceContainer extends IServiceResolver {
  /**
   * Events for instrumentation collaborators
   */
  readonly events: IEventSource<ContainerEvents>;

  /**
   * Duplicate-registration policy applied when a call does not override it
   */
  readonly duplicatePolicy: DuplicateRegistrationPolicy;

  /**
   * Bind one instance for the lifetime of the container
   *
   * @throws DuplicateRegistrationError under the Strict policy
   */
  registerSingleton<T>(
    identifier: ServiceIdentifier<T>,
    source: BindingInput<T>,
    options?: ServiceRegistrationOptions,
  ): this;

  /**
   * Bind a pre-built instance
   */
  registerInstance<T>(
    identifier: ServiceIdentifier<T>,
    instance: T,
    options?: ServiceRegistrationOptions,
  ): this;

  /**
   * Bind an implementation constructed on every resolution
   */
  registerTransient<T>(
    identifier: ServiceIdentifier<T>,
    implementation: DefaultConstructor<T>,
    options?: ServiceRegistrationOptions,
  ): this;

  /**
   * Bind a factory
   *
   * @param lifetime - Defaults to Transient, invoking the factory on every
   *   resolution
   */
  registerFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    lifetime?: ServiceLifetime,
    options?: ServiceRegistrationOptions,
  ): this;

  /**
   * Bind with Scoped lifetime (cached like Singleton)
   */
  registerScoped<T>(
    identifier: ServiceIdentifier<T>,
    source: BindingInput<T>,
    options?: ServiceRegistrationOptions,
  ): this;

  /**
   * Bind under a capability plus a string key
   */
  registerNamed<T>(
    identifier: ServiceIdentifier<T>,
    name: string,
    source: BindingInput<T>,
    lifetime?: ServiceLifetime,
  ): this;

  /**
   * Bind only when `condition` holds now
   *
   * @remarks
   * The condition is evaluated once, at registration time, against the
   * container itself.
   */
  registerConditional<T>(
    identifier: ServiceIdentifier<T>,
    condition: RegistrationCondition,
    source: BindingInput<T>,
    lifetime?: ServiceLifetime,
  ): this;

  /**
   * Wrap the active binding of a capability
   *
   * @throws UnresolvedServiceError when nothing is bound yet
   */
  registerDecorator<T>(
    identifier: ServiceIdentifier<T>,
    decorator: ServiceDecorator<T>,
  ): this;

  /**
   * Append implementations to a homogeneous collection
   *
   * @remarks
   * `resolve` returns the last registered member, `resolveAll` every member.
   */
  registerCollection<T>(
    identifier: ServiceIdentifier<T>,
    members: ReadonlyArray<BindingInput<T>>,
    lifetime?: ServiceLifetime,
  ): this;

  /**
   * Remove every binding (primary, named, collection) of a capability
   *
   * @returns True when anything was removed
   */
  unregister(identifier: ServiceIdentifier<unknown>): boolean;

  /**
   * Drop all registrations and cached instances without disposing them
   */
  clear(): void;

  /**
   * Create a child that resolves locally first, then through this container
   */
  createChildContainer(): IServiceContainer;

  /**
   * Capabilities with a binding on this container
   */
  getRegisteredTypes(): ServiceIdentifier<unknown>[];

  /**
   * Introspection snapshot of one capability's active binding
   */
  getRegistrationInfo(identifier: ServiceIdentifier<unknown>): RegistrationInfo | undefined;

  /**
   * Introspection snapshot of every capability
   */
  getRegistrations(): RegistrationInfo[];

  /**
   * Number of capabilities with a binding
   */
  readonly registrationCount: number;

  /**
   * Check every binding can produce an instance and required capabilities
   * are bound
   */
  verify(required?: ReadonlyArray<ServiceIdentifier<unknown>>): ContainerVerificationResult;

  /**
   * Dispose owned cached instances in reverse creation order and clear the
   * container
   */
  dispose(): Promise<void>;

  readonly isDisposed: boolean;
}

// ============================================================================
// Disposal
// ============================================================================

/**
 * Instance that releases resources when its container is disposed
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

export function isDisposable(value: unknown): value is IDisposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

// ============================================================================
// Decorators
// ============================================================================

const INJECTABLE_METADATA_KEY = 'canopy:injectable';

/**
 * Metadata recorded by {@link Injectable}
 */
export interface InjectableMetadata {
  lifetime: ServiceLifetime;
  provides: InjectionToken<unknown>[];
}

/**
 * Mark a class for opt-in auto-wiring
 *
 * Records the lifetime the class should be bound with and the capability
 * tokens it fulfils. Only the Bootstrapper's auto-wiring mode reads it;
 * explicit registration ignores it.
 *
 * @example
 * ```typescript
 * @Injectable({ provides: [WeatherServiceToken] })
 * class WeatherService implements IWeatherService {
 *   // ...
 * }
 * ```
 */
export function Injectable(
  options: { lifetime?: ServiceLifetime; provides?: InjectionToken<unknown>[] } = {},
): ClassDecorator {
  return (target) => {
    const metadata: InjectableMetadata = {
      lifetime: options.lifetime ?? ServiceLifetime.Singleton,
      provides: [...(options.provides ?? [])],
    };
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, metadata, target);
  };
}

/**
 * Read metadata written by {@link Injectable}
 */
export function getInjectableMetadata(target: object): InjectableMetadata | undefined {
  const metadata: unknown = Reflect.getOwnMetadata(INJECTABLE_METADATA_KEY, target);
  return isInjectableMetadata(metadata) ? metadata : undefined;
}

function isInjectableMetadata(value: unknown): value is InjectableMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'lifetime' in value &&
    'provides' in value &&
    Array.isArray(value.provides)
  );
}
