/**
 * @canopy/core - Service Locator
 *
 * Process-wide façade for call sites that cannot receive an injected
 * container. Layers a resolution cache and best-effort auto-discovery over
 * a ServiceContainer.
 *
 * Lookup order:
 *
 * ```
 * registered? ── yes ──> cache hit? ── yes ──> cached instance
 *     │                      └── no ──> container.resolve (cached unless Transient)
 *     └── no ──> auto-discovery over session sources ──> auto-register + cache
 *                    └── nothing found ──> ServiceNotFoundError
 * ```
 */

import { ServiceNotFoundError, describeError } from '../../domain/exceptions';
import { EventHub, IEventSource } from '../../domain/events';
import type { ISessionScanner } from '../../domain/session';
import { ServiceCache } from '../../infrastructure/cache';
import { ILogger, LogCategory, silentLogger, withCategory } from '../../infrastructure/logging';
import {
  BindingInput,
  DefaultConstructor,
  DuplicateRegistrationPolicy,
  IDisposable,
  InjectionToken,
  ServiceFactory,
  ServiceIdentifier,
  ServiceLifetime,
  identifierName,
} from './IDependencyInjection';
import { asCapability } from './RegistrationStore';
import { ServiceContainer } from './ServiceContainer';

export interface ServiceLocatorOptions {
  /** @defaultValue DuplicateRegistrationPolicy.LastWins */
  duplicatePolicy?: DuplicateRegistrationPolicy;

  /** @defaultValue true */
  enableAutoDiscovery?: boolean;

  /** @defaultValue true */
  enableCaching?: boolean;

  /** @defaultValue 1000 */
  cacheCapacity?: number;

  /** Live sources scanned by auto-discovery */
  discoverySources?: ISessionScanner[];

  logger?: ILogger;
}

/**
 * Locator usage metrics
 */
export interface LocatorMetrics {
  totalResolutions: number;
  cacheHits: number;
  cacheHitRate: number;
  registeredServices: number;
  cachedServices: number;
  activeScopes: number;
  discoveredServices: number;
  resolutionCounts: Record<string, number>;
}

export interface ServiceDiscoveredEvent {
  identifier: ServiceIdentifier<unknown>;
  serviceName: string;
}

export interface LocatorEvents {
  serviceDiscovered: ServiceDiscoveredEvent;
}

/**
 * Scoped sub-container handed out by the locator
 */
export class LocatorScope implements IDisposable {
  private disposed = false;

  constructor(
    readonly container: ServiceContainer,
    private readonly onDispose: (scope: LocatorScope) => void,
  ) {}

  get isDisposed(): boolean {
    return this.disposed;
  }

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    return this.container.resolve(identifier);
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    return this.container.tryResolve(identifier);
  }

  /**
   * Dispose the scope's own instances and detach it from the locator
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    try {
      await this.container.dispose();
    } finally {
      this.onDispose(this);
    }
  }
}

/**
 * ServiceLocator - global façade with caching and auto-discovery
 *
 * Prefer passing an IServiceContainer explicitly. The locator exists for
 * legacy call sites only.
 *
 * @example
 * ```typescript
 * const locator = ServiceLocator.instance;
 * locator.addDiscoverySource(session);
 *
 * const audio = locator.resolve(AudioManager); // found in the session, then cached
 * ```
 */
export class ServiceLocator {
  private static defaultInstance?: ServiceLocator;

  private container: ServiceContainer;
  private readonly cache: ServiceCache<ServiceIdentifier<unknown>>;
  private readonly sources: ISessionScanner[];
  private readonly scopes = new Set<LocatorScope>();
  private readonly hub: EventHub<LocatorEvents>;
  private readonly logger: ILogger;
  private readonly rawLogger: ILogger;
  private readonly duplicatePolicy: DuplicateRegistrationPolicy;

  private autoDiscovery: boolean;
  private caching: boolean;
  private totalResolutions = 0;
  private cacheHits = 0;
  private discoveredServices = 0;
  private resolutionCounts = new Map<string, number>();

  constructor(options: ServiceLocatorOptions = {}) {
    this.duplicatePolicy = options.duplicatePolicy ?? DuplicateRegistrationPolicy.LastWins;
    this.autoDiscovery = options.enableAutoDiscovery ?? true;
    this.caching = options.enableCaching ?? true;
    this.cache = new ServiceCache(options.cacheCapacity ?? 1000);
    this.sources = [...(options.discoverySources ?? [])];
    this.rawLogger = options.logger ?? silentLogger;
    this.logger = withCategory(this.rawLogger, LogCategory.Locator);
    this.hub = new EventHub<LocatorEvents>((eventName, error) => {
      this.logger.error(`Listener for '${eventName}' threw: ${describeError(error)}`);
    });
    this.container = this.createContainer();
  }

  /**
   * Lazily created process-wide locator
   */
  static get instance(): ServiceLocator {
    if (!ServiceLocator.defaultInstance) {
      ServiceLocator.defaultInstance = new ServiceLocator();
    }
    return ServiceLocator.defaultInstance;
  }

  /**
   * Clear and drop the process-wide locator
   */
  static async resetInstance(): Promise<void> {
    const current = ServiceLocator.defaultInstance;
    ServiceLocator.defaultInstance = undefined;
    await current?.clear();
  }

  get events(): IEventSource<LocatorEvents> {
    return this.hub;
  }

  get activeScopeCount(): number {
    return this.scopes.size;
  }

  get isAutoDiscoveryEnabled(): boolean {
    return this.autoDiscovery;
  }

  get isCachingEnabled(): boolean {
    return this.caching;
  }

  // ==================== Registration ====================

  registerSingleton<T>(identifier: ServiceIdentifier<T>, source: BindingInput<T>): this {
    this.cache.invalidate(identifier);
    this.container.registerSingleton(identifier, source);
    return this;
  }

  registerInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this {
    this.cache.invalidate(identifier);
    this.container.registerInstance(identifier, instance);
    return this;
  }

  registerTransient<T>(identifier: ServiceIdentifier<T>, implementation: DefaultConstructor<T>): this {
    this.cache.invalidate(identifier);
    this.container.registerTransient(identifier, implementation);
    return this;
  }

  registerFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    lifetime: ServiceLifetime = ServiceLifetime.Transient,
  ): this {
    this.cache.invalidate(identifier);
    this.container.registerFactory(identifier, factory, lifetime);
    return this;
  }

  /**
   * Scoped registrations are cached like singletons
   */
  registerScoped<T>(identifier: ServiceIdentifier<T>, source: BindingInput<T>): this {
    this.cache.invalidate(identifier);
    this.container.registerScoped(identifier, source);
    return this;
  }

  unregister(identifier: ServiceIdentifier<unknown>): boolean {
    this.cache.invalidate(identifier);
    return this.container.unregister(identifier);
  }

  isRegistered(identifier: ServiceIdentifier<unknown>): boolean {
    return this.container.isRegistered(identifier);
  }

  // ==================== Resolution ====================

  /**
   * @throws ServiceNotFoundError when registration, cache and discovery all miss
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T {
    const serviceName = identifierName(identifier);
    this.totalResolutions++;
    this.resolutionCounts.set(serviceName, (this.resolutionCounts.get(serviceName) ?? 0) + 1);

    if (this.container.isRegistered(identifier)) {
      if (this.caching) {
        const entry = this.cache.get(identifier);
        if (entry) {
          this.cacheHits++;
          return asCapability(identifier, entry.instance);
        }
      }

      const instance = this.container.resolve(identifier);
      if (this.caching && this.isCacheable(identifier)) {
        this.cache.set(identifier, instance);
      }
      return instance;
    }

    if (this.autoDiscovery) {
      const discovered = this.discover(identifier);
      if (discovered !== undefined) {
        return discovered;
      }
    }

    this.logger.debug(`Service '${serviceName}' not found`);
    throw new ServiceNotFoundError(serviceName);
  }

  /**
   * Resolve or return `undefined`; never throws for a missing service
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    try {
      return this.resolve(identifier);
    } catch (error) {
      this.logger.debug(
        `tryResolve('${identifierName(identifier)}') failed: ${describeError(error)}`,
      );
      return undefined;
    }
  }

  resolveAll<T>(identifier: ServiceIdentifier<T>): T[] {
    return this.container.resolveAll(identifier);
  }

  // ==================== Configuration ====================

  setAutoDiscovery(enabled: boolean): void {
    this.autoDiscovery = enabled;
    this.logger.info(`Auto-discovery ${enabled ? 'enabled' : 'disabled'}`);
  }

  setCaching(enabled: boolean): void {
    this.caching = enabled;
    if (!enabled) this.cache.clear();
    this.logger.info(`Caching ${enabled ? 'enabled' : 'disabled'}`);
  }

  addDiscoverySource(source: ISessionScanner): this {
    if (!this.sources.includes(source)) {
      this.sources.push(source);
    }
    return this;
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.debug('Resolution cache cleared');
  }

  // ==================== Scopes ====================

  createScope(): LocatorScope {
    const scope = new LocatorScope(this.container.createChildContainer(), (disposed) => {
      this.scopes.delete(disposed);
    });
    this.scopes.add(scope);
    return scope;
  }

  // ==================== Diagnostics ====================

  getMetrics(): LocatorMetrics {
    return {
      totalResolutions: this.totalResolutions,
      cacheHits: this.cacheHits,
      cacheHitRate: this.totalResolutions > 0 ? this.cacheHits / this.totalResolutions : 0,
      registeredServices: this.container.registrationCount,
      cachedServices: this.cache.size,
      activeScopes: this.scopes.size,
      discoveredServices: this.discoveredServices,
      resolutionCounts: Object.fromEntries(this.resolutionCounts),
    };
  }

  /**
   * Dispose scopes and owned instances, then start over with an empty container
   */
  async clear(): Promise<void> {
    for (const scope of [...this.scopes]) {
      await scope.dispose();
    }

    const previous = this.container;
    this.container = this.createContainer();
    this.cache.clear();
    this.totalResolutions = 0;
    this.cacheHits = 0;
    this.discoveredServices = 0;
    this.resolutionCounts = new Map();

    await previous.dispose();
    this.logger.info('Service locator cleared');
  }

  // ==================== Internals ====================

  private createContainer(): ServiceContainer {
    const container = new ServiceContainer({
      duplicatePolicy: this.duplicatePolicy,
      logger: this.rawLogger,
    });
    container.registerInstance(ServiceLocator, this, { externallyOwned: true });
    return container;
  }

  private isCacheable(identifier: ServiceIdentifier<unknown>): boolean {
    const info = this.container.getRegistrationInfo(identifier);
    return info !== undefined && info.lifetime !== ServiceLifetime.Transient;
  }

  private discover<T>(identifier: ServiceIdentifier<T>): T | undefined {
    const serviceName = identifierName(identifier);

    for (const source of this.sources) {
      for (const candidate of source.scan()) {
        const match = matchCandidate(identifier, candidate);
        if (match === undefined) continue;

        this.container.registerInstance(identifier, match, {
          externallyOwned: true,
          policy: DuplicateRegistrationPolicy.LastWins,
        });
        if (this.caching) {
          this.cache.set(identifier, match);
        }
        this.discoveredServices++;
        this.logger.info(`Auto-discovered and registered '${serviceName}'`);
        this.hub.emit('serviceDiscovered', { identifier, serviceName });
        return match;
      }
    }

    return undefined;
  }
}

function matchCandidate<T>(identifier: ServiceIdentifier<T>, candidate: object): T | undefined {
  if (identifier instanceof InjectionToken) {
    const guard = identifier.guard;
    return guard && guard(candidate) ? candidate : undefined;
  }
  return candidate instanceof identifier ? candidate : undefined;
}
