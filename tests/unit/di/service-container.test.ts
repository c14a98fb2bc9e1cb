/**
 * @fileoverview Unit tests for ServiceContainer
 *
 * Covers lifetimes, duplicate policies, named/conditional/decorated and
 * collection bindings, child containers, verification and disposal.
 */

import {
  CircularResolutionError,
  ContainerDisposedError,
  DuplicateRegistrationError,
  DuplicateRegistrationPolicy,
  InvalidRegistrationError,
  ServiceContainer,
  ServiceLifetime,
  UnresolvedServiceError,
  createToken,
} from '../../../src';
import { RecordingLogger } from '../../helpers/recording-logger';

// ============================================================================
// Test Services
// ============================================================================

interface IClock {
  now(): number;
}

class FixedClock implements IClock {
  now(): number {
    return 42;
  }
}

class OtherClock implements IClock {
  now(): number {
    return 7;
  }
}

interface IGreeter {
  greet(name: string): string;
}

class PlainGreeter implements IGreeter {
  greet(name: string): string {
    return `hello ${name}`;
  }
}

class DisposableResource {
  disposed = false;

  constructor(
    public readonly label: string,
    private readonly log: string[],
  ) {}

  dispose(): void {
    this.disposed = true;
    this.log.push(this.label);
  }
}

const ClockToken = createToken<IClock>('IClock');
const GreeterToken = createToken<IGreeter>('IGreeter');
const ResourceToken = createToken<DisposableResource>('IResource');
const OtherResourceToken = createToken<DisposableResource>('IOtherResource');
const BrokenToken = createToken<{ dispose(): void }>('IBroken');

describe('ServiceContainer', () => {
  let container: ServiceContainer;

  beforeEach(() => {
    container = new ServiceContainer();
  });

  // ==========================================================================
  // LIFETIMES
  // ==========================================================================

  describe('Lifetimes', () => {
    it('should return the identical instance for a singleton', () => {
      container.registerSingleton(ClockToken, FixedClock);

      const first = container.resolve(ClockToken);
      const second = container.resolve(ClockToken);

      expect(first).toBe(second);
      expect(first.now()).toBe(42);
    });

    it('should return distinct instances for a transient', () => {
      container.registerTransient(ClockToken, FixedClock);

      expect(container.resolve(ClockToken)).not.toBe(container.resolve(ClockToken));
    });

    it('should invoke a transient factory on every resolution', () => {
      const factory = jest.fn(() => new FixedClock());
      container.registerFactory(ClockToken, factory);

      container.resolve(ClockToken);
      container.resolve(ClockToken);

      expect(factory).toHaveBeenCalledTimes(2);
    });

    it('should invoke a singleton factory once', () => {
      const factory = jest.fn(() => new FixedClock());
      container.registerFactory(ClockToken, factory, ServiceLifetime.Singleton);

      container.resolve(ClockToken);
      container.resolve(ClockToken);

      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should cache scoped registrations like singletons', () => {
      container.registerScoped(ClockToken, FixedClock);

      expect(container.resolve(ClockToken)).toBe(container.resolve(ClockToken));
    });

    it('should return a registered instance as is', () => {
      const clock = new FixedClock();
      container.registerInstance(ClockToken, clock);

      expect(container.resolve(ClockToken)).toBe(clock);
    });

    it('should pass the container to factories', () => {
      container.registerSingleton(ClockToken, FixedClock);
      container.registerFactory(GreeterToken, (resolver) => ({
        greet: (name: string) => `${name} at ${resolver.resolve(ClockToken).now()}`,
      }));

      expect(container.resolve(GreeterToken).greet('ada')).toBe('ada at 42');
    });

    it('should accept classes as capability keys', () => {
      container.registerSingleton(FixedClock, FixedClock);

      expect(container.resolve(FixedClock)).toBeInstanceOf(FixedClock);
    });
  });

  // ==========================================================================
  // DUPLICATE POLICY
  // ==========================================================================

  describe('Duplicate Policy', () => {
    it('should reject a second registration under the strict policy', () => {
      container.registerSingleton(ClockToken, FixedClock);

      expect(() => container.registerSingleton(ClockToken, OtherClock)).toThrowErrorType(
        DuplicateRegistrationError,
      );
      expect(container.resolve(ClockToken).now()).toBe(42);
    });

    it('should name the service in the duplicate error', () => {
      container.registerSingleton(ClockToken, FixedClock);

      expect(() => container.registerTransient(ClockToken, OtherClock)).toThrow(
        "Service 'IClock' is already registered",
      );
    });

    it('should overwrite under the last-wins policy', () => {
      const lenient = new ServiceContainer({
        duplicatePolicy: DuplicateRegistrationPolicy.LastWins,
      });
      lenient.registerSingleton(ClockToken, FixedClock);
      lenient.registerSingleton(ClockToken, OtherClock);

      expect(lenient.resolve(ClockToken).now()).toBe(7);
    });

    it('should honour a per-call policy override', () => {
      container.registerSingleton(ClockToken, FixedClock);
      container.registerSingleton(ClockToken, OtherClock, {
        policy: DuplicateRegistrationPolicy.LastWins,
      });

      expect(container.resolve(ClockToken).now()).toBe(7);
    });

    it('should report replaced registrations through events', () => {
      const lenient = new ServiceContainer({
        duplicatePolicy: DuplicateRegistrationPolicy.LastWins,
      });
      const replaced: boolean[] = [];
      lenient.events.on('serviceRegistered', (event) => replaced.push(event.replaced));

      lenient.registerSingleton(ClockToken, FixedClock);
      lenient.registerSingleton(ClockToken, OtherClock);

      expect(replaced).toEqual([false, true]);
    });
  });

  // ==========================================================================
  // RESOLUTION FAILURES
  // ==========================================================================

  describe('Resolution Failures', () => {
    it('should yield undefined from tryResolve before any registration', () => {
      expect(container.tryResolve(ClockToken)).toBeUndefined();
    });

    it('should throw UnresolvedServiceError from resolve when unbound', () => {
      expect(() => container.resolve(ClockToken)).toThrow(
        "No registration found for service 'IClock'",
      );
      expect(() => container.resolve(ClockToken)).toThrowErrorType(UnresolvedServiceError);
    });

    it('should emit resolutionFailed when unbound', () => {
      const failed: string[] = [];
      container.events.on('resolutionFailed', (event) => failed.push(event.serviceName));

      container.tryResolve(ClockToken);
      expect(() => container.resolve(ClockToken)).toThrow();

      expect(failed).toEqual(['IClock']);
    });

    it('should yield undefined from tryResolve when a factory throws', () => {
      container.registerFactory(ClockToken, () => {
        throw new Error('boom');
      });

      expect(container.tryResolve(ClockToken)).toBeUndefined();
    });

    it('should detect factories that re-enter their own capability', () => {
      const AToken = createToken<object>('IA');
      const BToken = createToken<object>('IB');
      container.registerFactory(AToken, (r) => ({ b: r.resolve(BToken) }));
      container.registerFactory(BToken, (r) => ({ a: r.resolve(AToken) }));

      expect(() => container.resolve(AToken)).toThrow(
        'Circular resolution detected: IA -> IB -> IA',
      );
      expect(() => container.resolve(AToken)).toThrowErrorType(CircularResolutionError);
    });
  });

  // ==========================================================================
  // NAMED / CONDITIONAL / DECORATOR / COLLECTION
  // ==========================================================================

  describe('Named Registrations', () => {
    it('should resolve by capability and name', () => {
      container.registerNamed(ClockToken, 'fixed', FixedClock);
      container.registerNamed(ClockToken, 'other', OtherClock);

      expect(container.resolveNamed(ClockToken, 'fixed').now()).toBe(42);
      expect(container.resolveNamed(ClockToken, 'other').now()).toBe(7);
      expect(container.isRegistered(ClockToken, 'fixed')).toBe(true);
      expect(container.isRegistered(ClockToken)).toBe(false);
    });

    it('should reject an empty name', () => {
      expect(() => container.registerNamed(ClockToken, ' ', FixedClock)).toThrowErrorType(
        InvalidRegistrationError,
      );
    });

    it('should reject a duplicate name under the strict policy', () => {
      container.registerNamed(ClockToken, 'fixed', FixedClock);

      expect(() => container.registerNamed(ClockToken, 'fixed', OtherClock)).toThrow(
        "Service 'IClock' is already registered under name 'fixed'",
      );
    });

    it('should yield undefined from tryResolveNamed for an unknown name', () => {
      container.registerNamed(ClockToken, 'fixed', FixedClock);

      expect(container.tryResolveNamed(ClockToken, 'missing')).toBeUndefined();
    });
  });

  describe('Conditional Registrations', () => {
    it('should register when the condition holds', () => {
      container.registerConditional(ClockToken, () => true, FixedClock);

      expect(container.isRegistered(ClockToken)).toBe(true);
    });

    it('should skip when the condition fails', () => {
      container.registerConditional(ClockToken, () => false, FixedClock);

      expect(container.isRegistered(ClockToken)).toBe(false);
    });

    it('should evaluate the condition against the container', () => {
      container.registerSingleton(ClockToken, FixedClock);
      container.registerConditional(
        GreeterToken,
        (resolver) => resolver.isRegistered(ClockToken),
        PlainGreeter,
      );

      expect(container.resolve(GreeterToken).greet('bo')).toBe('hello bo');
    });
  });

  describe('Decorators', () => {
    it('should wrap the active binding', () => {
      container.registerSingleton(GreeterToken, PlainGreeter);
      container.registerDecorator(GreeterToken, (inner) => ({
        greet: (name: string) => inner.greet(name).toUpperCase(),
      }));

      expect(container.resolve(GreeterToken).greet('bo')).toBe('HELLO BO');
      expect(container.getRegistrationInfo(GreeterToken)?.decoratorCount).toBe(1);
    });

    it('should stack decorators in registration order', () => {
      container.registerSingleton(GreeterToken, PlainGreeter);
      container.registerDecorator(GreeterToken, (inner) => ({
        greet: (name: string) => `[${inner.greet(name)}]`,
      }));
      container.registerDecorator(GreeterToken, (inner) => ({
        greet: (name: string) => `<${inner.greet(name)}>`,
      }));

      expect(container.resolve(GreeterToken).greet('bo')).toBe('<[hello bo]>');
      expect(container.getRegistrationInfo(GreeterToken)?.decoratorCount).toBe(2);
    });

    it('should own and dispose the singleton it wraps', async () => {
      const log: string[] = [];
      let wrapped: DisposableResource | undefined;
      container.registerFactory(
        ResourceToken,
        () => new DisposableResource('inner', log),
        ServiceLifetime.Singleton,
      );
      container.registerDecorator(ResourceToken, (resource) => {
        wrapped = resource;
        return new DisposableResource('outer', log);
      });

      const outer = container.resolve(ResourceToken);
      await container.dispose();

      expect(outer.label).toBe('outer');
      expect(wrapped?.disposed).toBe(true);
      expect(log).toEqual(['outer', 'inner']);
    });

    it('should dispose a singleton once when the decorator returns it unchanged', async () => {
      const log: string[] = [];
      container.registerFactory(
        ResourceToken,
        () => new DisposableResource('inner', log),
        ServiceLifetime.Singleton,
      );
      container.registerDecorator(ResourceToken, (resource) => resource);

      container.resolve(ResourceToken);
      await container.dispose();

      expect(log).toEqual(['inner']);
    });

    it('should fail when nothing is bound', () => {
      expect(() => container.registerDecorator(GreeterToken, (inner) => inner)).toThrow(
        "Cannot decorate 'IGreeter': no registration found",
      );
    });
  });

  describe('Collections', () => {
    it('should resolve every member and the last one by default', () => {
      container.registerCollection(ClockToken, [FixedClock, OtherClock]);

      expect(container.resolveAll(ClockToken).map((clock) => clock.now())).toEqual([42, 7]);
      expect(container.resolve(ClockToken).now()).toBe(7);
      expect(container.getRegistrationInfo(ClockToken)?.collectionSize).toBe(2);
    });

    it('should return the primary binding from resolveAll when there is no collection', () => {
      container.registerSingleton(ClockToken, FixedClock);

      expect(container.resolveAll(ClockToken)).toHaveLength(1);
    });

    it('should return an empty list for unbound capabilities', () => {
      expect(container.resolveAll(ClockToken)).toEqual([]);
    });
  });

  // ==========================================================================
  // INTROSPECTION & VERIFICATION
  // ==========================================================================

  describe('Introspection', () => {
    it('should describe a registration', () => {
      container.registerTransient(ClockToken, FixedClock);

      expect(container.getRegistrationInfo(ClockToken)).toEqual({
        serviceName: 'IClock',
        name: undefined,
        lifetime: ServiceLifetime.Transient,
        implementationName: 'FixedClock',
        hasInstance: false,
        hasFactory: false,
        decoratorCount: 0,
        collectionSize: 0,
      });
    });

    it('should count capabilities and unregister them', () => {
      container.registerSingleton(ClockToken, FixedClock);
      container.registerSingleton(GreeterToken, PlainGreeter);

      expect(container.registrationCount).toBe(2);
      expect(container.unregister(ClockToken)).toBe(true);
      expect(container.unregister(ClockToken)).toBe(false);
      expect(container.getRegisteredTypes()).toEqual([GreeterToken]);
    });

    it('should warn when verifying an empty container', () => {
      expect(container.verify()).toEqual({
        isValid: true,
        errors: [],
        warnings: ['No services registered'],
      });
    });

    it('should report required services that are missing', () => {
      container.registerSingleton(ClockToken, FixedClock);

      const result = container.verify([ClockToken, GreeterToken]);

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(["Required service 'IGreeter' is not registered"]);
    });
  });

  // ==========================================================================
  // CHILD CONTAINERS
  // ==========================================================================

  describe('Child Containers', () => {
    it('should fall back to the parent', () => {
      container.registerSingleton(ClockToken, FixedClock);
      const child = container.createChildContainer();

      expect(child.resolve(ClockToken)).toBe(container.resolve(ClockToken));
      expect(child.isRegistered(ClockToken)).toBe(true);
    });

    it('should log through the parent logger with a single category prefix', () => {
      const logger = new RecordingLogger();
      const parent = new ServiceContainer({ logger });
      const child = parent.createChildContainer();

      child.registerSingleton(ClockToken, FixedClock);

      expect(logger.messages('debug')).toEqual(["[DI] Registered 'IClock' as singleton"]);
    });

    it('should prefer local registrations', () => {
      container.registerSingleton(ClockToken, FixedClock);
      const child = container.createChildContainer();
      child.registerSingleton(ClockToken, OtherClock);

      expect(child.resolve(ClockToken).now()).toBe(7);
      expect(container.resolve(ClockToken).now()).toBe(42);
    });

    it('should not dispose parent singletons', async () => {
      const log: string[] = [];
      container.registerFactory(
        ResourceToken,
        () => new DisposableResource('parent', log),
        ServiceLifetime.Singleton,
      );
      const child = container.createChildContainer();
      const resource = child.resolve(ResourceToken);

      await child.dispose();

      expect(resource.disposed).toBe(false);
      expect(log).toEqual([]);
      expect(container.resolve(ResourceToken)).toBe(resource);
    });
  });

  // ==========================================================================
  // DISPOSAL
  // ==========================================================================

  describe('Disposal', () => {
    it('should dispose owned instances in reverse creation order', async () => {
      const log: string[] = [];
      container.registerFactory(
        ResourceToken,
        () => new DisposableResource('first', log),
        ServiceLifetime.Singleton,
      );
      container.registerFactory(
        OtherResourceToken,
        () => new DisposableResource('second', log),
        ServiceLifetime.Singleton,
      );
      container.resolve(ResourceToken);
      container.resolve(OtherResourceToken);

      await container.dispose();

      expect(log).toEqual(['second', 'first']);
      expect(container.isDisposed).toBe(true);
    });

    it('should leave externally owned instances alone', async () => {
      const log: string[] = [];
      const resource = new DisposableResource('external', log);
      container.registerInstance(ResourceToken, resource, { externallyOwned: true });
      container.resolve(ResourceToken);

      await container.dispose();

      expect(resource.disposed).toBe(false);
    });

    it('should reject use after disposal', async () => {
      await container.dispose();

      expect(() => container.registerSingleton(ClockToken, FixedClock)).toThrowErrorType(
        ContainerDisposedError,
      );
      expect(() => container.resolve(ClockToken)).toThrowErrorType(ContainerDisposedError);
      expect(container.tryResolve(ClockToken)).toBeUndefined();
    });

    it('should report disposal failures after disposing the rest', async () => {
      const log: string[] = [];
      container.registerFactory(
        ResourceToken,
        () => new DisposableResource('kept', log),
        ServiceLifetime.Singleton,
      );
      container.registerFactory(
        BrokenToken,
        () => ({
          dispose: () => {
            throw new Error('dispose failed');
          },
        }),
        ServiceLifetime.Singleton,
      );
      container.resolve(ResourceToken);
      container.resolve(BrokenToken);

      await expect(container.dispose()).rejects.toThrow('1 service(s) failed to dispose');
      expect(log).toEqual(['kept']);
    });
  });
});
