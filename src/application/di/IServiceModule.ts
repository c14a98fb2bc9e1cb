/**
 * @canopy/core - Service Modules
 *
 * A module is a cohesive bundle of related registrations. The builder runs
 * modules in two passes, configure all then initialize all, so a module's
 * initialize step may rely on bindings created by any sibling module.
 */

import type {
  IServiceContainer,
  ServiceIdentifier,
} from './IDependencyInjection';

/**
 * Service module contract
 */
export interface IServiceModule {
  /** Module name used in logs and errors */
  readonly name: string;

  readonly version?: string;

  /**
   * Capabilities that must be bound once every module has configured
   */
  readonly requiredServices?: ReadonlyArray<ServiceIdentifier<unknown>>;

  /**
   * Upper bound for `initialize`, in milliseconds
   *
   * @remarks
   * Enforced by the builder: an initialize step still pending when the
   * timeout elapses fails the build with ModuleConfigurationError.
   */
  readonly initializationTimeoutMs?: number;

  /**
   * First pass: add registrations
   */
  configureServices(container: IServiceContainer): void;

  /**
   * Second pass: warm up or cross-wire services
   *
   * @param signal - Aborted on timeout or when the build is cancelled
   */
  initialize(container: IServiceContainer, signal: AbortSignal): void | Promise<void>;

  /**
   * Module-specific checks run by `validate()`
   *
   * @returns Problems found; empty when valid
   */
  validateServices?(container: IServiceContainer): string[];
}

/**
 * Base class with no-op initialize and required-service validation
 */
export abstract class ServiceModuleBase implements IServiceModule {
  abstract readonly name: string;
  readonly version: string = '1.0.0';
  readonly requiredServices: ReadonlyArray<ServiceIdentifier<unknown>> = [];
  readonly initializationTimeoutMs?: number;

  abstract configureServices(container: IServiceContainer): void;

  initialize(_container: IServiceContainer, _signal: AbortSignal): void | Promise<void> {}

  validateServices(container: IServiceContainer): string[] {
    return this.requiredServices
      .filter((identifier) => !container.isRegistered(identifier))
      .map((identifier) => `${this.name}: required service '${identifier.name}' is not registered`);
  }
}
