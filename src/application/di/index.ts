/**
 * @canopy/core - Dependency Injection Module
 */

export {
  ServiceLifetime,
  DuplicateRegistrationPolicy,
  InjectionToken,
  createToken,
  identifierName,
  isServiceConstructor,
  isDisposable,
  Injectable,
  getInjectableMetadata,
} from './IDependencyInjection';

export type {
  ServiceConstructor,
  DefaultConstructor,
  ServiceIdentifier,
  IServiceResolver,
  IServiceContainer,
  ServiceFactory,
  ServiceDecorator,
  RegistrationCondition,
  BindingSource,
  BindingInput,
  ServiceRegistrationOptions,
  ServiceRegistration,
  RegistrationInfo,
  ContainerVerificationResult,
  ContainerEvents,
  ServiceRegisteredEvent,
  ServiceResolvedEvent,
  ResolutionFailedEvent,
  IDisposable,
  InjectableMetadata,
} from './IDependencyInjection';

export { RegistrationStore } from './RegistrationStore';

export { ServiceContainer } from './ServiceContainer';
export type { ServiceContainerOptions } from './ServiceContainer';

export { ServiceLocator, LocatorScope } from './ServiceLocator';
export type {
  ServiceLocatorOptions,
  LocatorMetrics,
  LocatorEvents,
  ServiceDiscoveredEvent,
} from './ServiceLocator';

export { ServiceModuleBase } from './IServiceModule';
export type { IServiceModule } from './IServiceModule';

export { ContainerBuilder } from './ContainerBuilder';
export type {
  ContainerBuilderOptions,
  ContainerAction,
  BuildOptions,
} from './ContainerBuilder';
