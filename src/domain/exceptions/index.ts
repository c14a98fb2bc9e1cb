/**
 * @canopy/core - Exception Module
 */

export {
  CanopyError,
  // Container
  DuplicateRegistrationError,
  UnresolvedServiceError,
  CircularResolutionError,
  ServiceNotFoundError,
  ContainerDisposedError,
  InvalidRegistrationError,
  // Builder
  ModuleConfigurationError,
  ContainerValidationError,
  // Bring-up
  NoManagersDiscoveredError,
  ManagerInitializationError,
  DependencyCycleError,
  MissingDependencyError,
  SystemValidationError,
  InitializationInProgressError,
  InitializationCancelledError,
  OperationTimeoutError,
  InvalidStateTransitionError,
  // Host
  CriticalServicesMissingError,
  HostStateError,
  ConfigurationError,
  describeError,
} from './exceptions';

export type { ModuleStage } from './exceptions';
