/**
 * @canopy/core - Initialization Module
 */

export { GameSystemInitializer, CATEGORY_STAGES } from './GameSystemInitializer';
export type { GameSystemInitializerOptions, InitializeOptions } from './GameSystemInitializer';

export { ManagerDiscoveryService, sortByPriority } from './ManagerDiscoveryService';
export type { ManagerDiscoveryOptions } from './ManagerDiscoveryService';

export { PhaseExecutionService } from './PhaseExecutionService';
export type { PhaseExecutionOptions } from './PhaseExecutionService';

export { SystemValidationService, CORE_SERVICE_IDENTIFIERS } from './SystemValidationService';
export type { SystemValidationOptions, ValidateSystemOptions } from './SystemValidationService';

export {
  DEFAULT_INITIALIZER_OPTIONS,
  INITIALIZER_ENV,
  resolveInitializerOptions,
  loadInitializerOptionsFromEnv,
} from './options';

export { InitializationPhase, InitializerState, ValidationFailurePolicy } from './types';
export type {
  InitializerOptions,
  ManagerDescriptor,
  DiscoveryResult,
  ManagerInitializationOutcome,
  PhaseResult,
  ManagerValidationReport,
  DependencyValidationReport,
  ContainerValidationReport,
  ValidationSummary,
  InitializationResult,
  InitializationStatistics,
  InitializerEvents,
} from './types';
