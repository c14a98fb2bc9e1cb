/**
 * @canopy/core - Bootstrap Module
 */

export { Bootstrapper, CAPABILITY_PREFIX, AUTO_WIRE_SUFFIXES } from './Bootstrapper';
export type { BootstrapperOptions, BootstrapResult } from './Bootstrapper';

export {
  ServiceHealth,
  WARNING_CRITICAL_FAILURE_LIMIT,
  evaluateHealth,
  createHealthReport,
  formatHealthReport,
  writeHealthReport,
  loadDefaultChecklist,
} from './healthReport';
export type {
  ServiceCheck,
  ServiceValidationResult,
  ServiceHealthReport,
} from './healthReport';

export {
  TimeServiceToken,
  PersistenceServiceToken,
  EventServiceToken,
  SettingsServiceToken,
  ServiceContainerToken,
  CultivationManagerToken,
  GeneticsServiceToken,
  EconomyManagerToken,
  ProgressionManagerToken,
  UIManagerToken,
  AudioServiceToken,
  CapabilityCatalog,
  NullTimeService,
  NullPersistenceService,
  NullEventService,
  NullSettingsService,
  CoreServicesModule,
  isNullImplementation,
} from './coreServices';
export type {
  ITimeService,
  IPersistenceService,
  IEventService,
  ISettingsService,
  EventHandler,
  SettingValue,
} from './coreServices';
