/**
 * @module @canopy/core/domain/managers
 * @description Manager capability exports
 */

export {
  ManagerPriority,
  ManagerCategory,
  isManager,
  isValidatable,
  declaresDependencies,
  categoryOf,
  managerTypeOf,
  managerTypeNameOf,
} from './IManager';

export type {
  IManager,
  ManagerType,
  ManagerTypeKey,
  ManagerValidationResult,
  IValidatable,
  IDependencyDeclaring,
} from './IManager';

export { ManagerBase } from './ManagerBase';
