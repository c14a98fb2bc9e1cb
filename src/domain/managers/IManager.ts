/**
 * @fileoverview Manager capability - long-lived subsystem contracts
 *
 * @packageDocumentation
 * @module @canopy/core/domain/managers
 *
 * A manager is any long-lived subsystem object (cultivation, genetics,
 * economy, UI...) that the bring-up pipeline discovers, orders and
 * initializes. Managers are owned by the hosting application; the core
 * only drives their lifecycle.
 *
 * ## Ordering
 *
 * Managers are grouped by {@link ManagerCategory} into the sequential
 * initialization phases, and within a phase ordered by
 * {@link ManagerPriority}:
 *
 * ```
 * Core → Domain → Progression → UI
 *   Critical → High → Normal → Low
 * ```
 *
 * @example
 * ```typescript
 * class EconomyManager implements IManager, IValidatable {
 *   readonly name = 'Economy';
 *   readonly priority = ManagerPriority.Normal;
 *   readonly category = ManagerCategory.Domain;
 *   isInitialized = false;
 *
 *   async initialize(): Promise<void> {
 *     await this.loadPrices();
 *     this.isInitialized = true;
 *   }
 *
 *   shutdown(): void {
 *     this.isInitialized = false;
 *   }
 *
 *   validate(): ManagerValidationResult {
 *     return this.prices.size > 0
 *       ? { isValid: true, errors: [] }
 *       : { isValid: false, errors: ['price table is empty'] };
 *   }
 * }
 * ```
 */

// ============================================================================
// Priority & Category
// ============================================================================

/**
 * Declared initialization priority; lower values initialize first
 */
export enum ManagerPriority {
  Critical = 0,
  High = 1,
  Normal = 2,
  Low = 3,
}

/**
 * Phase a manager belongs to
 */
export enum ManagerCategory {
  Core = 'Core',
  Domain = 'Domain',
  Progression = 'Progression',
  UI = 'UI',
}

// ============================================================================
// Capabilities
// ============================================================================

/**
 * Manager capability
 *
 * Anything the discovery service enumerates must expose these members.
 */
export interface IManager {
  /**
   * Display name used in logs, events and reports
   */
  readonly name: string;

  /**
   * Declared priority inside the manager's phase
   */
  readonly priority: ManagerPriority;

  /**
   * Phase the manager belongs to
   *
   * @remarks
   * Managers that do not declare a category are initialized with the
   * Core phase.
   */
  readonly category?: ManagerCategory;

  /**
   * True once `initialize` has completed successfully
   */
  readonly isInitialized: boolean;

  /**
   * Bring the manager up
   *
   * @param signal - Aborted when bring-up is cancelled or an attempt times out
   * @remarks
   * Throwing, or returning without setting `isInitialized`, counts as a
   * failed attempt and may be retried.
   */
  initialize(signal?: AbortSignal): void | Promise<void>;

  /**
   * Release resources; called in reverse initialization order
   */
  shutdown(): void | Promise<void>;
}

/**
 * Concrete manager type, used as the identity of a manager
 */
export type ManagerType<T extends IManager = IManager> = abstract new (
  ...args: never[]
) => T;

/**
 * Structured result of a manager's custom validation
 */
export interface ManagerValidationResult {
  isValid: boolean;
  errors: string[];
}

/**
 * Custom validation hook consulted after bring-up
 */
export interface IValidatable {
  validate(): ManagerValidationResult;
}

/**
 * Dependency declaration hook
 *
 * Dependencies are other manager types that must be present in the same
 * session. They feed cycle and missing-dependency detection.
 */
export interface IDependencyDeclaring {
  getDependencies(): readonly ManagerType[];
}

// ============================================================================
// Type Guards
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Check whether an arbitrary live object exposes the manager capability
 */
export function isManager(value: unknown): value is IManager {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.priority === 'number' &&
    typeof value.isInitialized === 'boolean' &&
    typeof value.initialize === 'function' &&
    typeof value.shutdown === 'function'
  );
}

export function isValidatable(value: unknown): value is IValidatable {
  return isRecord(value) && typeof value.validate === 'function';
}

export function declaresDependencies(
  value: unknown,
): value is IDependencyDeclaring {
  return isRecord(value) && typeof value.getDependencies === 'function';
}

/**
 * Category a manager is initialized in
 */
export function categoryOf(manager: IManager): ManagerCategory {
  return manager.category ?? ManagerCategory.Core;
}

/**
 * Runtime identity of a manager
 *
 * The concrete class for class-based managers. Plain-object managers, whose
 * constructor is `Object` or absent, are their own identity.
 */
export type ManagerTypeKey = object;

export function managerTypeOf(manager: IManager): ManagerTypeKey {
  const constructor: unknown = Reflect.get(manager, 'constructor');
  return typeof constructor === 'function' && constructor !== Object ? constructor : manager;
}

/**
 * Display name of a manager's identity: the class name, or the manager's
 * own name for plain-object managers
 */
export function managerTypeNameOf(manager: IManager): string {
  const type = managerTypeOf(manager);
  return typeof type === 'function' ? type.name : manager.name;
}
