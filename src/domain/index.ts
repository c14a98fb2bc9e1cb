/**
 * @module @canopy/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';

// ============================================================================
// Events
// ============================================================================

export * from './events';

// ============================================================================
// Managers
// ============================================================================

/**
 * Manager exports
 *
 * @example
 * ```typescript
 * import {
 *   ManagerBase,
 *   ManagerPriority,
 *   ManagerCategory
 * } from '@canopy/core/domain';
 *
 * class WeatherManager extends ManagerBase {
 *   readonly name = 'Weather';
 *   readonly priority = ManagerPriority.High;
 *   readonly category = ManagerCategory.Domain;
 *
 *   protected async onInitialize(): Promise<void> {
 *     await this.loadClimateTables();
 *   }
 * }
 * ```
 */
export * from './managers';

// ============================================================================
// Session
// ============================================================================

export * from './session';
