/**
 * @module @canopy/core/application
 * @description Application layer exports
 */

// ============================================================================
// Dependency Injection
// ============================================================================

export * from './di';

// ============================================================================
// Bootstrap & Health
// ============================================================================

export * from './bootstrap';

// ============================================================================
// Manager Bring-up
// ============================================================================

export * from './initialization';

// ============================================================================
// Host
// ============================================================================

export * from './host';
