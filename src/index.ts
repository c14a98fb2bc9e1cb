/**
 * @fileoverview @canopy/core - Session runtime for simulation games
 * @description
 * Canopy Core wires the services of a play session and brings its
 * managers up in ordered phases.
 *
 * ## Architecture Layers
 *
 * - **Domain**: manager capability, error taxonomy, typed events, live session
 * - **Application**: service container, locator, builder, bootstrapper,
 *   phased initializer and host
 * - **Infrastructure**: logging, retry/timeout, resolution cache, env config
 *
 * @packageDocumentation
 * @module @canopy/core
 * @version 1.0.0
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================

export const VERSION = '0.1.0';
