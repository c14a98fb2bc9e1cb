/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Cross-cutting concerns shared by the container and the bring-up pipeline:
 *
 * - **Logging**: category-scoped logger abstraction
 * - **Resilience**: bounded retry, enforced timeouts, abortable delays
 * - **Cache**: LRU resolution cache with hit counting
 * - **Config**: typed environment readers
 *
 * @packageDocumentation
 * @module @canopy/core/infrastructure
 */

// Category-scoped logging
export * from './logging';

// Retry, timeout and cancellation helpers
export * from './resilience';

// Resolution cache
export * from './cache';

// Environment configuration readers
export * from './config';
