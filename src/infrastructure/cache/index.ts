/**
 * @canopy/core - Cache Module
 */

export { ServiceCache } from './ServiceCache';

export type { CacheStats, ServiceCacheEntry } from './ServiceCache';
