/**
 * @canopy/core - Hosting Module
 *
 * Session lifecycle: bootstrap, bring-up and graceful shutdown
 */

export type { HostOptions, HostLifecycle, HostStatus, HostStartResult } from './host';

export { GameHost, createHost } from './host';
