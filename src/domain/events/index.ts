/**
 * @module @canopy/core/domain/events
 * @description Typed event hub exports
 */

export { EventHub } from './EventHub';

export type {
  EventListener,
  Unsubscribe,
  ListenerErrorHandler,
  IEventSource,
} from './EventHub';
