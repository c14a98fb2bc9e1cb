/**
 * @canopy/core - Core Infrastructure Services
 *
 * Capabilities every session needs (time, persistence, eventing, settings)
 * and their null implementations. The core treats them as opaque bindings;
 * the null implementations keep bring-up working when the host has not
 * supplied real ones, and are reported as such in the health report.
 */

import {
  IServiceContainer,
  InjectionToken,
  ServiceIdentifier,
  createToken,
} from '../di/IDependencyInjection';
import { ServiceModuleBase } from '../di/IServiceModule';

// ============================================================================
// Contracts
// ============================================================================

export interface ITimeService {
  readonly timeScale: number;
  now(): number;
  setTimeScale(scale: number): void;
}

export interface IPersistenceService {
  save(key: string, data: unknown): Promise<void>;
  load(key: string): Promise<unknown>;
  exists(key: string): Promise<boolean>;
}

export type EventHandler = (payload: unknown) => void;

export interface IEventService {
  publish(eventName: string, payload?: unknown): void;
  subscribe(eventName: string, handler: EventHandler): () => void;
}

export type SettingValue = string | number | boolean;

export interface ISettingsService {
  getString(key: string, defaultValue: string): string;
  getNumber(key: string, defaultValue: number): number;
  getBoolean(key: string, defaultValue: boolean): boolean;
  set(key: string, value: SettingValue): void;
}

// ============================================================================
// Tokens
// ============================================================================

export const TimeServiceToken = createToken<ITimeService>('ITimeService');
export const PersistenceServiceToken = createToken<IPersistenceService>('IPersistenceService');
export const EventServiceToken = createToken<IEventService>('IEventService');
export const SettingsServiceToken = createToken<ISettingsService>('ISettingsService');
export const ServiceContainerToken = createToken<IServiceContainer>('IServiceContainer');

/**
 * Optional gameplay capabilities checked by the bootstrap checklist
 */
export const CultivationManagerToken = createToken<object>('ICultivationManager');
export const GeneticsServiceToken = createToken<object>('IGeneticsService');
export const EconomyManagerToken = createToken<object>('IEconomyManager');
export const ProgressionManagerToken = createToken<object>('IProgressionManager');
export const UIManagerToken = createToken<object>('IUIManager');
export const AudioServiceToken = createToken<object>('IAudioService');

/**
 * Capability name to identifier, for data-driven checklists
 */
export const CapabilityCatalog: ReadonlyMap<string, ServiceIdentifier<unknown>> = new Map<
  string,
  InjectionToken<unknown>
>(
  [
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
  ].map((token): [string, InjectionToken<unknown>] => [token.name, token]),
);

// ============================================================================
// Null Implementations
// ============================================================================

export class NullTimeService implements ITimeService {
  timeScale = 1;

  now(): number {
    return Date.now();
  }

  setTimeScale(scale: number): void {
    this.timeScale = scale;
  }
}

export class NullPersistenceService implements IPersistenceService {
  async save(_key: string, _data: unknown): Promise<void> {}

  async load(_key: string): Promise<unknown> {
    return undefined;
  }

  async exists(_key: string): Promise<boolean> {
    return false;
  }
}

export class NullEventService implements IEventService {
  publish(_eventName: string, _payload?: unknown): void {}

  subscribe(_eventName: string, _handler: EventHandler): () => void {
    return () => {};
  }
}

export class NullSettingsService implements ISettingsService {
  getString(_key: string, defaultValue: string): string {
    return defaultValue;
  }

  getNumber(_key: string, defaultValue: number): number {
    return defaultValue;
  }

  getBoolean(_key: string, defaultValue: boolean): boolean {
    return defaultValue;
  }

  set(_key: string, _value: SettingValue): void {}
}

/**
 * A bound instance whose class follows the null-object naming convention
 */
export function isNullImplementation(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    value.constructor.name.startsWith('Null')
  );
}

// ============================================================================
// Module
// ============================================================================

/**
 * Registers the core infrastructure services, only where absent
 *
 * Add it after the host's own modules so explicit registrations win.
 */
export class CoreServicesModule extends ServiceModuleBase {
  readonly name = 'CoreServices';

  configureServices(container: IServiceContainer): void {
    if (!container.isRegistered(TimeServiceToken)) {
      container.registerSingleton(TimeServiceToken, NullTimeService);
    }
    if (!container.isRegistered(PersistenceServiceToken)) {
      container.registerSingleton(PersistenceServiceToken, NullPersistenceService);
    }
    if (!container.isRegistered(EventServiceToken)) {
      container.registerSingleton(EventServiceToken, NullEventService);
    }
    if (!container.isRegistered(SettingsServiceToken)) {
      container.registerSingleton(SettingsServiceToken, NullSettingsService);
    }
    if (!container.isRegistered(ServiceContainerToken)) {
      container.registerInstance(ServiceContainerToken, container, { externallyOwned: true });
    }
  }
}
