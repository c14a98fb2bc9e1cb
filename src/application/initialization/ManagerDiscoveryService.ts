/**
 * @canopy/core - Manager Discovery
 *
 * Collects managers from explicit registrations and, when enabled, from a
 * scan of the live session. Deduplicates by concrete type (first found
 * wins; plain-object managers count as their own type) and orders by
 * priority, stable on discovery order.
 */

import { EventHub } from '../../domain/events';
import {
  IManager,
  ManagerCategory,
  ManagerType,
  ManagerTypeKey,
  categoryOf,
  isManager,
  managerTypeNameOf,
  managerTypeOf,
} from '../../domain/managers';
import type { ISessionScanner } from '../../domain/session';
import { describeError } from '../../domain/exceptions';
import { ILogger, silentLogger } from '../../infrastructure/logging';
import type { DiscoveryResult, InitializerEvents, ManagerDescriptor } from './types';

export interface ManagerDiscoveryOptions {
  /** Scan the session; explicit registrations are always included */
  autoDiscover?: boolean;
  session?: ISessionScanner;
  events?: EventHub<InitializerEvents>;
  logger?: ILogger;
}

function describe(manager: IManager, discoveryIndex: number): ManagerDescriptor {
  return {
    type: managerTypeOf(manager),
    typeName: managerTypeNameOf(manager),
    name: manager.name,
    priority: manager.priority,
    category: categoryOf(manager),
    manager,
    discoveryIndex,
    get isInitialized() {
      return manager.isInitialized;
    },
  };
}

/**
 * Sort by priority; equal priorities keep discovery order
 */
export function sortByPriority(descriptors: readonly ManagerDescriptor[]): ManagerDescriptor[] {
  return [...descriptors].sort(
    (a, b) => a.priority - b.priority || a.discoveryIndex - b.discoveryIndex,
  );
}

export class ManagerDiscoveryService {
  private readonly registered: IManager[] = [];
  private readonly events: EventHub<InitializerEvents>;
  private readonly logger: ILogger;
  private readonly autoDiscover: boolean;
  private readonly session?: ISessionScanner;
  private descriptors: ManagerDescriptor[] = [];

  constructor(options: ManagerDiscoveryOptions = {}) {
    this.autoDiscover = options.autoDiscover ?? true;
    this.session = options.session;
    this.events = options.events ?? new EventHub<InitializerEvents>();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Add a manager explicitly; picked up by every later discovery pass
   */
  register(manager: IManager): this {
    if (!this.registered.includes(manager)) {
      this.registered.push(manager);
    }
    return this;
  }

  unregister(manager: IManager): boolean {
    const index = this.registered.indexOf(manager);
    if (index === -1) return false;
    this.registered.splice(index, 1);
    return true;
  }

  /**
   * Run a fresh discovery pass, replacing the previous result
   */
  discoverAllManagers(): DiscoveryResult {
    const started = Date.now();
    const seen = new Set<ManagerTypeKey>();
    const found: ManagerDescriptor[] = [];
    const duplicates: string[] = [];

    const consider = (candidate: IManager) => {
      const type = managerTypeOf(candidate);
      if (seen.has(type)) {
        const typeName = managerTypeNameOf(candidate);
        duplicates.push(typeName);
        this.logger.warn(`Duplicate manager of type ${typeName} ignored`);
        return;
      }
      seen.add(type);
      found.push(describe(candidate, found.length));
    };

    try {
      for (const manager of this.registered) {
        consider(manager);
      }

      if (this.autoDiscover && this.session) {
        for (const candidate of this.session.scan()) {
          if (isManager(candidate)) consider(candidate);
        }
      }
    } catch (error) {
      this.descriptors = [];
      const errorMessage = `Manager discovery failed: ${describeError(error)}`;
      this.logger.error(errorMessage);
      return { success: false, descriptors: [], duplicates, durationMs: Date.now() - started, errorMessage };
    }

    this.descriptors = sortByPriority(found);

    for (const descriptor of this.descriptors) {
      this.logger.debug(
        `Discovered ${descriptor.name} (${descriptor.category}, priority ${descriptor.priority})`,
      );
      this.events.emit('managerDiscovered', { descriptor });
    }

    this.logger.info(`Discovered ${this.descriptors.length} manager(s)`);
    return {
      success: true,
      descriptors: [...this.descriptors],
      duplicates,
      durationMs: Date.now() - started,
    };
  }

  /**
   * Managers from the last pass
   */
  getDiscoveredManagers(): readonly ManagerDescriptor[] {
    return this.descriptors;
  }

  /**
   * Managers of one category from the last pass, in priority order
   */
  getManagersByCategory(category: ManagerCategory): ManagerDescriptor[] {
    return this.descriptors.filter((descriptor) => descriptor.category === category);
  }

  getManager<T extends IManager>(type: ManagerType<T>): T | undefined {
    for (const descriptor of this.descriptors) {
      const manager = descriptor.manager;
      if (manager instanceof type) return manager;
    }
    return undefined;
  }

  get discoveredCount(): number {
    return this.descriptors.length;
  }
}
