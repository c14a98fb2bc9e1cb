/**
 * @canopy/core - Registration Store
 *
 * Storage and lookup of bindings per capability. No resolution behavior.
 */

import type {
  ServiceIdentifier,
  ServiceRegistration,
} from './IDependencyInjection';

/**
 * Reinterpret a stored value as the capability type of its identifier
 *
 * Values only enter the store and the locator cache through generic
 * methods taking a `ServiceIdentifier<T>` together with a `T`, so whatever
 * is read back under the same identifier has that type.
 */
export function asCapability<T>(_identifier: ServiceIdentifier<T>, value: unknown): T {
  return value as T;
}

interface RegistrationSlot {
  primary?: ServiceRegistration<unknown>;
  named: Map<string, ServiceRegistration<unknown>>;
  collection: ServiceRegistration<unknown>[];
}

/**
 * Per-capability registration slots
 *
 * Each capability has at most one active (primary) binding, any number of
 * named bindings, and an ordered collection.
 */
export class RegistrationStore {
  private readonly slots = new Map<ServiceIdentifier<unknown>, RegistrationSlot>();

  getPrimary<T>(identifier: ServiceIdentifier<T>): ServiceRegistration<T> | undefined {
    return this.narrow(identifier, this.slots.get(identifier)?.primary);
  }

  getNamed<T>(identifier: ServiceIdentifier<T>, name: string): ServiceRegistration<T> | undefined {
    return this.narrow(identifier, this.slots.get(identifier)?.named.get(name));
  }

  getCollection<T>(identifier: ServiceIdentifier<T>): ServiceRegistration<T>[] {
    const collection = this.slots.get(identifier)?.collection ?? [];
    const result: ServiceRegistration<T>[] = [];
    for (const registration of collection) {
      const narrowed = this.narrow(identifier, registration);
      if (narrowed) result.push(narrowed);
    }
    return result;
  }

  /**
   * Active binding: the primary one, else the last collection member
   */
  getActive<T>(identifier: ServiceIdentifier<T>): ServiceRegistration<T> | undefined {
    const slot = this.slots.get(identifier);
    if (!slot) return undefined;
    return this.narrow(identifier, slot.primary ?? slot.collection[slot.collection.length - 1]);
  }

  /**
   * @returns The registration that was replaced, if any
   */
  setPrimary<T>(
    identifier: ServiceIdentifier<T>,
    registration: ServiceRegistration<T>,
  ): ServiceRegistration<T> | undefined {
    const slot = this.slotFor(identifier);
    const previous = slot.primary;
    slot.primary = registration;
    return this.narrow(identifier, previous);
  }

  setNamed<T>(
    identifier: ServiceIdentifier<T>,
    name: string,
    registration: ServiceRegistration<T>,
  ): ServiceRegistration<T> | undefined {
    const slot = this.slotFor(identifier);
    const previous = slot.named.get(name);
    slot.named.set(name, registration);
    return this.narrow(identifier, previous);
  }

  appendToCollection<T>(
    identifier: ServiceIdentifier<T>,
    registration: ServiceRegistration<T>,
  ): number {
    const slot = this.slotFor(identifier);
    slot.collection.push(registration);
    return slot.collection.length;
  }

  /**
   * Has an active binding (or a named one when `name` is given)
   */
  has(identifier: ServiceIdentifier<unknown>, name?: string): boolean {
    const slot = this.slots.get(identifier);
    if (!slot) return false;
    if (name !== undefined) return slot.named.has(name);
    return slot.primary !== undefined || slot.collection.length > 0;
  }

  delete(identifier: ServiceIdentifier<unknown>): ServiceRegistration<unknown>[] {
    const slot = this.slots.get(identifier);
    if (!slot) return [];
    this.slots.delete(identifier);
    return collectRegistrations(slot);
  }

  identifiers(): ServiceIdentifier<unknown>[] {
    return Array.from(this.slots.keys());
  }

  /**
   * Every stored registration, across all slots
   */
  all(): ServiceRegistration<unknown>[] {
    return Array.from(this.slots.values(), collectRegistrations).flat();
  }

  collectionSize(identifier: ServiceIdentifier<unknown>): number {
    return this.slots.get(identifier)?.collection.length ?? 0;
  }

  clear(): void {
    this.slots.clear();
  }

  get size(): number {
    return this.slots.size;
  }

  private slotFor(identifier: ServiceIdentifier<unknown>): RegistrationSlot {
    let slot = this.slots.get(identifier);
    if (!slot) {
      slot = { named: new Map(), collection: [] };
      this.slots.set(identifier, slot);
    }
    return slot;
  }

  // Slots are keyed by identifier and only written by the generic setters
  // above, so a registration read back under `identifier` is a ServiceRegistration<T>.
  private narrow<T>(
    _identifier: ServiceIdentifier<T>,
    registration: ServiceRegistration<unknown> | undefined,
  ): ServiceRegistration<T> | undefined {
    return registration as ServiceRegistration<T> | undefined;
  }
}

function collectRegistrations(slot: RegistrationSlot): ServiceRegistration<unknown>[] {
  const result: ServiceRegistration<unknown>[] = [];
  if (slot.primary) result.push(slot.primary);
  result.push(...slot.named.values(), ...slot.collection);
  return result;
}
