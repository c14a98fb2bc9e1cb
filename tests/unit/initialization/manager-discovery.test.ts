/**
 * @fileoverview Unit tests for ManagerDiscoveryService
 */

import {
  EventHub,
  InitializerEvents,
  ManagerCategory,
  ManagerDiscoveryService,
  ManagerPriority,
  SessionRegistry,
} from '../../../src';
import {
  AlphaManager,
  BetaManager,
  GammaManager,
  createPlainManager,
} from '../../helpers/managers';

describe('ManagerDiscoveryService', () => {
  // ==========================================================================
  // ORDERING
  // ==========================================================================

  describe('Ordering', () => {
    it('should combine registrations with the session scan, sorted by priority', () => {
      const session = new SessionRegistry().add(
        new AlphaManager({ name: 'Alpha', priority: ManagerPriority.Critical }),
        { name: 'not a manager' },
        new GammaManager({ name: 'Gamma', priority: ManagerPriority.Normal }),
      );
      const discovery = new ManagerDiscoveryService({ session }).register(
        new BetaManager({ name: 'Beta', priority: ManagerPriority.Low }),
      );

      const result = discovery.discoverAllManagers();

      expect(result.success).toBe(true);
      expect(result.descriptors.map((d) => d.name)).toEqual(['Alpha', 'Gamma', 'Beta']);
      expect(result.descriptors.map((d) => d.discoveryIndex)).toEqual([1, 2, 0]);
    });

    it('should keep discovery order for equal priorities', () => {
      const discovery = new ManagerDiscoveryService()
        .register(new BetaManager({ name: 'Beta' }))
        .register(new AlphaManager({ name: 'Alpha' }));

      const names = discovery.discoverAllManagers().descriptors.map((d) => d.name);

      expect(names).toEqual(['Beta', 'Alpha']);
    });

    it('should place managers without a category in Core', () => {
      const discovery = new ManagerDiscoveryService()
        .register(new AlphaManager({ name: 'Alpha' }))
        .register(new BetaManager({ name: 'Beta', category: ManagerCategory.UI }));

      discovery.discoverAllManagers();

      expect(discovery.getManagersByCategory(ManagerCategory.Core).map((d) => d.name)).toEqual([
        'Alpha',
      ]);
      expect(discovery.getManagersByCategory(ManagerCategory.UI).map((d) => d.name)).toEqual([
        'Beta',
      ]);
    });
  });

  // ==========================================================================
  // DEDUPLICATION
  // ==========================================================================

  describe('Deduplication', () => {
    it('should keep the first instance of each concrete type', () => {
      const first = new AlphaManager({ name: 'Alpha one' });
      const second = new AlphaManager({ name: 'Alpha two' });
      const discovery = new ManagerDiscoveryService({
        session: new SessionRegistry().add(second),
      }).register(first);

      const result = discovery.discoverAllManagers();

      expect(result.descriptors).toHaveLength(1);
      expect(result.descriptors[0].manager).toBe(first);
      expect(result.duplicates).toEqual(['AlphaManager']);
    });

    it('should keep every distinct plain-object manager', () => {
      const discovery = new ManagerDiscoveryService()
        .register(createPlainManager('Weather'))
        .register(createPlainManager('Economy'));

      const result = discovery.discoverAllManagers();

      expect(result.descriptors.map((d) => d.typeName)).toEqual(['Weather', 'Economy']);
      expect(result.duplicates).toEqual([]);
    });

    it('should drop a plain-object manager found again by the scan', () => {
      const weather = createPlainManager('Weather');
      const discovery = new ManagerDiscoveryService({
        session: new SessionRegistry().add(weather),
      }).register(weather);

      const result = discovery.discoverAllManagers();

      expect(result.descriptors).toHaveLength(1);
      expect(result.duplicates).toEqual(['Weather']);
    });

    it('should accept a manager without a prototype', () => {
      const bare = createPlainManager('Bare');
      Object.setPrototypeOf(bare, null);

      const result = new ManagerDiscoveryService().register(bare).discoverAllManagers();

      expect(result.success).toBe(true);
      expect(result.descriptors.map((d) => d.typeName)).toEqual(['Bare']);
    });
  });

  // ==========================================================================
  // SESSION SCAN
  // ==========================================================================

  describe('Session Scan', () => {
    it('should ignore the session when auto-discovery is off', () => {
      const discovery = new ManagerDiscoveryService({
        autoDiscover: false,
        session: new SessionRegistry().add(new AlphaManager({ name: 'Alpha' })),
      });

      expect(discovery.discoverAllManagers().descriptors).toEqual([]);
    });

    it('should report a failing scan without throwing', () => {
      const discovery = new ManagerDiscoveryService({
        session: {
          scan: () => {
            throw new Error('scan broke');
          },
        },
      });

      const result = discovery.discoverAllManagers();

      expect(result.success).toBe(false);
      expect(result.errorMessage).toBe('Manager discovery failed: scan broke');
      expect(discovery.discoveredCount).toBe(0);
    });
  });

  // ==========================================================================
  // LOOKUP & EVENTS
  // ==========================================================================

  describe('Lookup and Events', () => {
    it('should find a discovered manager by type', () => {
      const beta = new BetaManager({ name: 'Beta' });
      const discovery = new ManagerDiscoveryService()
        .register(new AlphaManager({ name: 'Alpha' }))
        .register(beta);
      discovery.discoverAllManagers();

      expect(discovery.getManager(BetaManager)).toBe(beta);
      expect(discovery.getManager(GammaManager)).toBeUndefined();
    });

    it('should emit managerDiscovered in priority order', () => {
      const events = new EventHub<InitializerEvents>();
      const seen: string[] = [];
      events.on('managerDiscovered', ({ descriptor }) => seen.push(descriptor.name));

      new ManagerDiscoveryService({ events })
        .register(new AlphaManager({ name: 'Alpha', priority: ManagerPriority.Low }))
        .register(new BetaManager({ name: 'Beta', priority: ManagerPriority.High }))
        .discoverAllManagers();

      expect(seen).toEqual(['Beta', 'Alpha']);
    });

    it('should track the initialized flag live', async () => {
      const alpha = new AlphaManager({ name: 'Alpha' });
      const discovery = new ManagerDiscoveryService().register(alpha);
      const [descriptor] = discovery.discoverAllManagers().descriptors;

      expect(descriptor.isInitialized).toBe(false);
      await alpha.initialize();
      expect(descriptor.isInitialized).toBe(true);
    });

    it('should stop discovering an unregistered manager', () => {
      const alpha = new AlphaManager({ name: 'Alpha' });
      const discovery = new ManagerDiscoveryService().register(alpha);

      expect(discovery.unregister(alpha)).toBe(true);
      expect(discovery.unregister(alpha)).toBe(false);
      expect(discovery.discoverAllManagers().descriptors).toEqual([]);
    });
  });
});
