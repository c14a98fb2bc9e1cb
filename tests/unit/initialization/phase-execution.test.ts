/**
 * @fileoverview Unit tests for PhaseExecutionService
 */

import {
  EventHub,
  IManager,
  InitializationCancelledError,
  InitializationPhase,
  InitializerEvents,
  InitializerOptions,
  ManagerDescriptor,
  ManagerDiscoveryService,
  ManagerInitializationError,
  PhaseExecutionService,
  resolveInitializerOptions,
} from '../../../src';
import { AlphaManager, BetaManager } from '../../helpers/managers';

function describeManagers(...managers: IManager[]): ManagerDescriptor[] {
  const discovery = new ManagerDiscoveryService();
  for (const manager of managers) discovery.register(manager);
  return discovery.discoverAllManagers().descriptors;
}

function createService(overrides: Partial<InitializerOptions> = {}) {
  const events = new EventHub<InitializerEvents>();
  const service = new PhaseExecutionService({
    options: resolveInitializerOptions({ phaseDelayMs: 0, retryDelayMs: 0, ...overrides }),
    events,
  });
  return { service, events };
}

describe('PhaseExecutionService', () => {
  // ==========================================================================
  // RETRY
  // ==========================================================================

  describe('Manager Retry', () => {
    it('should succeed once a flaky manager recovers', async () => {
      const { service } = createService();
      const alpha = new AlphaManager({ name: 'Alpha', failures: 2 });
      const [descriptor] = describeManagers(alpha);

      const outcome = await service.initializeManager(descriptor);

      expect(outcome.success).toBe(true);
      expect(outcome.attempts).toBe(3);
      expect(alpha.isInitialized).toBe(true);
    });

    it('should attempt an always-failing manager exactly maxRecoveryAttempts times', async () => {
      const { service, events } = createService({ maxRecoveryAttempts: 3 });
      const alpha = new AlphaManager({ name: 'Alpha', failures: Number.POSITIVE_INFINITY });
      const [descriptor] = describeManagers(alpha);
      const reported: Array<{ success: boolean; attempts: number }> = [];
      events.on('managerInitialized', ({ success, attempts }) => reported.push({ success, attempts }));

      const outcome = await service.initializeManager(descriptor);

      expect(alpha.initializeCalls).toBe(3);
      expect(reported).toEqual([{ success: false, attempts: 3 }]);
      expect(outcome.error).toBeInstanceOf(ManagerInitializationError);
      expect(outcome.error?.message).toBe(
        "Manager 'Alpha' failed after 3 attempt(s): Alpha failed on call 3",
      );
    });

    it('should make a single attempt when recovery is disabled', async () => {
      const { service } = createService({ enableErrorRecovery: false });
      const alpha = new AlphaManager({ name: 'Alpha', failures: 1 });

      const outcome = await service.initializeManager(describeManagers(alpha)[0]);

      expect(outcome.success).toBe(false);
      expect(alpha.initializeCalls).toBe(1);
    });

    it('should count a manager that never reports initialized as failed', async () => {
      const { service } = createService({ enableErrorRecovery: false });
      const alpha = new AlphaManager({ name: 'Alpha', neverReports: true });

      const outcome = await service.initializeManager(describeManagers(alpha)[0]);

      expect(outcome.error?.message).toBe(
        "Manager 'Alpha' failed after 1 attempt(s): Manager 'Alpha' did not report initialized after 1 attempt(s)",
      );
    });

    it('should skip a manager that is already initialized', async () => {
      const { service } = createService();
      const alpha = new AlphaManager({ name: 'Alpha' });
      alpha.isInitialized = true;

      const outcome = await service.initializeManager(describeManagers(alpha)[0]);

      expect(outcome).toMatchObject({ success: true, attempts: 0 });
      expect(alpha.initializeCalls).toBe(0);
    });

    it('should time out a slow attempt', async () => {
      const { service } = createService({ enableErrorRecovery: false, managerInitTimeoutMs: 10 });
      const alpha = new AlphaManager({ name: 'Alpha', initDelayMs: 1000 });

      const outcome = await service.initializeManager(describeManagers(alpha)[0]);

      expect(outcome.error?.message).toBe(
        "Manager 'Alpha' failed after 1 attempt(s): Alpha initialization timed out after 10ms",
      );
    });

    it('should reject with InitializationCancelledError when cancelled', async () => {
      const { service } = createService();
      const controller = new AbortController();
      controller.abort();

      await expect(
        service.initializeManager(describeManagers(new AlphaManager({ name: 'Alpha' }))[0], controller.signal),
      ).rejects.toThrow(InitializationCancelledError);
    });
  });

  // ==========================================================================
  // PHASES
  // ==========================================================================

  describe('Phases', () => {
    it('should run every manager of a category and keep going past failures', async () => {
      const { service } = createService({ enableErrorRecovery: false });
      const alpha = new AlphaManager({ name: 'Alpha', failures: 1 });
      const beta = new BetaManager({ name: 'Beta' });

      const result = await service.initializeManagersByCategory(
        describeManagers(alpha, beta),
        InitializationPhase.CoreSystems,
      );

      expect(result.phase).toBe(InitializationPhase.CoreSystems);
      expect(result.outcomes.map((o) => [o.descriptor.name, o.success])).toEqual([
        ['Alpha', false],
        ['Beta', true],
      ]);
      expect(beta.isInitialized).toBe(true);
    });

    it('should emit phaseStarted and phaseCompleted around the body', async () => {
      const { service, events } = createService();
      const seen: string[] = [];
      events.on('phaseStarted', ({ phase }) => seen.push(`start:${phase}`));
      events.on('phaseCompleted', ({ phase }) => seen.push(`done:${phase}`));

      const value = await service.executePhase(InitializationPhase.Discovery, () => {
        seen.push('body');
        return 42;
      });

      expect(value).toBe(42);
      expect(seen).toEqual(['start:Discovery', 'body', 'done:Discovery']);
      expect(service.getStatistics().phaseDurations[InitializationPhase.Discovery]).toBeGreaterThanOrEqual(0);
    });

    it('should emit phaseError and rethrow when the body throws', async () => {
      const { service, events } = createService();
      const errors: string[] = [];
      events.on('phaseError', ({ phase, error }) => errors.push(`${phase}: ${error.message}`));

      await expect(
        service.executePhase(InitializationPhase.UISystems, () => {
          throw new Error('hud missing');
        }),
      ).rejects.toThrow('hud missing');
      expect(errors).toEqual(['UISystems: hud missing']);
    });

    it('should not start a phase once cancelled', async () => {
      const { service, events } = createService();
      const started = jest.fn();
      events.on('phaseStarted', started);
      const controller = new AbortController();
      controller.abort('quit');

      await expect(
        service.executePhase(InitializationPhase.Discovery, () => 1, controller.signal),
      ).rejects.toThrow('Initialization cancelled: quit');
      expect(started).not.toHaveBeenCalled();
    });
  });

  // ==========================================================================
  // RECOVERY & STATISTICS
  // ==========================================================================

  describe('Recovery and Statistics', () => {
    it('should give a failed manager one more attempt', async () => {
      const { service, events } = createService({ enableErrorRecovery: false });
      const alpha = new AlphaManager({ name: 'Alpha', failures: 1 });
      const [descriptor] = describeManagers(alpha);
      const recoveries: boolean[] = [];
      events.on('managerRecoveryAttempted', ({ success }) => recoveries.push(success));

      await service.initializeManager(descriptor);
      const recovered = await service.attemptRecovery(descriptor);

      expect(recovered).toBe(true);
      expect(recoveries).toEqual([true]);
      expect(service.getStatistics()).toMatchObject({
        initializedManagers: 1,
        failedInitializations: 0,
        totalAttempts: 2,
      });
    });

    it('should report a failed recovery', async () => {
      const { service, events } = createService();
      const alpha = new AlphaManager({ name: 'Alpha', failures: Number.POSITIVE_INFINITY });
      const recoveries: Array<string | undefined> = [];
      events.on('managerRecoveryAttempted', ({ error }) => recoveries.push(error?.message));

      const recovered = await service.attemptRecovery(describeManagers(alpha)[0]);

      expect(recovered).toBe(false);
      expect(recoveries).toEqual(['Alpha failed on call 1']);
    });

    it('should clear statistics on reset', async () => {
      const { service } = createService();
      await service.initializeManager(describeManagers(new AlphaManager({ name: 'Alpha' }))[0]);

      service.resetStatistics();

      expect(service.getStatistics()).toEqual({
        initializedManagers: 0,
        failedInitializations: 0,
        totalAttempts: 0,
        phaseDurations: {},
      });
    });
  });
});
