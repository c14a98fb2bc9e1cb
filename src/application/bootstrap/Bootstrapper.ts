/**
 * @canopy/core - Bootstrapper
 *
 * Composition root of a session. The only component allowed to reach for
 * the process-wide default container.
 *
 * Steps:
 * 1. obtain the container (explicit, or the process-wide default)
 * 2. build it: host actions and modules first, then core services where absent
 * 3. optional auto-wiring of session objects by naming convention
 * 4. checklist validation sweep
 * 5. health report
 *
 * Critical-service absence is logged as an error; deciding whether it is
 * fatal is left to the caller.
 */

import type { ISessionScanner } from '../../domain/session';
import { describeError } from '../../domain/exceptions';
import { ILogger, LogCategory, consoleLogger, withCategory } from '../../infrastructure/logging';
import { ContainerBuilder } from '../di/ContainerBuilder';
import {
  DuplicateRegistrationPolicy,
  IServiceContainer,
  getInjectableMetadata,
  isServiceConstructor,
} from '../di/IDependencyInjection';
import type { IServiceModule } from '../di/IServiceModule';
import { ServiceContainer } from '../di/ServiceContainer';
import { CoreServicesModule, isNullImplementation } from './coreServices';
import {
  ServiceCheck,
  ServiceHealthReport,
  ServiceValidationResult,
  createHealthReport,
  formatHealthReport,
  loadDefaultChecklist,
} from './healthReport';

/**
 * Capability-marker prefix of interface tokens
 */
export const CAPABILITY_PREFIX = 'I';

/**
 * Class-name suffixes picked up by auto-wiring
 */
export const AUTO_WIRE_SUFFIXES: readonly string[] = ['Manager', 'Service'];

export interface BootstrapperOptions {
  /** Container to bootstrap; the process-wide default otherwise */
  container?: IServiceContainer;

  /** Host modules, configured before the core services */
  modules?: IServiceModule[];

  /** Explicit registrations, applied before any module */
  configure?: (builder: ContainerBuilder) => void;

  /** Live session, scanned only when `autoWire` is set */
  session?: ISessionScanner;

  /**
   * Register session objects by naming convention
   * @defaultValue false
   */
  autoWire?: boolean;

  /** Services to validate; the shipped checklist otherwise */
  checklist?: ServiceCheck[];

  /** Timeout applied to module initialization */
  moduleTimeoutMs?: number;

  /** Print the formatted report through the logger */
  printReport?: boolean;

  logger?: ILogger;
}

export interface BootstrapResult {
  container: IServiceContainer;
  report: ServiceHealthReport;
  autoWiredServices: number;
}

/**
 * Bootstrapper - session composition root
 *
 * @example
 * ```typescript
 * const { container, report } = await new Bootstrapper({
 *   configure: (builder) => builder.addSingleton(TimeServiceToken, SystemTimeService),
 *   modules: [new SaveGameModule()],
 * }).run();
 *
 * if (report.overallHealth === ServiceHealth.Critical) {
 *   // application shell decides
 * }
 * ```
 */
export class Bootstrapper {
  private static globalContainer?: ServiceContainer;

  private readonly logger: ILogger;
  private result?: BootstrapResult;
  private pending?: Promise<BootstrapResult>;

  constructor(private readonly options: BootstrapperOptions = {}) {
    this.logger = withCategory(options.logger ?? consoleLogger, LogCategory.Bootstrap);
  }

  /**
   * Process-wide default container
   */
  static getGlobalContainer(): ServiceContainer {
    if (!Bootstrapper.globalContainer || Bootstrapper.globalContainer.isDisposed) {
      Bootstrapper.globalContainer = new ServiceContainer({
        duplicatePolicy: DuplicateRegistrationPolicy.Strict,
      });
    }
    return Bootstrapper.globalContainer;
  }

  /**
   * Dispose and forget the process-wide default container
   */
  static async resetGlobalContainer(): Promise<void> {
    const current = Bootstrapper.globalContainer;
    Bootstrapper.globalContainer = undefined;
    await current?.dispose();
  }

  get isBootstrapped(): boolean {
    return this.result !== undefined;
  }

  get lastReport(): ServiceHealthReport | undefined {
    return this.result?.report;
  }

  /**
   * Bootstrap once; later calls return the first result
   */
  run(signal?: AbortSignal): Promise<BootstrapResult> {
    if (this.result) {
      this.logger.debug('Already bootstrapped');
      return Promise.resolve(this.result);
    }
    if (!this.pending) {
      this.pending = this.execute(signal).finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  /**
   * Validate every checklist entry against a container
   */
  validateServices(
    container: IServiceContainer,
    checklist: readonly ServiceCheck[] = this.options.checklist ?? loadDefaultChecklist(),
  ): ServiceValidationResult[] {
    return checklist.map((check) => {
      const instance = container.tryResolve(check.identifier);

      if (instance === undefined) {
        const errorMessage = container.isRegistered(check.identifier)
          ? 'service failed to resolve'
          : 'service not registered';
        if (check.critical) {
          this.logger.error(`CRITICAL service missing: ${check.name} (${errorMessage})`);
        } else {
          this.logger.warn(`Optional service missing: ${check.name}`);
        }
        return {
          serviceName: check.name,
          isCritical: check.critical,
          isRegistered: false,
          isNullImplementation: false,
          errorMessage,
        };
      }

      const nullImplementation = isNullImplementation(instance);
      const implementationName =
        typeof instance === 'object' && instance !== null ? instance.constructor.name : undefined;
      if (nullImplementation) {
        this.logger.warn(`${check.name} is using null implementation ${implementationName}`);
      }

      return {
        serviceName: check.name,
        isCritical: check.critical,
        isRegistered: true,
        isNullImplementation: nullImplementation,
        implementationName,
      };
    });
  }

  private async execute(signal?: AbortSignal): Promise<BootstrapResult> {
    const started = Date.now();
    const container = this.options.container ?? Bootstrapper.getGlobalContainer();
    this.logger.info('Bootstrapping services');

    const builder = ContainerBuilder.create({
      logger: this.options.logger,
      defaultModuleTimeoutMs: this.options.moduleTimeoutMs,
    });
    this.options.configure?.(builder);
    builder
      .addModules(...(this.options.modules ?? []))
      .addModule(new CoreServicesModule());

    await builder.build({ container, signal });

    const autoWiredServices =
      this.options.autoWire && this.options.session
        ? this.autoWire(container, this.options.session)
        : 0;

    const checklist = this.options.checklist ?? loadDefaultChecklist();
    const results = this.validateServices(container, checklist);
    const report = createHealthReport(checklist, results, true);

    this.logHealthReport(report);
    this.logger.info(`Bootstrap completed in ${Date.now() - started}ms`);

    this.result = { container, report, autoWiredServices };
    return this.result;
  }

  /**
   * Register session objects named `*Manager` / `*Service` by concrete type
   * and by every `I`-prefixed capability token they declare via @Injectable
   */
  private autoWire(container: IServiceContainer, session: ISessionScanner): number {
    let registered = 0;

    for (const candidate of session.scan()) {
      const type = candidate.constructor;
      if (!isServiceConstructor(type)) continue;
      if (!AUTO_WIRE_SUFFIXES.some((suffix) => type.name.endsWith(suffix))) continue;

      try {
        if (!container.isRegistered(type)) {
          container.registerInstance(type, candidate, { externallyOwned: true });
          registered++;
        }

        for (const token of getInjectableMetadata(type)?.provides ?? []) {
          if (!token.name.startsWith(CAPABILITY_PREFIX) || container.isRegistered(token)) continue;
          container.registerInstance(token, candidate, { externallyOwned: true });
          registered++;
        }
      } catch (error) {
        this.logger.error(`Auto-wiring ${type.name} failed: ${describeError(error)}`);
      }
    }

    this.logger.info(`Auto-wired ${registered} registration(s) from the session`);
    return registered;
  }

  private logHealthReport(report: ServiceHealthReport): void {
    const summary =
      `Health: ${report.overallHealth} - ${report.registeredServices}/${report.totalServices} services, ` +
      `${report.criticalFailures} critical failure(s), ${report.nullImplementations} null implementation(s)`;

    if (report.criticalFailures > 0) {
      this.logger.error(summary);
      for (const error of report.errors) this.logger.error(error);
    } else {
      this.logger.info(summary);
    }

    if (this.options.printReport) {
      this.logger.info(formatHealthReport(report));
    }
  }
}
