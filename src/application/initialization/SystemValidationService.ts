/**
 * @canopy/core - System Validation
 *
 * Post bring-up checks: per-manager state, the manager dependency graph
 * and container health. Findings never throw; the orchestrator decides
 * what a failed summary means.
 */

import { EventHub } from '../../domain/events';
import {
  DependencyCycleError,
  MissingDependencyError,
  describeError,
} from '../../domain/exceptions';
import {
  IManager,
  ManagerType,
  ManagerTypeKey,
  declaresDependencies,
  isValidatable,
} from '../../domain/managers';
import { ILogger, silentLogger } from '../../infrastructure/logging';
import {
  EventServiceToken,
  PersistenceServiceToken,
  SettingsServiceToken,
  TimeServiceToken,
} from '../bootstrap/coreServices';
import {
  IServiceContainer,
  ServiceIdentifier,
  isServiceConstructor,
} from '../di/IDependencyInjection';
import type {
  ContainerValidationReport,
  DependencyValidationReport,
  InitializerEvents,
  ManagerDescriptor,
  ManagerValidationReport,
  ValidationSummary,
} from './types';

/**
 * Capabilities whose absence is reported as a container warning
 */
export const CORE_SERVICE_IDENTIFIERS: readonly ServiceIdentifier<unknown>[] = [
  TimeServiceToken,
  PersistenceServiceToken,
  EventServiceToken,
  SettingsServiceToken,
];

/** Errors echoed to the log after a run */
const LOGGED_ERROR_LIMIT = 5;

function isManagerType(value: unknown): value is ManagerType {
  return typeof value === 'function';
}

export interface SystemValidationOptions {
  events?: EventHub<InitializerEvents>;
  logger?: ILogger;
}

export interface ValidateSystemOptions {
  /** Run cycle and missing-dependency detection */
  validateDependencies?: boolean;
}

export class SystemValidationService {
  private readonly events: EventHub<InitializerEvents>;
  private readonly logger: ILogger;

  constructor(options: SystemValidationOptions = {}) {
    this.events = options.events ?? new EventHub<InitializerEvents>();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validate every manager, the dependency graph and the container
   */
  validateSystem(
    descriptors: readonly ManagerDescriptor[],
    container: IServiceContainer,
    options: ValidateSystemOptions = {},
  ): ValidationSummary {
    const systems = descriptors.map((descriptor) => this.validateManager(descriptor, container));

    const dependencies: DependencyValidationReport =
      (options.validateDependencies ?? true)
        ? this.validateDependencies(descriptors)
        : { passed: true, cycles: [], missing: [], errors: [] };

    const containerReport = this.validateContainer(container);

    const validSystems = systems.filter((system) => system.isValid).length;
    const allErrors = [
      ...systems.flatMap((system) => system.errors),
      ...dependencies.errors,
      ...containerReport.errors,
    ];
    const warnings = [...systems.flatMap((system) => system.warnings), ...containerReport.warnings];

    const summary: ValidationSummary = Object.freeze({
      totalSystems: systems.length,
      validSystems,
      invalidSystems: systems.length - validSystems,
      dependencyValidationPassed: dependencies.passed,
      containerValidationPassed: containerReport.passed,
      overallValid:
        validSystems === systems.length && dependencies.passed && containerReport.passed,
      allErrors: Object.freeze(allErrors),
      warnings: Object.freeze(warnings),
      systems: Object.freeze(systems.map(freezeReport)),
      dependencyCycles: Object.freeze(dependencies.cycles.map((cycle) => Object.freeze(cycle))),
      validatedAt: new Date().toISOString(),
    });

    if (summary.overallValid) {
      this.logger.info(`Validation passed for ${summary.totalSystems} system(s)`);
    } else {
      this.logger.warn(
        `Validation found ${allErrors.length} error(s) across ${summary.invalidSystems} invalid system(s)`,
      );
      for (const error of allErrors.slice(0, LOGGED_ERROR_LIMIT)) {
        this.logger.warn(`  ${error}`);
      }
      if (allErrors.length > LOGGED_ERROR_LIMIT) {
        this.logger.warn(`  ... and ${allErrors.length - LOGGED_ERROR_LIMIT} more`);
      }
    }

    this.events.emit('validationCompleted', { summary });
    return summary;
  }

  validateManager(
    descriptor: ManagerDescriptor,
    container: IServiceContainer,
  ): ManagerValidationReport {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { manager, name } = descriptor;

    if (!manager.isInitialized) {
      errors.push(`${name}: not initialized`);
    } else if (isValidatable(manager)) {
      try {
        const result = manager.validate();
        if (!result.isValid) {
          errors.push(...result.errors.map((error) => `${name}: ${error}`));
        }
      } catch (error) {
        errors.push(`${name}: validation threw: ${describeError(error)}`);
      }
    }

    if (isServiceConstructor(descriptor.type) && !container.isRegistered(descriptor.type)) {
      warnings.push(`${name}: not registered in the service container`);
    }

    const report = { managerName: name, isValid: errors.length === 0, errors, warnings };
    this.events.emit('managerValidated', {
      managerName: name,
      isValid: report.isValid,
      errors: Object.freeze([...errors]),
    });
    return report;
  }

  /**
   * Depth-first search over declared dependencies
   *
   * A dependency found on the current recursion stack closes a cycle;
   * each cycle is reported as the stack slice from the repeated node,
   * ending with that node again.
   */
  validateDependencies(descriptors: readonly ManagerDescriptor[]): DependencyValidationReport {
    const byType = new Map<ManagerTypeKey, ManagerDescriptor>();
    for (const descriptor of descriptors) byType.set(descriptor.type, descriptor);

    const edges = new Map<ManagerTypeKey, readonly ManagerType[]>();
    const missing: DependencyValidationReport['missing'] = [];
    const errors: string[] = [];

    for (const descriptor of descriptors) {
      const dependencies = this.readDependencies(descriptor, errors);
      edges.set(descriptor.type, dependencies);

      for (const dependency of dependencies) {
        if (!byType.has(dependency)) {
          missing.push({ manager: descriptor.name, dependency: dependency.name });
          errors.push(new MissingDependencyError(descriptor.name, dependency.name).message);
        }
      }
    }

    const cycles: string[][] = [];
    const visited = new Set<ManagerTypeKey>();
    const stack: ManagerDescriptor[] = [];
    const onStack = new Set<ManagerTypeKey>();

    const visit = (descriptor: ManagerDescriptor) => {
      visited.add(descriptor.type);
      stack.push(descriptor);
      onStack.add(descriptor.type);

      for (const dependency of edges.get(descriptor.type) ?? []) {
        const next = byType.get(dependency);
        if (!next) continue;
        if (onStack.has(next.type)) {
          const start = stack.findIndex((entry) => entry.type === next.type);
          const cycle = stack.slice(start).map((entry) => entry.typeName);
          cycle.push(next.typeName);
          cycles.push(cycle);
        } else if (!visited.has(next.type)) {
          visit(next);
        }
      }

      stack.pop();
      onStack.delete(descriptor.type);
    };

    for (const descriptor of descriptors) {
      if (!visited.has(descriptor.type)) visit(descriptor);
    }

    errors.push(...cycles.map((cycle) => new DependencyCycleError(cycle).message));

    return { passed: errors.length === 0, cycles, missing, errors };
  }

  /**
   * Declared dependencies of one manager; a throwing hook is recorded in
   * `errors` and counts as no dependencies
   */
  private readDependencies(descriptor: ManagerDescriptor, errors: string[]): ManagerType[] {
    const manager: IManager = descriptor.manager;
    if (!declaresDependencies(manager)) return [];

    let declared: readonly unknown[];
    try {
      declared = manager.getDependencies();
    } catch (error) {
      errors.push(`${descriptor.name}: dependency declaration threw: ${describeError(error)}`);
      return [];
    }

    const dependencies = declared.filter(isManagerType);
    if (dependencies.length !== declared.length) {
      this.logger.warn(
        `${descriptor.name}: ignored ${declared.length - dependencies.length} dependency entry(ies) that are not manager types`,
      );
    }
    return dependencies;
  }

  validateContainer(container: IServiceContainer): ContainerValidationReport {
    const verification = container.verify();
    const warnings = [...verification.warnings];

    for (const identifier of CORE_SERVICE_IDENTIFIERS) {
      if (!container.isRegistered(identifier)) {
        warnings.push(`Core service '${identifier.name}' is not registered`);
      }
    }

    return {
      passed: verification.errors.length === 0,
      errors: [...verification.errors],
      warnings,
    };
  }
}

function freezeReport(report: ManagerValidationReport): ManagerValidationReport {
  return Object.freeze({
    ...report,
    errors: Object.freeze([...report.errors]),
    warnings: Object.freeze([...report.warnings]),
  });
}
