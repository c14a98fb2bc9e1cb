/**
 * @canopy/core - Error Taxonomy
 *
 * Every failure raised by the container, the builder and the bring-up
 * pipeline derives from CanopyError so callers can branch on `code`.
 */

/**
 * Base error for the core runtime
 */
export class CanopyError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CanopyError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ==================== Container ====================

/**
 * Registering an already-bound capability under the Strict policy
 */
export class DuplicateRegistrationError extends CanopyError {
  constructor(
    public readonly serviceName: string,
    public readonly registrationName?: string,
  ) {
    super(
      'DUPLICATE_REGISTRATION',
      registrationName
        ? `Service '${serviceName}' is already registered under name '${registrationName}'`
        : `Service '${serviceName}' is already registered`,
      { serviceName, registrationName },
    );
    this.name = 'DuplicateRegistrationError';
  }
}

/**
 * Nothing is bound for the requested capability
 */
export class UnresolvedServiceError extends CanopyError {
  constructor(
    public readonly serviceName: string,
    message?: string,
    public readonly dependencyGraph?: string,
  ) {
    super(
      'UNRESOLVED_SERVICE',
      message ?? `No registration found for service '${serviceName}'`,
      { serviceName, dependencyGraph },
    );
    this.name = 'UnresolvedServiceError';
  }
}

/**
 * A factory or constructor re-entered a capability that is still being resolved
 */
export class CircularResolutionError extends UnresolvedServiceError {
  constructor(public readonly resolutionPath: readonly string[]) {
    super(
      resolutionPath[resolutionPath.length - 1] ?? 'unknown',
      `Circular resolution detected: ${resolutionPath.join(' -> ')}`,
      resolutionPath.join(' -> '),
    );
    this.name = 'CircularResolutionError';
  }
}

/**
 * The Locator exhausted registration, cache and discovery
 */
export class ServiceNotFoundError extends CanopyError {
  constructor(public readonly serviceName: string) {
    super(
      'SERVICE_NOT_FOUND',
      `Service '${serviceName}' is not registered and could not be discovered`,
      { serviceName },
    );
    this.name = 'ServiceNotFoundError';
  }
}

export class ContainerDisposedError extends CanopyError {
  constructor() {
    super('CONTAINER_DISPOSED', 'Service container has been disposed');
    this.name = 'ContainerDisposedError';
  }
}

export class InvalidRegistrationError extends CanopyError {
  constructor(serviceName: string, reason: string) {
    super(
      'INVALID_REGISTRATION',
      `Invalid registration for '${serviceName}': ${reason}`,
      { serviceName, reason },
    );
    this.name = 'InvalidRegistrationError';
  }
}

// ==================== Builder ====================

export type ModuleStage = 'configure' | 'initialize' | 'validate';

/**
 * Raised while running a module's configure or initialize pass
 */
export class ModuleConfigurationError extends CanopyError {
  constructor(
    public readonly moduleName: string,
    public readonly stage: ModuleStage,
    cause: unknown,
  ) {
    super(
      'MODULE_CONFIGURATION',
      `Module '${moduleName}' failed during ${stage}: ${describeError(cause)}`,
      { moduleName, stage },
      { cause },
    );
    this.name = 'ModuleConfigurationError';
  }
}

export class ContainerValidationError extends CanopyError {
  constructor(public readonly errors: readonly string[]) {
    super(
      'CONTAINER_VALIDATION',
      `Container validation failed with ${errors.length} errors`,
      { errors: [...errors] },
    );
    this.name = 'ContainerValidationError';
  }
}

// ==================== Bring-up ====================

export class NoManagersDiscoveredError extends CanopyError {
  constructor() {
    super('NO_MANAGERS_DISCOVERED', 'No managers discovered for initialization');
    this.name = 'NoManagersDiscoveredError';
  }
}

export class ManagerInitializationError extends CanopyError {
  constructor(
    public readonly managerName: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(
      'MANAGER_INITIALIZATION',
      cause === undefined
        ? `Manager '${managerName}' did not report initialized after ${attempts} attempt(s)`
        : `Manager '${managerName}' failed after ${attempts} attempt(s): ${describeError(cause)}`,
      { managerName, attempts },
      { cause },
    );
    this.name = 'ManagerInitializationError';
  }
}

export class DependencyCycleError extends CanopyError {
  constructor(public readonly cycle: readonly string[]) {
    super(
      'DEPENDENCY_CYCLE',
      `Circular dependency detected: ${cycle.join(' -> ')}`,
      { cycle: [...cycle] },
    );
    this.name = 'DependencyCycleError';
  }
}

export class MissingDependencyError extends CanopyError {
  constructor(
    public readonly managerName: string,
    public readonly dependencyName: string,
  ) {
    super(
      'MISSING_DEPENDENCY',
      `Missing dependency: ${managerName} requires ${dependencyName}`,
      { managerName, dependencyName },
    );
    this.name = 'MissingDependencyError';
  }
}

export class SystemValidationError extends CanopyError {
  constructor(public readonly errors: readonly string[]) {
    super(
      'SYSTEM_VALIDATION',
      `System validation failed with ${errors.length} error(s)`,
      { errors: [...errors] },
    );
    this.name = 'SystemValidationError';
  }
}

export class InitializationInProgressError extends CanopyError {
  constructor() {
    super('INITIALIZATION_IN_PROGRESS', 'Initialization already in progress');
    this.name = 'InitializationInProgressError';
  }
}

export class InitializationCancelledError extends CanopyError {
  constructor(reason?: string) {
    super(
      'INITIALIZATION_CANCELLED',
      reason ? `Initialization cancelled: ${reason}` : 'Initialization cancelled',
    );
    this.name = 'InitializationCancelledError';
  }
}

export class OperationTimeoutError extends CanopyError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(
      'OPERATION_TIMEOUT',
      `${operation} timed out after ${timeoutMs}ms`,
      { operation, timeoutMs },
    );
    this.name = 'OperationTimeoutError';
  }
}

export class InvalidStateTransitionError extends CanopyError {
  constructor(from: string, to: string) {
    super(
      'INVALID_STATE_TRANSITION',
      `Invalid initializer state transition: ${from} -> ${to}`,
      { from, to },
    );
    this.name = 'InvalidStateTransitionError';
  }
}

// ==================== Host ====================

/**
 * Raised by the host when it is told to treat critical-service absence as fatal
 */
export class CriticalServicesMissingError extends CanopyError {
  constructor(public readonly errors: readonly string[]) {
    super(
      'CRITICAL_SERVICES_MISSING',
      `${errors.length} critical service(s) missing: ${errors.join('; ')}`,
      { errors: [...errors] },
    );
    this.name = 'CriticalServicesMissingError';
  }
}

export class HostStateError extends CanopyError {
  constructor(operation: string, status: string) {
    super('HOST_STATE', `Cannot ${operation} host in ${status} state`, { operation, status });
    this.name = 'HostStateError';
  }
}

export class ConfigurationError extends CanopyError {
  constructor(public readonly key: string, reason: string) {
    super('CONFIGURATION', `Invalid configuration for ${key}: ${reason}`, {
      key,
      reason,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Render any thrown value as a single-line message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
