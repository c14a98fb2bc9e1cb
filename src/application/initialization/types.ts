/**
 * @fileoverview Initialization pipeline - shared types
 *
 * @packageDocumentation
 * @module @canopy/core/application/initialization
 *
 * ## State machine
 *
 * ```
 * NotStarted → Discovering → InitializingCore → InitializingDomain
 *            → InitializingProgression → InitializingUI → Validating → Running
 *                   └──────────────── any ──────────────────────────→ Error
 * ```
 *
 * `Running` and `Error` are terminal for one bring-up attempt; a new
 * attempt starts again from `Discovering`.
 */

import type {
  IManager,
  ManagerCategory,
  ManagerPriority,
  ManagerTypeKey,
} from '../../domain/managers';

// ============================================================================
// Phases & States
// ============================================================================

/**
 * Ordered bring-up phases
 */
export enum InitializationPhase {
  Discovery = 'Discovery',
  CoreSystems = 'CoreSystems',
  DomainSystems = 'DomainSystems',
  ProgressionSystems = 'ProgressionSystems',
  UISystems = 'UISystems',
  Validation = 'Validation',
}

/**
 * Orchestrator state
 */
export enum InitializerState {
  NotStarted = 'NotStarted',
  Discovering = 'Discovering',
  InitializingCore = 'InitializingCore',
  InitializingDomain = 'InitializingDomain',
  InitializingProgression = 'InitializingProgression',
  InitializingUI = 'InitializingUI',
  Validating = 'Validating',
  Running = 'Running',
  Error = 'Error',
}

/**
 * What a failed validation does to phase progression
 */
export enum ValidationFailurePolicy {
  /** Log failures as warnings and still reach Running */
  Warn = 'warn',

  /** Treat a failed validation summary as fatal (Validating → Error) */
  Fail = 'fail',
}

// ============================================================================
// Options
// ============================================================================

export interface InitializerOptions {
  /** Log phase start/completion at info level */
  enablePhaseLogging: boolean;

  /** Pause between phases, in milliseconds */
  phaseDelayMs: number;

  /** Retry failed managers; a single attempt otherwise */
  enableErrorRecovery: boolean;

  /** Attempts per manager, including the first */
  maxRecoveryAttempts: number;

  /** Backoff before the first retry, in milliseconds */
  retryDelayMs: number;

  backoffMultiplier: number;

  maxRetryDelayMs: number;

  /** Scan the session for managers in addition to explicit registrations */
  autoDiscoverManagers: boolean;

  /** Run cycle and missing-dependency detection during validation */
  validateDependenciesAfterInit: boolean;

  /** Give managers still uninitialized at validation one more attempt */
  attemptServiceRecovery: boolean;

  validationFailurePolicy: ValidationFailurePolicy;

  /** Enforced timeout per initialization attempt; unset means none */
  managerInitTimeoutMs?: number;
}

// ============================================================================
// Data Model
// ============================================================================

/**
 * One discovered manager
 */
export interface ManagerDescriptor {
  /** Concrete type; exactly one descriptor per type per discovery pass */
  readonly type: ManagerTypeKey;
  readonly typeName: string;
  readonly name: string;
  readonly priority: ManagerPriority;
  readonly category: ManagerCategory;
  /** Owning component; owned by the hosting application */
  readonly manager: IManager;
  /** Position in discovery order, used as a stable tie-breaker */
  readonly discoveryIndex: number;
  readonly isInitialized: boolean;
}

export interface DiscoveryResult {
  success: boolean;
  descriptors: ManagerDescriptor[];
  /** Type names skipped because an instance of the same type came first */
  duplicates: string[];
  durationMs: number;
  errorMessage?: string;
}

export interface ManagerInitializationOutcome {
  descriptor: ManagerDescriptor;
  success: boolean;
  attempts: number;
  durationMs: number;
  error?: Error;
}

export interface PhaseResult {
  phase: InitializationPhase;
  durationMs: number;
  outcomes: ManagerInitializationOutcome[];
}

export interface ManagerValidationReport {
  readonly managerName: string;
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

export interface DependencyValidationReport {
  passed: boolean;
  /** Each cycle lists type names, closing on its first node */
  cycles: string[][];
  missing: Array<{ manager: string; dependency: string }>;
  errors: string[];
}

export interface ContainerValidationReport {
  passed: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Result of one validation run; frozen once built
 */
export interface ValidationSummary {
  readonly totalSystems: number;
  readonly validSystems: number;
  readonly invalidSystems: number;
  readonly dependencyValidationPassed: boolean;
  readonly containerValidationPassed: boolean;
  readonly overallValid: boolean;
  readonly allErrors: readonly string[];
  readonly warnings: readonly string[];
  readonly systems: readonly ManagerValidationReport[];
  readonly dependencyCycles: readonly (readonly string[])[];
  readonly validatedAt: string;
}

/**
 * Outcome of one bring-up attempt
 */
export interface InitializationResult {
  success: boolean;
  initializedManagerCount: number;
  discoveredManagerCount: number;
  failedManagers: string[];
  durationMs: number;
  finalState: InitializerState;
  errorMessage?: string;
  error?: Error;
  validation?: ValidationSummary;
}

export interface InitializationStatistics {
  discoveredManagers: number;
  initializedManagers: number;
  failedInitializations: number;
  totalAttempts: number;
  isInitialized: boolean;
  phaseDurations: Partial<Record<InitializationPhase, number>>;
}

// ============================================================================
// Events
// ============================================================================

export interface InitializerEvents {
  stateChanged: { from: InitializerState; to: InitializerState };
  phaseStarted: { phase: InitializationPhase };
  phaseCompleted: { phase: InitializationPhase; durationMs: number };
  phaseError: { phase: InitializationPhase; error: Error };
  managerDiscovered: { descriptor: ManagerDescriptor };
  managerInitialized: {
    managerName: string;
    descriptor: ManagerDescriptor;
    success: boolean;
    attempts: number;
    error?: Error;
  };
  managerRecoveryAttempted: { managerName: string; success: boolean; error?: Error };
  managerValidated: { managerName: string; isValid: boolean; errors: readonly string[] };
  validationCompleted: { summary: ValidationSummary };
  initializationCompleted: { result: InitializationResult };
}
