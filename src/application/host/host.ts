/**
 * @canopy/core - Game Host
 *
 * Application shell around one session: bootstraps services, brings the
 * managers up and owns graceful shutdown.
 */

import {
  CriticalServicesMissingError,
  HostStateError,
  describeError,
} from '../../domain/exceptions';
import type { IManager } from '../../domain/managers';
import type { ISessionScanner } from '../../domain/session';
import { ILogger, LogCategory, consoleLogger, withCategory } from '../../infrastructure/logging';
import { withTimeout } from '../../infrastructure/resilience';
import { BootstrapResult, Bootstrapper, BootstrapperOptions } from '../bootstrap/Bootstrapper';
import type { IServiceContainer } from '../di/IDependencyInjection';
import { ServiceContainer } from '../di/ServiceContainer';
import { GameSystemInitializer } from '../initialization/GameSystemInitializer';
import type { InitializationResult, InitializerOptions } from '../initialization/types';

/**
 * Host configuration options
 */
export interface HostOptions {
  /** Session name used in logs */
  name?: string;

  /** Container to populate; the host creates and owns one otherwise */
  container?: IServiceContainer;

  /** Live session shared by auto-wiring and manager discovery */
  session?: ISessionScanner;

  /** Managers registered explicitly with the initializer */
  managers?: IManager[];

  /** Bootstrapper settings other than container, session and logger */
  bootstrap?: Omit<BootstrapperOptions, 'container' | 'session' | 'logger'>;

  initializer?: Partial<InitializerOptions>;

  /**
   * Abort start-up when the health report lists critical failures
   * @defaultValue false
   */
  failOnCriticalServices?: boolean;

  /**
   * Stop on SIGTERM / SIGINT
   * @defaultValue false
   */
  gracefulShutdown?: boolean;

  /** Shutdown timeout in milliseconds */
  shutdownTimeout?: number;

  logger?: ILogger;
}

/**
 * Host lifecycle hooks
 */
export interface HostLifecycle {
  onStart?(): Promise<void>;
  onStop?(): Promise<void>;
  onError?(error: Error): Promise<void>;
}

/**
 * Host status
 */
export type HostStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

export interface HostStartResult {
  bootstrap: BootstrapResult;
  initialization: InitializationResult;
}

const PROCESS_SIGNALS = ['SIGTERM', 'SIGINT'] as const;

/**
 * GameHost - runs Bootstrapper then GameSystemInitializer
 *
 * @example
 * ```typescript
 * const host = new GameHost({
 *   session,
 *   failOnCriticalServices: true,
 *   bootstrap: { modules: [new SaveGameModule()] },
 * });
 *
 * await host.start();
 * // ...
 * await host.stop();
 * ```
 */
export class GameHost implements HostLifecycle {
  readonly name: string;
  private _status: HostStatus = 'stopped';
  private readonly logger: ILogger;
  private readonly ownsContainer: boolean;
  private _container: IServiceContainer;
  private _initializer?: GameSystemInitializer;
  private lastStart?: HostStartResult;
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();

  constructor(private readonly options: HostOptions = {}) {
    this.name = options.name ?? 'canopy-session';
    this.logger = withCategory(options.logger ?? consoleLogger, LogCategory.Host, this.name);
    this.ownsContainer = options.container === undefined;
    this._container = options.container ?? this.createContainer();
  }

  get status(): HostStatus {
    return this._status;
  }

  get container(): IServiceContainer {
    return this._container;
  }

  get initializer(): GameSystemInitializer | undefined {
    return this._initializer;
  }

  get lastStartResult(): HostStartResult | undefined {
    return this.lastStart;
  }

  getOptions(): HostOptions {
    return { ...this.options };
  }

  async start(signal?: AbortSignal): Promise<HostStartResult> {
    if (this._status !== 'stopped') {
      throw new HostStateError('start', this._status);
    }

    this._status = 'starting';
    this.logger.info(`Starting session: ${this.name}`);

    try {
      if (this.ownsContainer && this._container.isDisposed) {
        this._container = this.createContainer();
      }

      const bootstrap = await new Bootstrapper({
        ...this.options.bootstrap,
        container: this._container,
        session: this.options.session,
        logger: this.options.logger,
      }).run(signal);

      if (this.options.failOnCriticalServices && bootstrap.report.criticalFailures > 0) {
        throw new CriticalServicesMissingError(bootstrap.report.errors);
      }

      this._initializer = new GameSystemInitializer({
        container: this._container,
        session: this.options.session,
        managers: this.options.managers,
        options: this.options.initializer,
        logger: this.options.logger,
      });

      const initialization = await this._initializer.initializeAllGameSystems({ signal });
      if (!initialization.success) {
        throw initialization.error ?? new Error(initialization.errorMessage);
      }

      if (this.options.gracefulShutdown) {
        this.setupGracefulShutdown();
      }

      await this.onStart?.();

      this._status = 'running';
      this.logger.info(`Session ${this.name} running`);
      this.lastStart = { bootstrap, initialization };
      return this.lastStart;
    } catch (error) {
      this._status = 'error';
      const failure = error instanceof Error ? error : new Error(describeError(error));
      this.logger.error(`Start-up failed: ${failure.message}`);
      await this.onError?.(failure);
      throw failure;
    }
  }

  /**
   * Shut managers down and dispose an owned container
   *
   * Never throws; a failed or timed-out shutdown leaves status `error`.
   */
  async stop(): Promise<void> {
    if (this._status !== 'running' && this._status !== 'error') {
      return;
    }

    this._status = 'stopping';
    this.logger.info(`Stopping session: ${this.name}`);
    this.removeSignalHandlers();

    try {
      await withTimeout(
        () => this.performShutdown(),
        this.options.shutdownTimeout ?? 30000,
        'Host shutdown',
      );

      await this.onStop?.();
      this._status = 'stopped';
      this.logger.info(`Session ${this.name} stopped`);
    } catch (error) {
      this.logger.error(`Error during shutdown: ${describeError(error)}`);
      this._status = 'error';
    }
  }

  private async performShutdown(): Promise<void> {
    await this._initializer?.shutdownAllManagers();

    if (this.ownsContainer) {
      await this._container.dispose();
    }
  }

  private createContainer(): ServiceContainer {
    return new ServiceContainer({ logger: this.options.logger });
  }

  private setupGracefulShutdown(): void {
    for (const name of PROCESS_SIGNALS) {
      const handler = () => {
        this.logger.info(`Received ${name}, initiating graceful shutdown...`);
        this.stop().then(
          () => process.exit(0),
          (error: unknown) => {
            this.logger.error(`Shutdown failed: ${describeError(error)}`);
            process.exit(1);
          },
        );
      };
      this.signalHandlers.set(name, handler);
      process.once(name, handler);
    }
  }

  private removeSignalHandlers(): void {
    for (const [name, handler] of this.signalHandlers) {
      process.removeListener(name, handler);
    }
    this.signalHandlers.clear();
  }

  // Lifecycle hooks
  onStart?(): Promise<void>;
  onStop?(): Promise<void>;
  onError?(error: Error): Promise<void>;
}

/**
 * Create a new host
 */
export function createHost(options?: HostOptions): GameHost {
  return new GameHost(options);
}
