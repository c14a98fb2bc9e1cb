/**
 * @canopy/core - Manager Base
 */

import {
  IManager,
  ManagerCategory,
  ManagerPriority,
  ManagerValidationResult,
  IValidatable,
} from './IManager';

/**
 * Abstract base class for managers
 *
 * Tracks the initialized flag and guards against double initialization.
 * Subclasses implement `onInitialize` and optionally `onShutdown`.
 */
export abstract class ManagerBase implements IManager, IValidatable {
  abstract readonly name: string;
  readonly priority: ManagerPriority = ManagerPriority.Normal;
  readonly category: ManagerCategory = ManagerCategory.Core;

  private initialized = false;

  get isInitialized(): boolean {
    return this.initialized;
  }

  async initialize(signal?: AbortSignal): Promise<void> {
    if (this.initialized) return;

    await this.onInitialize(signal);
    this.initialized = true;
  }

  async shutdown(): Promise<void> {
    if (!this.initialized) return;

    this.initialized = false;
    await this.onShutdown();
  }

  validate(): ManagerValidationResult {
    const errors = this.initialized ? this.onValidate() : ['not initialized'];
    return { isValid: errors.length === 0, errors };
  }

  /**
   * Implement this method to bring the manager up
   */
  protected abstract onInitialize(signal?: AbortSignal): Promise<void> | void;

  protected onShutdown(): Promise<void> | void {}

  /**
   * Override to report manager-specific problems
   */
  protected onValidate(): string[] {
    return [];
  }
}
