/**
 * @canopy/core - Live Session
 *
 * The live session is the set of objects the hosting application keeps
 * alive for the current play session. Discovery (of managers, and of
 * services by the Locator and the Bootstrapper) only ever reads it.
 */

/**
 * Enumerates live objects of the running session
 */
export interface ISessionScanner {
  scan(): Iterable<object>;
}

/**
 * In-process session object registry
 *
 * @example
 * ```typescript
 * const session = new SessionRegistry();
 * session.add(new WeatherManager(), new EconomyManager());
 *
 * const initializer = new GameSystemInitializer({ container, session });
 * ```
 */
export class SessionRegistry implements ISessionScanner {
  private readonly objects: object[] = [];

  add(...objects: object[]): this {
    for (const obj of objects) {
      if (!this.objects.includes(obj)) {
        this.objects.push(obj);
      }
    }
    return this;
  }

  remove(obj: object): boolean {
    const index = this.objects.indexOf(obj);
    if (index === -1) return false;
    this.objects.splice(index, 1);
    return true;
  }

  get size(): number {
    return this.objects.length;
  }

  clear(): void {
    this.objects.length = 0;
  }

  scan(): Iterable<object> {
    return [...this.objects];
  }
}
