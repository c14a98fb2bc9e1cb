/**
 * @canopy/core - Basic Example
 *
 * Demonstrates the core concepts:
 * - Capability tokens and a service module
 * - Managers declaring priority, category and dependencies
 * - GameHost running the bootstrap and the phased bring-up
 * - The health report and graceful shutdown
 */

import {
  GameHost,
  IServiceContainer,
  ManagerBase,
  ManagerCategory,
  ManagerPriority,
  ManagerType,
  ServiceModuleBase,
  SessionRegistry,
  TimeServiceToken,
  createToken,
  formatHealthReport,
  ITimeService,
} from '../src/index';

// ==================== Services ====================

interface IWeatherService {
  forecast(day: number): 'sun' | 'rain';
}

const WeatherServiceToken = createToken<IWeatherService>('IWeatherService');

class SeasonalWeather implements IWeatherService {
  forecast(day: number): 'sun' | 'rain' {
    return day % 3 === 0 ? 'rain' : 'sun';
  }
}

class FastClock implements ITimeService {
  timeScale = 4;

  now(): number {
    return Date.now() * this.timeScale;
  }

  setTimeScale(scale: number): void {
    this.timeScale = scale;
  }
}

class WorldModule extends ServiceModuleBase {
  readonly name = 'World';

  configureServices(container: IServiceContainer): void {
    container.registerSingleton(WeatherServiceToken, SeasonalWeather);
    container.registerSingleton(TimeServiceToken, FastClock);
  }
}

// ==================== Managers ====================

class ClockManager extends ManagerBase {
  readonly name = 'Clock';
  readonly priority = ManagerPriority.Critical;

  protected onInitialize(): void {
    console.log('  ⏱  clock started');
  }
}

class CultivationManager extends ManagerBase {
  readonly name = 'Cultivation';
  readonly category = ManagerCategory.Domain;
  private attempts = 0;

  getDependencies(): readonly ManagerType[] {
    return [ClockManager];
  }

  protected async onInitialize(): Promise<void> {
    this.attempts++;
    if (this.attempts === 1) {
      throw new Error('soil tables not loaded yet');
    }
    console.log(`  🌱 cultivation ready after ${this.attempts} attempts`);
  }
}

class HudManager extends ManagerBase {
  readonly name = 'Hud';
  readonly category = ManagerCategory.UI;
  readonly priority = ManagerPriority.Low;

  protected onInitialize(): void {
    console.log('  🖥  hud drawn');
  }

  protected onShutdown(): void {
    console.log('  🖥  hud cleared');
  }
}

// ==================== Main ====================

async function main() {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  @canopy/core - Basic Session');
  console.log('═══════════════════════════════════════════════════════════\n');

  // Managers live in the session; discovery finds them there
  const session = new SessionRegistry().add(
    new HudManager(),
    new CultivationManager(),
    new ClockManager(),
  );

  const host = new GameHost({
    name: 'greenhouse',
    session,
    bootstrap: { modules: [new WorldModule()] },
    initializer: { phaseDelayMs: 0, retryDelayMs: 10 },
    gracefulShutdown: true,
  });

  const { bootstrap, initialization } = await host.start();

  console.log('\n' + formatHealthReport(bootstrap.report) + '\n');
  console.log(
    `Initialized ${initialization.initializedManagerCount}/${initialization.discoveredManagerCount} managers in ${initialization.durationMs}ms`,
  );

  const weather = host.container.resolve(WeatherServiceToken);
  console.log(`Forecast for day 3: ${weather.forecast(3)}\n`);

  await host.stop();

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

// Run
main().catch(console.error);
