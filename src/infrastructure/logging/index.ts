export {
  LogCategory,
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  withCategory,
  isLogLevel,
} from './logger';

export type { ILogger, LogLevel } from './logger';
