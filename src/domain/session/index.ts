export { SessionRegistry } from './ISessionScanner';
export type { ISessionScanner } from './ISessionScanner';
