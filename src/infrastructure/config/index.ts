export { readBoolean, readInteger, readNumber, readEnum } from './env';

export type { EnvRecord } from './env';
