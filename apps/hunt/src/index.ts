export * from './errors';
export * from './config/proximity';
export { env } from './config/env';
export type { HuntEnv } from './config/env';
export * from './validation/schemas';
export * from './modules/pool';
export * from './modules/proximity';
export * from './modules/collection';
export * from './modules/session';
