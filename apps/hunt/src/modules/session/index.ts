export { HuntSession, fixedFindLimit } from './huntSession';
export type { FindLimitSource, HuntSessionOptions } from './huntSession';
export { HuntTickRunner } from './tickRunner';
