export { CoinPool } from './coinPool';
export type { CoinDistance } from './coinPool';
