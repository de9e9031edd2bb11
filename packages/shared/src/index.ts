export * from './types';
export * from './constants';
export * from './utils';
export * from './contracts/events';
