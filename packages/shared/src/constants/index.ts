export * from './proximity';
export * from './tiers';
