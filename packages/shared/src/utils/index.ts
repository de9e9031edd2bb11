export * from './geoMath';
export * from './money';
export * from './tierPolicy';
