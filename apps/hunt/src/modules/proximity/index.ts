export { ProximityEngine } from './proximityEngine';
export type { ProximityUpdateResult } from './proximityEngine';
export { EventHub } from './eventHub';
export type { Listener } from './eventHub';
export { classifyZone, rawZone, isTighter } from './zoneClassifier';
export type { ZoneThresholds } from './zoneClassifier';
