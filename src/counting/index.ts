export { CountingSession } from './session';
export type { SessionOptions } from './session';
export { LineRegistry, DEFAULT_FALLBACK_RULE, validateLineSpecs } from './line-registry';
export { TrackStore } from './track-store';
export { Counters } from './counters';
export { CrossingEventLedger } from './event-ledger';
export { RoiFilter, isPointInPolygon } from './roi';
export { detectCrossing, fallbackDirection, isWithinBand } from './crossing';
export { DEFAULT_COUNTER_CONFIG, DEFAULT_LINE, mergeCounterConfig, loadConfigFile } from '../config';
export { parseDetection } from '../detection/validation';
export { ConfigurationError, NotConfiguredError, DetectionLogError } from '../errors';
export type * from '../types';
