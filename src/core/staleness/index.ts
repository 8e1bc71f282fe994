export { classifyStaleness } from './staleness';
export { elapsedSince } from './helpers';
export type { StalenessTier, StalenessThresholds } from './types';
