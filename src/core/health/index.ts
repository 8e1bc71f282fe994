export { summarizeHealth } from './health';
export { DEFAULT_TAG_NAMES, readMetrics, sourceStateLabel } from './helpers';
export type { HealthStatus, HealthSummary, HealthInputs, HealthTagNames, SourceMetrics } from './types';
