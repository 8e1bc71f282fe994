export { classifyTimestamp, resolveTimestamp, hasRawTimestamp } from './timestamp';
export { parseIsoInstant, formatInstant, formatClockTime } from './helpers';
export type { RawTimestamp } from './types';
