export { decodeFaults } from './faults';
export {
  DEFAULT_FAULT_OPTIONS,
  faultKey,
  isFaultActive,
  parseFaultTable,
  unmappedDescription
} from './helpers';
export type { FaultEntry, FaultReport, FaultTable, FaultDecoderOptions } from './types';
