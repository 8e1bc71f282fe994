/**
 * Fault decoding type definitions
 */

/**
 * One active fault bit with its description
 */
export interface FaultEntry {
  /** Bit position in the fault array */
  index: number;

  /** Human-readable description, or "Fault Code #<index>" when unmapped */
  description: string;
}

/**
 * Decoded fault condition of one snapshot
 */
export interface FaultReport {
  /** True when the system fault flag is set or any fault bit is active */
  active: boolean;

  /** Value of the standalone system fault flag */
  systemFault: boolean;

  /** Active fault bits in ascending index order (may be empty while systemFault is set) */
  entries: FaultEntry[];
}

/**
 * Static fault index → description table
 */
export type FaultTable = ReadonlyMap<number, string>;

/**
 * Where fault bits live in the tag namespace
 */
export interface FaultDecoderOptions {
  /** Key prefix of the indexed bits; bit i is "<prefix>[i]" */
  faultArrayPrefix: string;

  /** Number of indices scanned, starting at 0 */
  faultArraySize: number;

  /** Key of the standalone system fault flag */
  systemFaultTag: string;
}
