// ==============================================================================
// DASHBOARD CLI TYPES
// Option and rendering shapes for the terminal dashboard.
// ==============================================================================

import type { SessionStats } from '@system/session'

/** Environment variables as dotenv leaves them on process.env */
export type EnvSource = Record<string, string | undefined>

/**
 * Global command line options (commander's parsed values)
 * `table` is false when --no-table is given
 */
export type CliOptions = {
  transport?: string
  url?: string
  topic?: string
  timeout?: string
  verbose?: boolean
  table: boolean
}

/**
 * What the renderer shows besides the health summary
 */
export interface RenderOptions {
  /** Transport name shown in the header */
  sourceName: string
  /** Include the full tag table */
  showTable: boolean
  /** Poll counters for the footer */
  stats?: SessionStats
  /** Most recent poll problem, if any */
  lastError?: string | null
  /** Clock time (epoch seconds) the last snapshot was received */
  receivedAt?: number | null
}
