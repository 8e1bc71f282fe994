/**
 * Terminal renderer
 * Turns a health summary into coloured text: header, metric cards, faults and the tag table
 */

import chalk from 'chalk'

import { tagEntries } from '@core/tags'
import { formatClockTime } from '@core/timestamp'
import { formatDuration } from '@utils/time'

import type { HealthStatus, HealthSummary, SourceMetrics } from '@core/health'
import type { DashboardConfig } from '$types'
import type { RenderOptions } from './types'

const WIDTH = 60

const STATUS_STYLES: Record<HealthStatus, (text: string) => string> = {
  CONNECTING: chalk.cyan,
  ONLINE: chalk.green,
  SLOW: chalk.yellow,
  OFFLINE: chalk.red,
  FAULT: chalk.bgRed.white.bold,
  INVALID: chalk.magenta,
}

/**
 * Delay before the next poll
 * Only an OFFLINE source is polled at the slower offline interval
 */
export function pollDelayMs(status: HealthStatus, config: Pick<DashboardConfig, 'POLL_INTERVAL_MS' | 'OFFLINE_POLL_INTERVAL_MS'>): number {
  return status === 'OFFLINE' ? config.OFFLINE_POLL_INTERVAL_MS : config.POLL_INTERVAL_MS
}

export function statusBadge(status: HealthStatus): string {
  return STATUS_STYLES[status](`[ ${status} ]`)
}

/**
 * Metric cards with their display precision
 */
export function formatCards(metrics: SourceMetrics, sourceState: string): string[] {
  return [
    `  ${'Beam Voltage'.padEnd(17)}${chalk.bold(metrics.beamVoltageKv.toFixed(1) + ' kV')}`,
    `  ${'Source Pressure'.padEnd(17)}${chalk.bold(metrics.sourcePressureMbar.toExponential(1) + ' mbar')}`,
    `  ${'Magnet'.padEnd(17)}${chalk.bold(metrics.magnetCurrentA.toFixed(2) + ' A')}`,
    `  ${'State'.padEnd(17)}${chalk.bold(sourceState)}`,
  ]
}

/**
 * Fault section lines
 */
export function formatFaults(summary: HealthSummary): string[] {
  const faults = summary.faults
  if (!faults.active) {
    return [chalk.green('✓ No active faults')]
  }

  const lines = [chalk.red.bold(`✗ Faults (${faults.entries.length})`)]
  if (faults.entries.length === 0) {
    lines.push(chalk.red('  System fault flag set, check logs'))
  }
  for (const entry of faults.entries) {
    lines.push(chalk.red(`  #${entry.index} ${entry.description}`))
  }
  return lines
}

/**
 * Tag table sorted by key
 */
export function formatTagTable(summary: HealthSummary): string[] {
  const entries = tagEntries(summary.tags)
  if (entries.length === 0) {
    return [chalk.gray('No tags yet')]
  }

  let keyWidth = 'Tag Name'.length
  for (const [key] of entries) {
    keyWidth = Math.max(keyWidth, key.length)
  }

  const lines = [chalk.bold(`${'Tag Name'.padEnd(keyWidth)}  Value`)]
  for (const [key, value] of entries) {
    lines.push(`${key.padEnd(keyWidth)}  ${String(value)}`)
  }
  return lines
}

/**
 * Render the whole screen
 * @returns Lines joined with newlines, no trailing newline
 */
export function renderSummary(summary: HealthSummary, options: RenderOptions): string {
  const lines: string[] = []

  // Header
  lines.push(chalk.cyan('═'.repeat(WIDTH)))
  lines.push(`${chalk.cyan.bold('Ion Source Monitor')}  ${statusBadge(summary.status)}`)
  lines.push(chalk.cyan('═'.repeat(WIDTH)))

  if (summary.lastUpdate === null || summary.elapsedSec === null) {
    lines.push(chalk.gray(`Waiting for the first snapshot from ${options.sourceName}...`))
  } else {
    lines.push(`Last update: ${summary.lastUpdate} (${formatDuration(summary.elapsedSec)} ago) via ${options.sourceName}`)
  }
  if (options.receivedAt != null) {
    lines.push(chalk.gray(`Data received at ${formatClockTime(options.receivedAt)}`))
  }

  // Cards
  lines.push(chalk.gray('─'.repeat(WIDTH)))
  lines.push(...formatCards(summary.metrics, summary.sourceState))

  // Faults
  lines.push(chalk.gray('─'.repeat(WIDTH)))
  lines.push(...formatFaults(summary))

  // Tags
  if (options.showTable) {
    lines.push(chalk.gray('─'.repeat(WIDTH)))
    lines.push(...formatTagTable(summary))
  }

  // Footer
  if (options.stats || options.lastError) {
    lines.push(chalk.gray('─'.repeat(WIDTH)))
  }
  if (options.stats) {
    const s = options.stats
    lines.push(chalk.gray(`Polls: ${s.polls} | accepted ${s.accepted} | out-of-order ${s.outOfOrder} | unresolved ${s.unresolved} | empty ${s.empty} | malformed ${s.malformed}`))
  }
  if (options.lastError) {
    lines.push(chalk.yellow(`Last problem: ${options.lastError}`))
  }

  return lines.join('\n')
}
