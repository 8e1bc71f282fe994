#!/usr/bin/env tsx
/**
 * Ion Source Dashboard
 * Polls the instrument snapshot source and renders its health in the terminal
 */

import chalk from 'chalk'
import { program } from 'commander'

import { createDefaultDependencies, initialize } from '../../src/boot/init'
import { validateConfig } from '@validation'
import { ConfigValidationError, ValidationError } from '$types/errors'

import { ConfigManager, loadEnvFile } from './config'
import { pollDelayMs, renderSummary } from './render'

import type { Dashboard } from '../../src/boot/types'
import type { CliOptions } from './types'

function clearScreen() {
  process.stdout.write('\x1b[2J\x1b[0f') // Clear screen and move cursor to top
}

function hideCursor() {
  process.stdout.write('\x1b[?25l')
}

function showCursor() {
  process.stdout.write('\x1b[?25h')
}

/**
 * Print a startup failure and mark the process as failed
 */
function reportStartupError(error: unknown): void {
  if (error instanceof ConfigValidationError) {
    console.error(chalk.red.bold('Configuration errors:'))
    for (const problem of error.problems) {
      console.error(chalk.red(`  - ${problem}`))
    }
  } else if (error instanceof ValidationError) {
    console.error(chalk.red('Error:'), error.message)
  } else {
    throw error
  }
  process.exitCode = 1
}

/**
 * Wire the dashboard and wait until every log sink is ready
 */
function startDashboard(options: CliOptions): Promise<Dashboard> {
  const config = new ConfigManager().withCliOptions(options)
  return new Promise((resolve) => {
    initialize(config, createDefaultDependencies(), resolve)
  })
}

function lastProblem(dashboard: Dashboard): string | null {
  const error = dashboard.session.lastError()
  return error ? error.message : null
}

/**
 * Poll and redraw until SIGINT or SIGTERM
 */
async function watch(options: CliOptions): Promise<void> {
  const dashboard = await startDashboard(options)
  const { config, session, transport } = dashboard

  let timer: NodeJS.Timeout | undefined
  let stopped = false

  const cycle = async () => {
    await session.poll()
    if (stopped) return

    const summary = session.summary()
    clearScreen()
    console.log(renderSummary(summary, {
      sourceName: transport.name,
      showTable: options.table,
      stats: session.stats(),
      lastError: lastProblem(dashboard),
      receivedAt: session.lastReceived(),
    }))
    console.log(chalk.gray('\nMonitoring... (Press Ctrl+C to stop)'))

    timer = setTimeout(schedule, pollDelayMs(summary.status, config))
  }

  const schedule = () => {
    cycle().catch((error: unknown) => {
      stop()
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error))
      process.exitCode = 1
    })
  }

  // Handle exit
  const stop = () => {
    if (stopped) return
    stopped = true
    if (timer) {
      clearTimeout(timer)
    }
    dashboard.shutdown()
    showCursor()
  }

  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)

  hideCursor()
  schedule()
}

/**
 * Single poll, render and exit
 * ? Exit code 2 when the poll did not produce an accepted snapshot
 */
async function once(options: CliOptions): Promise<void> {
  const dashboard = await startDashboard(options)
  const outcome = await dashboard.session.poll()

  console.log(renderSummary(dashboard.session.summary(), {
    sourceName: dashboard.transport.name,
    showTable: options.table,
    lastError: lastProblem(dashboard),
    receivedAt: dashboard.session.lastReceived(),
  }))

  dashboard.shutdown()
  process.exitCode = outcome === 'accepted' ? 0 : 2
}

/**
 * Validate the effective configuration without polling
 */
function checkConfig(options: CliOptions): void {
  const config = new ConfigManager().withCliOptions(options)
  const result = validateConfig(config)

  for (const error of result.errors) {
    console.log(chalk.red(`✗ [${error.field}] ${error.message}`))
  }
  for (const warning of result.warnings) {
    console.log(chalk.yellow(`⚠ [${warning.field}] ${warning.message}`))
  }

  if (result.valid) {
    console.log(chalk.green('✓ Configuration OK'))
  } else {
    process.exitCode = 1
  }
}

/**
 * Run a command body, reporting configuration failures
 */
function guarded(body: (options: CliOptions) => void | Promise<void>): () => Promise<void> {
  return async () => {
    try {
      await body(program.opts<CliOptions>())
    } catch (error) {
      reportStartupError(error)
    }
  }
}

loadEnvFile()

program
  .name('ion-dashboard')
  .description('Monitor ion source health from a published snapshot feed')
  .option('-t, --transport <kind>', 'Snapshot transport (gist, relay, topic)')
  .option('-u, --url <url>', 'Source URL for the gist or relay transport')
  .option('--topic <name>', 'Topic name for the topic transport')
  .option('--timeout <ms>', 'Fetch timeout in milliseconds')
  .option('-v, --verbose', 'Log at DEBUG level on the console')
  .option('--no-table', 'Hide the full tag table')

program
  .command('watch', { isDefault: true })
  .description('Poll continuously and redraw the dashboard')
  .action(guarded(watch))

program
  .command('once')
  .description('Poll once, print the dashboard and exit')
  .action(guarded(once))

program
  .command('check-config')
  .description('Validate the configuration and exit')
  .action(guarded(checkConfig))

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error))
  process.exitCode = 1
})
