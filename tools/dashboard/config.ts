/**
 * Configuration Management
 * Loads .env and maps environment variables and CLI options onto the dashboard settings
 */

import * as path from 'path'
import { fileURLToPath } from 'url'

import * as dotenv from 'dotenv'

import { APP_CONSTANTS, USER_CONFIG, buildConfig } from '../../src/boot/config'
import { LOG_LEVEL_NAMES, parseLogLevel } from '@logging'
import { ConfigValidationError } from '$types/errors'

import type { LogLevel } from '@logging'
import type { DashboardConfig, DashboardUserConfig, TransportKind } from '$types'
import type { CliOptions, EnvSource } from './types'

const PROJECT_ROOT = fileURLToPath(new URL('../../', import.meta.url))

const TRANSPORTS: readonly TransportKind[] = ['gist', 'relay', 'topic']

/**
 * Load the .env file from the project root into process.env
 * ? Uses override:true so .env values take precedence over system env vars
 */
export function loadEnvFile(envPath: string = path.resolve(PROJECT_ROOT, '.env')): void {
  dotenv.config({ path: envPath, override: true })
}

/**
 * Narrow a transport name
 * @throws {ConfigValidationError} For anything but gist, relay or topic
 */
export function parseTransport(value: string): TransportKind {
  const text = value.trim().toLowerCase()
  for (const kind of TRANSPORTS) {
    if (kind === text) return kind
  }
  const message = `TRANSPORT must be one of ${TRANSPORTS.join(', ')} (got '${value}')`
  throw new ConfigValidationError(message, [message])
}

/**
 * Read a log level given by name (DEBUG, INFO, WARN/WARNING, CRITICAL) or number (0-3)
 * @returns The level, or null when the text is neither
 */
export function parseLevelSetting(value: string): LogLevel | null {
  const text = value.trim()
  const name = /^[0-3]$/.test(text) ? LOG_LEVEL_NAMES[Number(text)] : text
  return parseLogLevel(name, APP_CONSTANTS.LOG_LEVELS)
}

// ----------------------------------------------------------
// ENV READERS
// Unset or blank variables keep the default
// ----------------------------------------------------------

function readRaw(env: EnvSource, key: string): string | null {
  const value = env[key]
  if (value === undefined || value.trim() === '') return null
  return value.trim()
}

function readString(env: EnvSource, key: string, fallback: string): string {
  const value = readRaw(env, key)
  return value === null ? fallback : value
}

// ? Number() rather than parseInt so '5s' becomes NaN and fails validation instead of reading as 5
function readNumber(env: EnvSource, key: string, fallback: number): number {
  const value = readRaw(env, key)
  return value === null ? fallback : Number(value)
}

function readBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const value = readRaw(env, key)
  return value === null ? fallback : value.toLowerCase() === 'true'
}

function readLevel(env: EnvSource, key: string, fallback: LogLevel, problems: string[]): LogLevel {
  const value = readRaw(env, key)
  if (value === null) return fallback

  const level = parseLevelSetting(value)
  if (level === null) {
    problems.push(`${key} must be one of DEBUG, INFO, WARNING, CRITICAL or 0-3 (got '${value}')`)
    return fallback
  }
  return level
}

function readTransport(env: EnvSource, key: string, fallback: TransportKind, problems: string[]): TransportKind {
  const value = readRaw(env, key)
  if (value === null) return fallback

  try {
    return parseTransport(value)
  } catch (error) {
    if (!(error instanceof ConfigValidationError)) throw error
    problems.push(error.message)
    return fallback
  }
}

/**
 * Apply environment variables to the user configuration
 *
 * Every key keeps its own name except GLOBAL_LOG_LEVEL (LOG_LEVEL) and
 * GLOBAL_LOG_AUTO_DEMOTE_HOURS (LOG_AUTO_DEMOTE_HOURS).
 *
 * @throws {ConfigValidationError} When a transport or log level cannot be read
 */
export function configFromEnv(env: EnvSource, base: DashboardUserConfig = USER_CONFIG): DashboardUserConfig {
  const problems: string[] = []

  const config: DashboardUserConfig = {
    // Source settings
    TRANSPORT: readTransport(env, 'TRANSPORT', base.TRANSPORT, problems),
    SOURCE_URL: readString(env, 'SOURCE_URL', base.SOURCE_URL),
    RELAY_ENVELOPE_FIELD: readString(env, 'RELAY_ENVELOPE_FIELD', base.RELAY_ENVELOPE_FIELD),
    TOPIC_SERVER: readString(env, 'TOPIC_SERVER', base.TOPIC_SERVER),
    TOPIC_NAME: readString(env, 'TOPIC_NAME', base.TOPIC_NAME),
    FETCH_TIMEOUT_MS: readNumber(env, 'FETCH_TIMEOUT_MS', base.FETCH_TIMEOUT_MS),

    // Health tiers and faults
    SLOW_THRESHOLD_SEC: readNumber(env, 'SLOW_THRESHOLD_SEC', base.SLOW_THRESHOLD_SEC),
    OFFLINE_THRESHOLD_SEC: readNumber(env, 'OFFLINE_THRESHOLD_SEC', base.OFFLINE_THRESHOLD_SEC),
    FAULT_ARRAY_SIZE: readNumber(env, 'FAULT_ARRAY_SIZE', base.FAULT_ARRAY_SIZE),
    FAULT_TABLE_PATH: readString(env, 'FAULT_TABLE_PATH', base.FAULT_TABLE_PATH),

    // Polling
    POLL_INTERVAL_MS: readNumber(env, 'POLL_INTERVAL_MS', base.POLL_INTERVAL_MS),
    OFFLINE_POLL_INTERVAL_MS: readNumber(env, 'OFFLINE_POLL_INTERVAL_MS', base.OFFLINE_POLL_INTERVAL_MS),

    // Slack
    SLACK_ENABLED: readBoolean(env, 'SLACK_ENABLED', base.SLACK_ENABLED),
    SLACK_WEBHOOK_URL: readString(env, 'SLACK_WEBHOOK_URL', base.SLACK_WEBHOOK_URL),
    SLACK_LOG_LEVEL: readLevel(env, 'SLACK_LOG_LEVEL', base.SLACK_LOG_LEVEL, problems),
    SLACK_BUFFER_SIZE: readNumber(env, 'SLACK_BUFFER_SIZE', base.SLACK_BUFFER_SIZE),
    SLACK_RETRY_DELAY_SEC: readNumber(env, 'SLACK_RETRY_DELAY_SEC', base.SLACK_RETRY_DELAY_SEC),

    // Console
    CONSOLE_ENABLED: readBoolean(env, 'CONSOLE_ENABLED', base.CONSOLE_ENABLED),
    CONSOLE_LOG_LEVEL: readLevel(env, 'CONSOLE_LOG_LEVEL', base.CONSOLE_LOG_LEVEL, problems),
    CONSOLE_BUFFER_SIZE: readNumber(env, 'CONSOLE_BUFFER_SIZE', base.CONSOLE_BUFFER_SIZE),
    CONSOLE_INTERVAL_MS: readNumber(env, 'CONSOLE_INTERVAL_MS', base.CONSOLE_INTERVAL_MS),

    // File
    LOG_TO_FILE: readBoolean(env, 'LOG_TO_FILE', base.LOG_TO_FILE),
    LOG_FILE_PATH: readString(env, 'LOG_FILE_PATH', base.LOG_FILE_PATH),
    FILE_LOG_LEVEL: readLevel(env, 'FILE_LOG_LEVEL', base.FILE_LOG_LEVEL, problems),

    // Global logging
    GLOBAL_LOG_LEVEL: readLevel(env, 'LOG_LEVEL', base.GLOBAL_LOG_LEVEL, problems),
    GLOBAL_LOG_AUTO_DEMOTE_HOURS: readNumber(env, 'LOG_AUTO_DEMOTE_HOURS', base.GLOBAL_LOG_AUTO_DEMOTE_HOURS),
  }

  if (problems.length > 0) {
    throw new ConfigValidationError('Invalid environment configuration', problems)
  }

  return config
}

/**
 * Apply command line options on top of the environment
 * --verbose lowers both the global and the console level to DEBUG
 */
export function applyCliOptions(config: DashboardUserConfig, options: CliOptions): DashboardUserConfig {
  const debug = APP_CONSTANTS.LOG_LEVELS.DEBUG

  return {
    ...config,
    TRANSPORT: options.transport ? parseTransport(options.transport) : config.TRANSPORT,
    SOURCE_URL: options.url || config.SOURCE_URL,
    TOPIC_NAME: options.topic || config.TOPIC_NAME,
    FETCH_TIMEOUT_MS: options.timeout ? Number(options.timeout) : config.FETCH_TIMEOUT_MS,
    GLOBAL_LOG_LEVEL: options.verbose ? debug : config.GLOBAL_LOG_LEVEL,
    CONSOLE_LOG_LEVEL: options.verbose ? debug : config.CONSOLE_LOG_LEVEL,
  }
}

class ConfigManager {
  private userConfig: DashboardUserConfig

  constructor(env: EnvSource = process.env) {
    this.userConfig = configFromEnv(env)
  }

  /**
   * Configuration with command line options applied
   */
  withCliOptions(options: CliOptions): DashboardConfig {
    return buildConfig(applyCliOptions(this.userConfig, options))
  }

  get(): DashboardConfig {
    return buildConfig(this.userConfig)
  }
}

// Export the class
export { ConfigManager }
