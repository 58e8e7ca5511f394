/**
 * Runtime configuration from environment variables, with CLI overrides.
 *
 *   BB84_ROUNDS    default round count (default 8)
 *   BB84_RPC_PORT  RPC port (default 3084)
 *   BB84_BIND      RPC bind address (default 127.0.0.1)
 *   LOG_LEVEL      pino level (default info)
 */
import { readFileSync } from 'node:fs'
import { ConfigError } from './errors.js'

export interface Config {
  rounds: number
  rpcPort: number
  bindAddress: string
  logLevel: string
}

export const DEFAULT_ROUNDS = 8
export const DEFAULT_RPC_PORT = 3084
/** Upper bound accepted from config and the RPC; keeps a single run small */
export const MAX_ROUNDS = 1_000_000

/** package.json sits one level above both src/ and dist/ */
function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') return pkg.version
  throw new ConfigError('package.json has no version')
}

export const VERSION = readPackageVersion()

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export function parseIntSetting(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw === '') return fallback
  if (!/^\d+$/.test(raw)) throw new ConfigError(`${name} must be an integer, got "${raw}"`)
  const value = parseInt(raw, 10)
  if (value < min || value > max) throw new ConfigError(`${name} must be between ${min} and ${max}, got ${value}`)
  return value
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const logLevel = env.LOG_LEVEL || 'info'
  if (!LOG_LEVELS.includes(logLevel)) throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`)

  return {
    rounds: parseIntSetting('BB84_ROUNDS', env.BB84_ROUNDS, DEFAULT_ROUNDS, 1, MAX_ROUNDS),
    rpcPort: parseIntSetting('BB84_RPC_PORT', env.BB84_RPC_PORT, DEFAULT_RPC_PORT, 0, 65535),
    bindAddress: env.BB84_BIND || '127.0.0.1',
    logLevel,
  }
}
