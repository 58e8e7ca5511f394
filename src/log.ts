/**
 * Structured logger for bb84 — powered by pino
 *
 * Usage:
 *   import { log } from './log.js'
 *   log.info({ component: 'rpc' }, 'Listening on port 3084')
 *
 * Set LOG_LEVEL=debug to see per-round protocol traces.
 */
import pino from 'pino'

const transport = process.stdout.isTTY
  ? pino.transport({ target: 'pino-pretty', options: { colorize: true } })
  : undefined

export const log = pino(
  { name: 'bb84', level: process.env.LOG_LEVEL || 'info' },
  transport,
)
