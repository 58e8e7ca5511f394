import express from 'express'
import cors from 'cors'
import type { Request, Response, NextFunction } from 'express'
import type { Server } from 'node:http'
import { formatBits } from './bitCodec.js'
import { VERSION, type Config } from './config.js'
import { Bb84Error } from './errors.js'
import { runKeyAgreementSession } from './keyAgreement.js'
import { log } from './log.js'
import { createRunContext, runSecureMessage } from './secureMessage.js'
import { err, ok, type Result } from './types.js'
import { serializeReport } from './utils.js'

/** Maximum JSON body size */
const MAX_BODY_SIZE = '64kb'

/** Largest round count a single request may ask for */
export const MAX_RPC_ROUNDS = 100_000
/** Longest message accepted, in characters */
export const MAX_RPC_MESSAGE_LENGTH = 4096

export interface RateLimits {
  /** GET requests per window, per IP */
  getRequests: number
  /** Protocol rounds simulated per window, per IP, summed over POSTs */
  postRounds: number
  windowMs: number
}

export const DEFAULT_RATE_LIMITS: RateLimits = {
  getRequests: 600,
  postRounds: 200_000,
  windowMs: 60_000,
}

const logger = log.child({ component: 'rpc' })

/**
 * Per-IP sliding-window budget. Each charge records its cost; a charge is
 * refused once the costs still inside the window would exceed the limit.
 * POSTs are charged by the rounds they simulate, so one 100k-round run
 * weighs as much as a thousand 100-round runs.
 */
function createRateBudget(windowMs: number) {
  const ledgers = new Map<string, Array<{ at: number; cost: number }>>()

  // Drop idle ledgers every 5 minutes
  setInterval(() => {
    const cutoff = Date.now() - windowMs
    for (const [ip, entries] of ledgers) {
      if (entries.every((e) => e.at <= cutoff)) ledgers.delete(ip)
    }
  }, 5 * 60_000).unref()

  return (ip: string, cost: number, limit: number): boolean => {
    const cutoff = Date.now() - windowMs
    const entries = (ledgers.get(ip) ?? []).filter((e) => e.at > cutoff)
    const used = entries.reduce((sum, e) => sum + e.cost, 0)
    if (used + cost > limit) {
      ledgers.set(ip, entries)
      return false
    }
    entries.push({ at: Date.now(), cost })
    ledgers.set(ip, entries)
    return true
  }
}

function clientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown'
}

/** Status of an http-errors style error raised by body-parser, if it is a 4xx */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined
  if (typeof status !== 'number' || status < 400 || status > 499) return undefined
  return status
}

export interface RunRequest {
  rounds: number
  seed?: string
  message?: string
}

/** Validate a JSON body; `requireMessage` for the full message run */
export function parseRunRequest(body: unknown, defaultRounds: number, requireMessage: boolean): Result<RunRequest, string> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return err('Body must be a JSON object')

  const request: RunRequest = { rounds: defaultRounds }

  if ('rounds' in body && body.rounds !== undefined) {
    const { rounds } = body
    if (typeof rounds !== 'number' || !Number.isInteger(rounds) || rounds < 1 || rounds > MAX_RPC_ROUNDS) {
      return err(`rounds must be an integer between 1 and ${MAX_RPC_ROUNDS}`)
    }
    request.rounds = rounds
  }

  if ('seed' in body && body.seed !== undefined) {
    if (typeof body.seed !== 'string' || body.seed.length === 0) return err('seed must be a non-empty string')
    request.seed = body.seed
  }

  if ('message' in body && body.message !== undefined) {
    if (typeof body.message !== 'string') return err('message must be a string')
    if (body.message.length > MAX_RPC_MESSAGE_LENGTH) return err(`message exceeds ${MAX_RPC_MESSAGE_LENGTH} characters`)
    request.message = body.message
  } else if (requireMessage) {
    return err('message is required')
  }

  return ok(request)
}

function sendCoreError(res: Response, error: Bb84Error) {
  res.status(422).json({ error: error.message, kind: error.name })
}

function sendRateLimited(res: Response) {
  res.status(429).json({ error: 'Too many requests' })
}

export function createRpcApp(config: Config, limits: RateLimits = DEFAULT_RATE_LIMITS) {
  const app = express()
  app.use(cors())
  app.use(express.json({ limit: MAX_BODY_SIZE }))

  const charge = createRateBudget(limits.windowMs)
  app.use((req: Request, res: Response, next: NextFunction) => {
    // POSTs are charged per round once their body has been validated
    if (req.method !== 'POST' && !charge(clientIp(req), 1, limits.getRequests)) {
      sendRateLimited(res)
      return
    }
    next()
  })

  app.get('/api/v1/status', (req, res) => {
    res.json({ name: 'bb84', version: VERSION, defaultRounds: config.rounds, maxRounds: MAX_RPC_ROUNDS })
  })

  // Full run: key agreement, encryption, decryption
  app.post('/api/v1/bb84/run', (req, res) => {
    const parsed = parseRunRequest(req.body, config.rounds, true)
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error })
      return
    }
    const { rounds, seed, message = '' } = parsed.value
    if (!charge(clientIp(req), rounds, limits.postRounds)) {
      sendRateLimited(res)
      return
    }
    const result = runSecureMessage(message, { roundCount: rounds, ...createRunContext(seed) })
    if (!result.ok) {
      logger.info({ rounds, kind: result.error.name }, 'Run rejected')
      sendCoreError(res, result.error)
      return
    }
    res.json(serializeReport(result.value))
  })

  // Key agreement only
  app.post('/api/v1/bb84/key', (req, res) => {
    const parsed = parseRunRequest(req.body, config.rounds, false)
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error })
      return
    }
    const { rounds, seed } = parsed.value
    if (!charge(clientIp(req), rounds, limits.postRounds)) {
      sendRateLimited(res)
      return
    }
    const { rng, oracle } = createRunContext(seed)
    const session = runKeyAgreementSession(rounds, oracle, rng)
    if (!session.ok) {
      sendCoreError(res, session.error)
      return
    }
    const s = session.value
    res.json({
      roundCount: s.roundCount,
      senderBits: formatBits(s.senderBits),
      senderBases: s.senderBases.join(''),
      receiverBases: s.receiverBases.join(''),
      receiverResults: formatBits(s.receiverResults),
      matchedRounds: s.matchedRounds,
      siftedKey: formatBits(s.siftedKey),
    })
  })

  // Body-parser failures and anything thrown by a handler
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error)
      return
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid JSON body' })
      return
    }
    // Oversized body, bad charset or encoding
    const status = clientErrorStatus(error)
    if (status !== undefined) {
      res.status(status).json({ error: error instanceof Error ? error.message : 'Bad request' })
      return
    }
    logger.error({ err: error, path: req.path }, 'Unhandled RPC error')
    res.status(500).json({ error: 'Internal error' })
  })

  return app
}

export function startRpcServer(config: Config): Server {
  const app = createRpcApp(config)
  const { rpcPort: port, bindAddress } = config
  return app.listen(port, bindAddress, () => {
    logger.info({ port, bind: bindAddress, url: `http://${bindAddress}:${port}` }, 'RPC server listening')
  })
}
