#!/usr/bin/env node
/**
 * bb84 — BB84 key distribution + XOR message demo
 *
 * CLI args:
 *   --message <text>  Message to send through the cipher
 *   --rounds <n>      Qubits exchanged during key agreement (default BB84_ROUNDS or 8)
 *   --seed <text>     Seed both randomness streams for a reproducible run
 *   --batch           Measure all rounds in one oracle call
 *   --json            Print the report as JSON
 *   --serve           Start the RPC server instead of running once
 *   --port <n>        RPC port (with --serve)
 */
import { existsSync, realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { loadConfig, parseIntSetting, MAX_ROUNDS, type Config } from './config.js'
import { Bb84Error } from './errors.js'
import { log } from './log.js'
import { startRpcServer } from './rpc.js'
import { createRunContext, runSecureMessage } from './secureMessage.js'
import { formatReport, serializeReport } from './utils.js'

export const USAGE = `bb84 — BB84 quantum key distribution simulator

Usage: bb84 --message <text> [options]
       bb84 --serve [--port <n>]

Options:
  --message <text>  Message to encrypt with the agreed key
  --rounds <n>      Rounds of qubit exchange (default 8)
  --seed <text>     Seed for a reproducible run
  --batch           Measure all rounds in one oracle call
  --json            Print the report as JSON
  --serve           Start the RPC server
  --port <n>        RPC port (default 3084)
  -h, --help        Show this help`

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; message: string; rounds: number; seed?: string; batch: boolean; json: boolean }
  | { kind: 'serve'; config: Config }

const RUN_OPTIONS = ['message', 'rounds', 'seed']
const RUN_FLAGS = ['json', 'batch']
const SERVE_OPTIONS = ['port']

export function parseCliArgs(args: readonly string[], config: Config): CliCommand {
  const opts: Record<string, string> = {}
  const flags = new Set<string>()

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--') continue
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' }
    } else if (arg === '--json' || arg === '--serve' || arg === '--batch') {
      flags.add(arg.slice(2))
    } else if (arg.startsWith('--') && [...RUN_OPTIONS, ...SERVE_OPTIONS].includes(arg.slice(2))) {
      const value = args[i + 1]
      if (value === undefined || value.startsWith('--')) throw new Bb84Error(`${arg} needs a value`)
      opts[arg.slice(2)] = value
      i++
    } else {
      throw new Bb84Error(`Unexpected argument: ${arg}`)
    }
  }

  const given = [...Object.keys(opts), ...flags].filter((name) => name !== 'serve')

  if (flags.has('serve')) {
    const stray = given.find((name) => !SERVE_OPTIONS.includes(name))
    if (stray !== undefined) throw new Bb84Error(`--${stray} does not apply with --serve`)
    return {
      kind: 'serve',
      config: { ...config, rpcPort: parseIntSetting('--port', opts['port'], config.rpcPort, 0, 65535) },
    }
  }

  const stray = given.find((name) => !RUN_OPTIONS.includes(name) && !RUN_FLAGS.includes(name))
  if (stray !== undefined) throw new Bb84Error(`--${stray} only applies with --serve`)

  const message = opts['message']
  if (message === undefined) throw new Bb84Error('--message is required (see --help)')

  return {
    kind: 'run',
    message,
    rounds: parseIntSetting('--rounds', opts['rounds'], config.rounds, 1, MAX_ROUNDS),
    seed: opts['seed'],
    batch: flags.has('batch'),
    json: flags.has('json'),
  }
}

/** Returns the process exit code */
export function main(args: readonly string[], env: NodeJS.ProcessEnv = process.env): number {
  let command: CliCommand
  try {
    command = parseCliArgs(args, loadConfig(env))
  } catch (error) {
    if (!(error instanceof Bb84Error)) throw error
    console.error(`bb84: ${error.message}`)
    return 2
  }

  if (command.kind === 'help') {
    console.log(USAGE)
    return 0
  }

  if (command.kind === 'serve') {
    startRpcServer(command.config)
    return 0
  }

  const { message, rounds, seed, batch, json } = command
  const result = runSecureMessage(message, { roundCount: rounds, batch, ...createRunContext(seed) })
  if (!result.ok) {
    log.debug({ component: 'cli', kind: result.error.name }, 'Run failed')
    console.error(`bb84: ${result.error.message}`)
    return 1
  }

  console.log(json ? JSON.stringify(serializeReport(result.value), null, 2) : formatReport(result.value))
  return 0
}

function isEntryPoint(): boolean {
  const entry = process.argv[1]
  if (!entry || !existsSync(entry)) return false
  return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url))
}

if (isEntryPoint()) {
  process.exitCode = main(process.argv.slice(2))
}
