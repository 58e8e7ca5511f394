import { describe, it, expect, vi, afterEach } from 'vitest'
import { main, parseCliArgs, USAGE } from '../cli.js'
import { DEFAULT_ROUNDS, DEFAULT_RPC_PORT, loadConfig, type Config } from '../config.js'
import { Bb84Error, ConfigError } from '../errors.js'

const BASE: Config = { rounds: 8, rpcPort: 3084, bindAddress: '127.0.0.1', logLevel: 'silent' }

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      rounds: DEFAULT_ROUNDS,
      rpcPort: DEFAULT_RPC_PORT,
      bindAddress: '127.0.0.1',
      logLevel: 'info',
    })
  })

  it('reads overrides', () => {
    const config = loadConfig({ BB84_ROUNDS: '16', BB84_RPC_PORT: '0', BB84_BIND: '0.0.0.0', LOG_LEVEL: 'debug' })
    expect(config).toEqual({ rounds: 16, rpcPort: 0, bindAddress: '0.0.0.0', logLevel: 'debug' })
  })

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ BB84_ROUNDS: 'abc' })).toThrow(ConfigError)
    expect(() => loadConfig({ BB84_ROUNDS: '0' })).toThrow('BB84_ROUNDS must be between 1 and 1000000, got 0')
    expect(() => loadConfig({ BB84_RPC_PORT: '70000' })).toThrow(ConfigError)
  })

  it('rejects unknown log levels', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError)
  })
})

describe('parseCliArgs', () => {
  it('builds a run with config defaults', () => {
    expect(parseCliArgs(['--message', 'HI'], BASE)).toEqual({
      kind: 'run',
      message: 'HI',
      rounds: 8,
      seed: undefined,
      batch: false,
      json: false,
    })
  })

  it('accepts rounds, seed and flags', () => {
    expect(parseCliArgs(['--', '--message', 'HI', '--rounds', '32', '--seed', 'abc', '--json', '--batch'], BASE)).toEqual({
      kind: 'run',
      message: 'HI',
      rounds: 32,
      seed: 'abc',
      batch: true,
      json: true,
    })
  })

  it('builds a serve command with the port override', () => {
    expect(parseCliArgs(['--serve', '--port', '0'], BASE)).toEqual({ kind: 'serve', config: { ...BASE, rpcPort: 0 } })
  })

  it('recognises help', () => {
    expect(parseCliArgs(['-h'], BASE)).toEqual({ kind: 'help' })
  })

  it('rejects an option whose value is missing or is another option', () => {
    expect(() => parseCliArgs(['--message', '--json'], BASE)).toThrow('--message needs a value')
    expect(() => parseCliArgs(['--message', 'HI', '--seed'], BASE)).toThrow('--seed needs a value')
  })

  it('rejects options that do not fit the mode', () => {
    expect(() => parseCliArgs(['--message', 'HI', '--port', '0'], BASE)).toThrow('--port only applies with --serve')
    expect(() => parseCliArgs(['--serve', '--rounds', '16'], BASE)).toThrow('--rounds does not apply with --serve')
    expect(() => parseCliArgs(['--serve', '--json'], BASE)).toThrow('--json does not apply with --serve')
    expect(() => parseCliArgs(['--message', 'HI', '--colour', 'red'], BASE)).toThrow('Unexpected argument: --colour')
  })

  it('rejects a missing message and stray arguments', () => {
    expect(() => parseCliArgs([], BASE)).toThrow('--message is required (see --help)')
    expect(() => parseCliArgs(['hello'], BASE)).toThrow(Bb84Error)
    expect(() => parseCliArgs(['--message', 'HI', '--rounds', 'many'], BASE)).toThrow(ConfigError)
  })
})

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints the transcript of a seeded run', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    const code = main(['--message', 'HI', '--rounds', '64', '--seed', 'cli'], { LOG_LEVEL: 'silent' })
    expect(code).toBe(0)
    const printed = String(out.mock.calls[0][0]).split('\n')
    expect(printed).toHaveLength(7)
    expect(printed[0].startsWith('Sender bits:     [')).toBe(true)
    expect(printed[6]).toBe('Decrypted msg:   HI')
  })

  it('prints JSON when asked', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    expect(main(['--message', 'HI', '--rounds', '64', '--seed', 'cli', '--json'], {})).toBe(0)
    const report = JSON.parse(String(out.mock.calls[0][0]))
    expect(report.decryptedMessage).toBe('HI')
    expect(report.cipherBits).toHaveLength(16)
  })

  it('prints usage for --help', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {})
    expect(main(['--help'], {})).toBe(0)
    expect(out).toHaveBeenCalledWith(USAGE)
  })

  it('returns 2 on bad arguments and 1 on a failed run', () => {
    const errOut = vi.spyOn(console, 'error').mockImplementation(() => {})
    expect(main([], {})).toBe(2)
    expect(errOut).toHaveBeenLastCalledWith('bb84: --message is required (see --help)')
    expect(main(['--message', '€', '--seed', 'cli', '--rounds', '64'], {})).toBe(1)
  })
})
