/**
 * BB84 key agreement
 *
 * Flow: sender draws (bit, basis) per round → receiver draws a basis and
 *       measures through the channel oracle → both publish bases and keep
 *       only rounds where they coincide (sifting).
 */
import { InvalidRoundCount, KeyAgreementFailure } from './errors.js'
import { log } from './log.js'
import type { ChannelOracle, MeasurementRequest } from './oracle.js'
import type { RandomSource } from './random.js'
import { drawReceiverBasis, drawSentSymbol } from './symbols.js'
import { err, ok, type Basis, type Bit, type Result, type Round, type SiftedKey } from './types.js'

export interface KeyAgreementOptions {
  /** Checked between rounds; an aborted run throws `signal.reason` */
  signal?: AbortSignal
  /** Query the oracle once for all rounds when it supports `measureBatch` */
  batch?: boolean
}

/** Full transcript of one run, column-wise as both parties would tabulate it */
export interface KeyAgreementSession {
  readonly roundCount: number
  readonly rounds: readonly Round[]
  readonly senderBits: readonly Bit[]
  readonly senderBases: readonly Basis[]
  readonly receiverBases: readonly Basis[]
  readonly receiverResults: readonly Bit[]
  /** Round indices whose bases matched */
  readonly matchedRounds: readonly number[]
  readonly siftedKey: SiftedKey
}

const logger = log.child({ component: 'bb84' })

function assertRoundCount(roundCount: number): void {
  if (!Number.isInteger(roundCount) || roundCount < 1) throw new InvalidRoundCount(roundCount)
}

/** Run the quantum phase: draw symbols and measure every round */
export function exchangeRounds(
  roundCount: number,
  oracle: ChannelOracle,
  rng: RandomSource,
  options: KeyAgreementOptions = {},
): Round[] {
  assertRoundCount(roundCount)
  const { signal, batch = false } = options

  const requests: MeasurementRequest[] = []
  for (let i = 0; i < roundCount; i++) {
    signal?.throwIfAborted()
    requests.push({ sent: drawSentSymbol(rng), receiverBasis: drawReceiverBasis(rng) })
  }

  if (batch && oracle.measureBatch) {
    signal?.throwIfAborted()
    const measured = oracle.measureBatch(requests)
    if (measured.length !== requests.length) {
      throw new Error(`Oracle returned ${measured.length} results for ${requests.length} rounds`)
    }
    return requests.map(({ sent, receiverBasis }, index) => ({
      index,
      sent,
      received: { basis: receiverBasis, measuredBit: measured[index] },
    }))
  }

  const rounds: Round[] = []
  for (const [index, { sent, receiverBasis }] of requests.entries()) {
    signal?.throwIfAborted()
    const measuredBit = oracle.measure(sent, receiverBasis)
    rounds.push({ index, sent, received: { basis: receiverBasis, measuredBit } })
  }
  return rounds
}

/** Keep the sender bit of every round whose bases coincide */
export function siftKey(rounds: readonly Round[]): SiftedKey {
  return rounds.filter((r) => r.sent.basis === r.received.basis).map((r) => r.sent.bit)
}

export function runKeyAgreementSession(
  roundCount: number,
  oracle: ChannelOracle,
  rng: RandomSource,
  options: KeyAgreementOptions = {},
): Result<KeyAgreementSession, KeyAgreementFailure> {
  const rounds = exchangeRounds(roundCount, oracle, rng, options)
  const matchedRounds = rounds.filter((r) => r.sent.basis === r.received.basis).map((r) => r.index)
  const siftedKey = siftKey(rounds)

  logger.debug({ roundCount, matched: matchedRounds.length }, 'Sifting complete')

  if (siftedKey.length === 0) {
    logger.warn({ roundCount }, 'Key agreement failed: no basis matched')
    return err(new KeyAgreementFailure(roundCount))
  }

  return ok({
    roundCount,
    rounds,
    senderBits: rounds.map((r) => r.sent.bit),
    senderBases: rounds.map((r) => r.sent.basis),
    receiverBases: rounds.map((r) => r.received.basis),
    receiverResults: rounds.map((r) => r.received.measuredBit),
    matchedRounds,
    siftedKey,
  })
}

export function runKeyAgreement(
  roundCount: number,
  oracle: ChannelOracle,
  rng: RandomSource,
  options: KeyAgreementOptions = {},
): Result<SiftedKey, KeyAgreementFailure> {
  const session = runKeyAgreementSession(roundCount, oracle, rng, options)
  return session.ok ? ok(session.value.siftedKey) : session
}
