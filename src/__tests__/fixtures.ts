/**
 * Scripted randomness and oracles for deterministic protocol tests.
 *
 * Per round the protocol draws: sender bit, sender basis, receiver basis
 * (0 → Z, 1 → X). Scripts cycle when exhausted.
 */
import type { ChannelOracle } from '../oracle.js'
import type { RandomSource } from '../random.js'
import type { Basis, Bit, SentSymbol } from '../types.js'

export function scriptedRandomSource(script: readonly Bit[]): RandomSource & { draws: number } {
  if (script.length === 0) throw new Error('Script must not be empty')
  return {
    draws: 0,
    nextBit() {
      return script[this.draws++ % script.length]
    },
  }
}

/** Every round: sender bit alternates 1,0 and both parties pick the same basis */
export const ALWAYS_MATCH: readonly Bit[] = [1, 0, 0, 0, 1, 1]

/** Every round: sender in Z, receiver in X */
export const ALWAYS_MISMATCH: readonly Bit[] = [1, 0, 1, 0, 0, 1]

/** Fails the test if the oracle asks for randomness */
export const noRandomness: RandomSource = {
  nextBit() {
    throw new Error('unexpected random draw')
  },
}

export function recordingOracle(inner: ChannelOracle): ChannelOracle & { calls: Array<{ sent: SentSymbol; receiverBasis: Basis }> } {
  const calls: Array<{ sent: SentSymbol; receiverBasis: Basis }> = []
  return {
    calls,
    measure(sent, receiverBasis) {
      calls.push({ sent, receiverBasis })
      return inner.measure(sent, receiverBasis)
    },
  }
}
