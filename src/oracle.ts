/**
 * Channel oracle: the boundary to whatever executes the qubits.
 *
 * Contract for any implementation:
 *   - receiver basis == sender basis → returns the sent bit, always
 *   - receiver basis != sender basis → 0 or 1 with probability 1/2, independent of the sent bit
 */
import type { RandomSource } from './random.js'
import { drawByte } from './random.js'
import type { Basis, Bit, SentSymbol } from './types.js'

export interface MeasurementRequest {
  readonly sent: SentSymbol
  readonly receiverBasis: Basis
}

export interface ChannelOracle {
  measure(sent: SentSymbol, receiverBasis: Basis): Bit
  /** Optional batched form; result[i] belongs to requests[i] */
  measureBatch?(requests: readonly MeasurementRequest[]): Bit[]
}

/** Real amplitudes of a single qubit, [amp(|0⟩), amp(|1⟩)] */
export type Qubit = readonly [number, number]

const GROUND: Qubit = [1, 0]

export function pauliX([a0, a1]: Qubit): Qubit {
  return [a1, a0]
}

export function hadamard([a0, a1]: Qubit): Qubit {
  return [Math.SQRT1_2 * (a0 + a1), Math.SQRT1_2 * (a0 - a1)]
}

/** Sender side: |bit⟩, rotated into the diagonal basis when needed */
export function prepareQubit({ bit, basis }: SentSymbol): Qubit {
  const flipped = bit === 1 ? pauliX(GROUND) : GROUND
  return basis === 'X' ? hadamard(flipped) : flipped
}

/**
 * P(measure 0) quantised to 1/256 steps. Quantising absorbs the float error
 * of H·H and makes the mismatched-basis case exactly 128/256.
 */
export function zeroProbability256(qubit: Qubit, receiverBasis: Basis): number {
  const [a0] = receiverBasis === 'X' ? hadamard(qubit) : qubit
  return Math.round(a0 * a0 * 256)
}

/**
 * Single-qubit state-vector simulator. Deterministic outcomes consume no
 * randomness; probabilistic ones consume one 8-bit sample from `rng`.
 */
export function createSimulatedOracle(rng: RandomSource): ChannelOracle {
  const sample = (p0: number): Bit => {
    if (p0 >= 256) return 0
    if (p0 <= 0) return 1
    return drawByte(rng) < p0 ? 0 : 1
  }

  return {
    measure(sent, receiverBasis) {
      return sample(zeroProbability256(prepareQubit(sent), receiverBasis))
    },
    measureBatch(requests) {
      // Build every circuit first, then sample in request order
      const probabilities = requests.map(({ sent, receiverBasis }) =>
        zeroProbability256(prepareQubit(sent), receiverBasis),
      )
      return probabilities.map(sample)
    },
  }
}
