/**
 * Symbol generation for both parties.
 *
 * Draw order within a round is fixed: sender bit, sender basis, receiver basis.
 */
import { drawBasis, type RandomSource } from './random.js'
import type { Basis, SentSymbol } from './types.js'

export function drawSentSymbol(rng: RandomSource): SentSymbol {
  const bit = rng.nextBit()
  const basis = drawBasis(rng)
  return { bit, basis }
}

export function drawReceiverBasis(rng: RandomSource): Basis {
  return drawBasis(rng)
}
