import { describe, it, expect } from 'vitest'
import { createSimulatedOracle, hadamard, prepareQubit, zeroProbability256, type MeasurementRequest } from '../oracle.js'
import { createCryptoRandomSource, createSeededRandomSource, drawBasis } from '../random.js'
import { drawSentSymbol } from '../symbols.js'
import type { Basis, Bit, SentSymbol } from '../types.js'
import { noRandomness, scriptedRandomSource } from './fixtures.js'

const SYMBOLS: SentSymbol[] = [
  { bit: 0, basis: 'Z' },
  { bit: 1, basis: 'Z' },
  { bit: 0, basis: 'X' },
  { bit: 1, basis: 'X' },
]

function otherBasis(basis: Basis): Basis {
  return basis === 'Z' ? 'X' : 'Z'
}

describe('state preparation', () => {
  it('encodes rectilinear bits as computational states', () => {
    expect(prepareQubit({ bit: 0, basis: 'Z' })).toEqual([1, 0])
    expect(prepareQubit({ bit: 1, basis: 'Z' })).toEqual([0, 1])
  })

  it('encodes diagonal bits as |+⟩ and |−⟩', () => {
    const [p0, p1] = prepareQubit({ bit: 0, basis: 'X' })
    expect(p0).toBeCloseTo(Math.SQRT1_2)
    expect(p1).toBeCloseTo(Math.SQRT1_2)
    const [m0, m1] = prepareQubit({ bit: 1, basis: 'X' })
    expect(m0).toBeCloseTo(Math.SQRT1_2)
    expect(m1).toBeCloseTo(-Math.SQRT1_2)
  })

  it('H is its own inverse up to float error', () => {
    const [a0, a1] = hadamard(hadamard([0.6, 0.8]))
    expect(a0).toBeCloseTo(0.6)
    expect(a1).toBeCloseTo(0.8)
  })
})

describe('zeroProbability256', () => {
  it('is certain when bases match', () => {
    for (const sent of SYMBOLS) {
      const qubit = prepareQubit(sent)
      expect(zeroProbability256(qubit, sent.basis)).toBe(sent.bit === 0 ? 256 : 0)
    }
  })

  it('is exactly one half when bases differ', () => {
    for (const sent of SYMBOLS) {
      expect(zeroProbability256(prepareQubit(sent), otherBasis(sent.basis))).toBe(128)
    }
  })
})

describe('createSimulatedOracle', () => {
  it('returns the sent bit on matching bases without drawing randomness', () => {
    const oracle = createSimulatedOracle(noRandomness)
    for (const sent of SYMBOLS) {
      expect(oracle.measure(sent, sent.basis)).toBe(sent.bit)
    }
  })

  it('draws one byte per mismatched measurement', () => {
    const low = scriptedRandomSource([0])
    const high = scriptedRandomSource([1])
    // 0 < 128 → 0, 255 >= 128 → 1, regardless of the sent bit
    expect(createSimulatedOracle(low).measure({ bit: 1, basis: 'Z' }, 'X')).toBe(0)
    expect(createSimulatedOracle(high).measure({ bit: 0, basis: 'X' }, 'Z')).toBe(1)
    expect(low.draws).toBe(8)
    expect(high.draws).toBe(8)
  })

  it('splits mismatched outcomes evenly over many samples', () => {
    const rng = createCryptoRandomSource()
    const oracle = createSimulatedOracle(createCryptoRandomSource())
    const counts = { 0: 0, 1: 0 }
    const bySentBit = { 0: { zeros: 0, total: 0 }, 1: { zeros: 0, total: 0 } }
    for (let i = 0; i < 100_000; i++) {
      const sent = drawSentSymbol(rng)
      const measured = oracle.measure(sent, otherBasis(sent.basis))
      counts[measured]++
      bySentBit[sent.bit].total++
      if (measured === 0) bySentBit[sent.bit].zeros++
    }
    const p0 = counts[0] / 100_000
    expect(p0).toBeGreaterThan(0.49)
    expect(p0).toBeLessThan(0.51)
    // Independent of what was sent
    expect(bySentBit[0].zeros / bySentBit[0].total).toBeCloseTo(0.5, 1)
    expect(bySentBit[1].zeros / bySentBit[1].total).toBeCloseTo(0.5, 1)
  })

  it('measureBatch attributes results in request order, same as sequential measure', () => {
    const protocol = createSeededRandomSource('batch-requests')
    const requests: MeasurementRequest[] = Array.from({ length: 64 }, () => ({
      sent: drawSentSymbol(protocol),
      receiverBasis: drawBasis(protocol),
    }))

    const sequential = createSimulatedOracle(createSeededRandomSource('batch-channel'))
    const batched = createSimulatedOracle(createSeededRandomSource('batch-channel'))
    const expected: Bit[] = requests.map(({ sent, receiverBasis }) => sequential.measure(sent, receiverBasis))

    expect(batched.measureBatch?.(requests)).toEqual(expected)
    requests.forEach(({ sent, receiverBasis }, i) => {
      if (sent.basis === receiverBasis) expect(expected[i]).toBe(sent.bit)
    })
  })
})
