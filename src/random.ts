/**
 * Bit-level randomness sources.
 *
 * The protocol never touches ambient randomness: every draw goes through a
 * RandomSource handed in by the caller, so runs can be replayed from a seed.
 */
import { sha256 } from '@noble/hashes/sha2.js'
import { concatBytes, randomBytes, utf8ToBytes } from '@noble/hashes/utils.js'
import type { Basis, Bit } from './types.js'

export interface RandomSource {
  nextBit(): Bit
}

/** Serves bits MSB-first out of successive byte blocks */
class BlockBitSource implements RandomSource {
  private block: Uint8Array = new Uint8Array(0)
  private bitPos = 0

  constructor(private readonly nextBlock: () => Uint8Array) {}

  nextBit(): Bit {
    if (this.bitPos >= this.block.length * 8) {
      this.block = this.nextBlock()
      this.bitPos = 0
    }
    const byte = this.block[this.bitPos >> 3]
    const bit = (byte >> (7 - (this.bitPos & 7))) & 1
    this.bitPos++
    return bit === 1 ? 1 : 0
  }
}

/** CSPRNG-backed source (32 bytes per refill) */
export function createCryptoRandomSource(): RandomSource {
  return new BlockBitSource(() => randomBytes(32))
}

/** Encode a counter as 4-byte big-endian */
function uint32BE(n: number): Uint8Array {
  const buf = new Uint8Array(4)
  new DataView(buf.buffer).setUint32(0, n >>> 0, false)
  return buf
}

/**
 * Deterministic source: SHA-256(seed || counter) blocks, counter starting at 0.
 * Same seed, same bit stream.
 */
export function createSeededRandomSource(seed: string): RandomSource {
  const seedBytes = utf8ToBytes(seed)
  let counter = 0
  return new BlockBitSource(() => sha256(concatBytes(seedBytes, uint32BE(counter++))))
}

export function drawBasis(rng: RandomSource): Basis {
  return rng.nextBit() === 0 ? 'Z' : 'X'
}

/** Uniform integer in [0, 256) assembled from eight draws, MSB first */
export function drawByte(rng: RandomSource): number {
  let value = 0
  for (let i = 0; i < 8; i++) value = (value << 1) | rng.nextBit()
  return value
}
