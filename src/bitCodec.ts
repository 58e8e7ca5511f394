/**
 * Text ↔ bit conversion: one 8-bit MSB-first group per character.
 *
 * Only code points 0–255 (Latin-1) fit a group; anything wider is rejected
 * rather than truncated.
 */
import { MalformedBitLength, UnsupportedCharacter } from './errors.js'
import { err, ok, type Bit, type PlaintextBits, type Result } from './types.js'

export const BITS_PER_CHAR = 8
export const MAX_CODE_POINT = 0xff

export function byteToBits(byte: number): Bit[] {
  const bits: Bit[] = []
  for (let shift = BITS_PER_CHAR - 1; shift >= 0; shift--) {
    bits.push((byte >> shift) & 1 ? 1 : 0)
  }
  return bits
}

export function encodeText(text: string): Result<PlaintextBits, UnsupportedCharacter> {
  const bits: Bit[] = []
  let index = 0
  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0
    if (codePoint > MAX_CODE_POINT) return err(new UnsupportedCharacter(char, codePoint, index))
    bits.push(...byteToBits(codePoint))
    index++
  }
  return ok(bits)
}

export function decodeBits(bits: readonly Bit[]): Result<string, MalformedBitLength> {
  if (bits.length % BITS_PER_CHAR !== 0) return err(new MalformedBitLength(bits.length))

  let text = ''
  for (let i = 0; i < bits.length; i += BITS_PER_CHAR) {
    let code = 0
    for (let j = 0; j < BITS_PER_CHAR; j++) code = (code << 1) | bits[i + j]
    text += String.fromCharCode(code)
  }
  return ok(text)
}

/** Render bits as a compact 0/1 string */
export function formatBits(bits: readonly Bit[]): string {
  return bits.join('')
}

export function parseBits(text: string): Bit[] {
  return Array.from(text, (c, i): Bit => {
    if (c === '0') return 0
    if (c === '1') return 1
    throw new RangeError(`Invalid bit character ${JSON.stringify(c)} at position ${i}`)
  })
}
