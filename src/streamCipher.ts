import { LengthMismatch } from './errors.js'
import { err, ok, type Bit, type Result } from './types.js'

/**
 * bits[i] XOR key[i]. Self-inverse: applying it twice with the same key
 * gives back the input. A toy cipher, no confidentiality claims.
 */
export function xorTransform(bits: readonly Bit[], key: readonly Bit[]): Result<Bit[], LengthMismatch> {
  if (bits.length !== key.length) return err(new LengthMismatch(bits.length, key.length))
  return ok(bits.map((b, i): Bit => (b ^ key[i] ? 1 : 0)))
}
