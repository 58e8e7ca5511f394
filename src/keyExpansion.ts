import { KeyExpansionError } from './errors.js'
import { err, ok, type ExpandedKey, type Result, type SiftedKey } from './types.js'

/**
 * Stretch (or cut) a sifted key to exactly `targetLength` bits by cycling it.
 * An empty sifted key is always an error, even for a zero-length target.
 */
export function expandKey(siftedKey: SiftedKey, targetLength: number): Result<ExpandedKey, KeyExpansionError> {
  if (!Number.isInteger(targetLength) || targetLength < 0) {
    throw new RangeError(`Target length must be a non-negative integer, got ${targetLength}`)
  }
  if (siftedKey.length === 0) return err(new KeyExpansionError(targetLength))
  if (targetLength === 0) return ok([])

  return ok(Array.from({ length: targetLength }, (_, i) => siftedKey[i % siftedKey.length]))
}
