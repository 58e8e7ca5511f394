/**
 * Core data model for the BB84 simulation.
 *
 * Every sequence is built append-only during a run and handed out as a
 * readonly array; nothing here is mutated after construction.
 */

export type Bit = 0 | 1

/** Measurement frame: Z is rectilinear (+), X is diagonal (×) */
export type Basis = 'Z' | 'X'

export interface SentSymbol {
  readonly bit: Bit
  readonly basis: Basis
}

export interface ReceivedSymbol {
  readonly basis: Basis
  readonly measuredBit: Bit
}

export interface Round {
  readonly index: number
  readonly sent: SentSymbol
  readonly received: ReceivedSymbol
}

export type SiftedKey = readonly Bit[]
export type ExpandedKey = readonly Bit[]
export type PlaintextBits = readonly Bit[]
export type CipherBits = readonly Bit[]

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}

export function isBit(value: unknown): value is Bit {
  return value === 0 || value === 1
}
