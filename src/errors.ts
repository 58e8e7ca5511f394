/**
 * Error taxonomy for key agreement, expansion, cipher and codec failures.
 * Core operations return these inside a Result; only configuration errors
 * (bad round counts, bad settings) are thrown.
 */

export class Bb84Error extends Error {
  constructor(message: string, public readonly meta?: Record<string, unknown>) {
    super(message)
    this.name = this.constructor.name
  }
}

/** No round ended with matching bases, so sifting kept nothing */
export class KeyAgreementFailure extends Bb84Error {
  constructor(public readonly roundCount: number) {
    super(`No matching bases in ${roundCount} round${roundCount === 1 ? '' : 's'}; retry with more rounds`, { roundCount })
  }
}

export class KeyExpansionError extends Bb84Error {
  constructor(targetLength: number) {
    super(`Cannot expand an empty sifted key to ${targetLength} bits`, { targetLength })
  }
}

export class LengthMismatch extends Bb84Error {
  constructor(bitsLength: number, keyLength: number) {
    super(`Bit sequence length ${bitsLength} does not match key length ${keyLength}`, { bitsLength, keyLength })
  }
}

export class MalformedBitLength extends Bb84Error {
  constructor(public readonly length: number) {
    super(`Bit length ${length} is not a multiple of 8`, { length })
  }
}

export class UnsupportedCharacter extends Bb84Error {
  constructor(character: string, codePoint: number, index: number) {
    super(
      `Character ${JSON.stringify(character)} (U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}) at index ${index} does not fit in 8 bits`,
      { character, codePoint, index },
    )
  }
}

export class InvalidRoundCount extends Bb84Error {
  constructor(roundCount: number) {
    super(`Round count must be an integer >= 1, got ${roundCount}`, { roundCount })
  }
}

export class ConfigError extends Bb84Error {}
