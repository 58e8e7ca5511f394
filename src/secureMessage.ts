/**
 * Secure message flow
 *
 * Flow: BB84 key agreement → sifted key → cyclic expansion to the message's
 *       bit length → XOR encryption → XOR decryption with the same expanded
 *       key → text again.
 */
import { decodeBits, encodeText } from './bitCodec.js'
import type { KeyAgreementFailure, KeyExpansionError, LengthMismatch, MalformedBitLength, UnsupportedCharacter } from './errors.js'
import { expandKey } from './keyExpansion.js'
import { runKeyAgreementSession, type KeyAgreementOptions, type KeyAgreementSession } from './keyAgreement.js'
import { log } from './log.js'
import { createSimulatedOracle, type ChannelOracle } from './oracle.js'
import { createCryptoRandomSource, createSeededRandomSource, type RandomSource } from './random.js'
import { xorTransform } from './streamCipher.js'
import { ok, type CipherBits, type ExpandedKey, type Result, type SiftedKey } from './types.js'

export interface EncryptedMessage {
  readonly cipherBits: CipherBits
  /** Needed by whoever decrypts; same length as cipherBits */
  readonly expandedKey: ExpandedKey
}

export type EncryptError = KeyExpansionError | UnsupportedCharacter
export type DecryptError = MalformedBitLength | LengthMismatch
export type SecureMessageError = KeyAgreementFailure | EncryptError | DecryptError

export interface SecureMessageOptions extends KeyAgreementOptions {
  roundCount: number
  oracle: ChannelOracle
  rng: RandomSource
}

export interface SecureMessageReport {
  readonly message: string
  readonly session: KeyAgreementSession
  readonly cipherBits: CipherBits
  readonly expandedKey: ExpandedKey
  readonly decryptedMessage: string
}

const logger = log.child({ component: 'cipher' })

export function encryptMessage(message: string, siftedKey: SiftedKey): Result<EncryptedMessage, EncryptError> {
  const plaintext = encodeText(message)
  if (!plaintext.ok) return plaintext

  const expanded = expandKey(siftedKey, plaintext.value.length)
  if (!expanded.ok) return expanded

  const cipher = xorTransform(plaintext.value, expanded.value)
  // Lengths agree by construction of expandKey
  if (!cipher.ok) throw cipher.error
  return ok({ cipherBits: cipher.value, expandedKey: expanded.value })
}

export function decryptBits(cipherBits: CipherBits, expandedKey: ExpandedKey): Result<string, DecryptError> {
  const plain = xorTransform(cipherBits, expandedKey)
  if (!plain.ok) return plain
  return decodeBits(plain.value)
}

/** Key agreement through decryption in one call, with the full transcript */
export function runSecureMessage(
  message: string,
  options: SecureMessageOptions,
): Result<SecureMessageReport, SecureMessageError> {
  const { roundCount, oracle, rng, ...agreementOptions } = options

  const session = runKeyAgreementSession(roundCount, oracle, rng, agreementOptions)
  if (!session.ok) return session

  const encrypted = encryptMessage(message, session.value.siftedKey)
  if (!encrypted.ok) return encrypted

  const decrypted = decryptBits(encrypted.value.cipherBits, encrypted.value.expandedKey)
  if (!decrypted.ok) return decrypted

  logger.debug(
    { roundCount, keyBits: session.value.siftedKey.length, messageBits: encrypted.value.cipherBits.length },
    'Message round trip complete',
  )

  return ok({
    message,
    session: session.value,
    cipherBits: encrypted.value.cipherBits,
    expandedKey: encrypted.value.expandedKey,
    decryptedMessage: decrypted.value,
  })
}

/**
 * Protocol and channel randomness for one run. Seeded runs derive both
 * streams from the seed so the whole transcript is reproducible.
 */
export function createRunContext(seed?: string): { rng: RandomSource; oracle: ChannelOracle } {
  if (seed === undefined) {
    return { rng: createCryptoRandomSource(), oracle: createSimulatedOracle(createCryptoRandomSource()) }
  }
  return {
    rng: createSeededRandomSource(`${seed}/protocol`),
    oracle: createSimulatedOracle(createSeededRandomSource(`${seed}/channel`)),
  }
}
