/**
 * bb84-sim — BB84 quantum key distribution simulation
 *
 *   - Key agreement with an injectable channel oracle and randomness
 *   - Cyclic key expansion to a message's bit length
 *   - 8-bit text codec and XOR stream cipher
 */
export * from './types.js'
export * from './errors.js'
export { createCryptoRandomSource, createSeededRandomSource, drawBasis, drawByte, type RandomSource } from './random.js'
export {
  createSimulatedOracle,
  hadamard,
  pauliX,
  prepareQubit,
  zeroProbability256,
  type ChannelOracle,
  type MeasurementRequest,
  type Qubit,
} from './oracle.js'
export { drawSentSymbol, drawReceiverBasis } from './symbols.js'
export {
  exchangeRounds,
  siftKey,
  runKeyAgreement,
  runKeyAgreementSession,
  type KeyAgreementOptions,
  type KeyAgreementSession,
} from './keyAgreement.js'
export { expandKey } from './keyExpansion.js'
export { BITS_PER_CHAR, MAX_CODE_POINT, byteToBits, encodeText, decodeBits, formatBits, parseBits } from './bitCodec.js'
export { xorTransform } from './streamCipher.js'
export {
  encryptMessage,
  decryptBits,
  runSecureMessage,
  createRunContext,
  type EncryptedMessage,
  type EncryptError,
  type DecryptError,
  type SecureMessageError,
  type SecureMessageOptions,
  type SecureMessageReport,
} from './secureMessage.js'
export { loadConfig, DEFAULT_ROUNDS, DEFAULT_RPC_PORT, MAX_ROUNDS, VERSION, type Config } from './config.js'
export { createRpcApp, startRpcServer, DEFAULT_RATE_LIMITS, type RateLimits } from './rpc.js'
