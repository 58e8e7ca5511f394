import { formatBits } from './bitCodec.js'
import type { SecureMessageReport } from './secureMessage.js'
import type { Basis, Bit } from './types.js'

export function banner(title: string): void {
  const line = '='.repeat(60)
  console.log(`\n${line}`)
  console.log(`  ${title}`)
  console.log(`${line}\n`)
}

export function timeIt<T>(fn: () => T): { result: T; ms: number } {
  const start = performance.now()
  const result = fn()
  const ms = performance.now() - start
  return { result, ms }
}

export function listLabel(values: readonly (Bit | Basis)[]): string {
  return `[${values.join(', ')}]`
}

/** The transcript block printed after a run */
export function formatReport(report: SecureMessageReport): string {
  const { session } = report
  return [
    `Sender bits:     ${listLabel(session.senderBits)}`,
    `Sender bases:    ${listLabel(session.senderBases)}`,
    `Receiver bases:  ${listLabel(session.receiverBases)}`,
    `Receiver bits:   ${listLabel(session.receiverResults)}`,
    `Shared key:      ${listLabel(session.siftedKey)}`,
    `Encrypted bits:  ${formatBits(report.cipherBits)}`,
    `Decrypted msg:   ${report.decryptedMessage}`,
  ].join('\n')
}

/** JSON-friendly view of a report, bit arrays rendered as 0/1 strings */
export function serializeReport(report: SecureMessageReport) {
  const { session } = report
  return {
    message: report.message,
    roundCount: session.roundCount,
    senderBits: formatBits(session.senderBits),
    senderBases: session.senderBases.join(''),
    receiverBases: session.receiverBases.join(''),
    receiverResults: formatBits(session.receiverResults),
    matchedRounds: session.matchedRounds,
    siftedKey: formatBits(session.siftedKey),
    expandedKey: formatBits(report.expandedKey),
    cipherBits: formatBits(report.cipherBits),
    decryptedMessage: report.decryptedMessage,
  }
}
