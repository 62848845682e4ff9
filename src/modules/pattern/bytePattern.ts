/**
 * Byte Pattern - hex patterns with wildcard bytes and anchored-prefix matching.
 *
 * Syntax:
 *   "7547"   exact payload 0x75 0x47
 *   "^7547"  payload starting with 0x75 0x47
 *   "75*47"  0x75, any byte, 0x47
 *   "*"      any single byte (addresses)
 */
import type { BytePattern } from '../../core/types/profile'

const ANCHOR = '^'
const WILDCARD = '*'

export class BytePatternError extends Error {
  constructor(source: string, reason: string) {
    super(`Invalid byte pattern "${source}": ${reason}`)
    this.name = 'BytePatternError'
  }
}

function isHexDigit(char: string): boolean {
  return /^[0-9a-fA-F]$/.test(char)
}

/**
 * Compile a hex pattern string
 *
 * @throws BytePatternError on characters other than hex digits, `*` and a leading `^`
 */
export function parseBytePattern(source: string): BytePattern {
  const anchored = source.startsWith(ANCHOR)
  const body = anchored ? source.slice(ANCHOR.length) : source
  const bytes: (number | null)[] = []

  let i = 0
  while (i < body.length) {
    const char = body[i]

    if (char === WILDCARD) {
      bytes.push(null)
      i++
      continue
    }

    if (!isHexDigit(char)) {
      throw new BytePatternError(source, `unexpected character "${char}" at ${i}`)
    }

    const next = body[i + 1]
    if (next === undefined || !isHexDigit(next)) {
      throw new BytePatternError(source, `incomplete hex byte at ${i}`)
    }

    bytes.push(parseInt(char + next, 16))
    i += 2
  }

  return { source, anchored, bytes }
}

/**
 * Compile an address pattern: `*` or exactly one hex byte
 */
export function parseAddressPattern(source: string): BytePattern {
  const pattern = parseBytePattern(source)
  if (pattern.anchored || pattern.bytes.length !== 1) {
    throw new BytePatternError(source, 'an address is one hex byte or "*"')
  }
  return pattern
}

/**
 * Check actual bytes against a compiled pattern.
 * Non-anchored patterns require equal length; anchored ones constrain only the prefix.
 */
export function matchesBytes(pattern: BytePattern, actual: Uint8Array): boolean {
  const { bytes, anchored } = pattern

  if (anchored ? actual.length < bytes.length : actual.length !== bytes.length) {
    return false
  }

  for (let i = 0; i < bytes.length; i++) {
    const expected = bytes[i]
    if (expected !== null && expected !== actual[i]) {
      return false
    }
  }

  return true
}

/**
 * Check a single byte (source / destination address)
 */
export function matchesByte(pattern: BytePattern, actual: number): boolean {
  return matchesBytes(pattern, Uint8Array.of(actual))
}

/**
 * Literal bytes of a pattern, or null when it contains a wildcard
 */
export function literalBytes(pattern: BytePattern): Uint8Array | null {
  const out: number[] = []
  for (const byte of pattern.bytes) {
    if (byte === null) return null
    out.push(byte)
  }
  return Uint8Array.from(out)
}

/**
 * Format bytes as upper-case hex, e.g. "7547190203"
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0').toUpperCase()).join('')
}

/**
 * Parse a plain hex string (no wildcards, no anchor) into bytes
 */
export function fromHex(hex: string): Uint8Array {
  const pattern = parseBytePattern(hex)
  const bytes = pattern.anchored ? null : literalBytes(pattern)
  if (!bytes) {
    throw new BytePatternError(hex, 'expected plain hex bytes')
  }
  return bytes
}
