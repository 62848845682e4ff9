/**
 * Enhanced adapter protocol
 *
 * Bytes below 0x80 are plain bus bytes. Everything else travels as a pair:
 *   1100ccdd 10dddddd  (c = command, d = data)
 */

export const EnhancedRequest = {
    INIT: 0x00,
    SEND: 0x01,
    START: 0x02,
    INFO: 0x03,
} as const

export const EnhancedResponse = {
    RESETTED: 0x00,
    RECEIVED: 0x01,
    STARTED: 0x02,
    INFO: 0x03,
    FAILED: 0x0a,
    ERROR_EBUS: 0x0b,
    ERROR_HOST: 0x0c,
} as const

export type EnhancedSymbol =
    | { kind: 'received'; byte: number }
    | { kind: 'started'; address: number }
    | { kind: 'failed'; address: number }
    | { kind: 'resetted' }
    | { kind: 'info'; byte: number }
    | { kind: 'error'; source: 'ebus' | 'host'; code: number }
    | { kind: 'invalid'; bytes: number[] }

/**
 * Encode one command for the adapter
 */
export function encodeEnhanced(command: number, data: number): Uint8Array {
    return Uint8Array.of(0xc0 | ((command & 0x0f) << 2) | ((data & 0xc0) >> 6), 0x80 | (data & 0x3f))
}

function decodePair(b1: number, b2: number): EnhancedSymbol {
    const command = (b1 >> 2) & 0x0f
    const data = ((b1 & 0x03) << 6) | (b2 & 0x3f)

    switch (command) {
        case EnhancedResponse.RECEIVED:
            return { kind: 'received', byte: data }
        case EnhancedResponse.STARTED:
            return { kind: 'started', address: data }
        case EnhancedResponse.FAILED:
            return { kind: 'failed', address: data }
        case EnhancedResponse.RESETTED:
            return { kind: 'resetted' }
        case EnhancedResponse.INFO:
            return { kind: 'info', byte: data }
        case EnhancedResponse.ERROR_EBUS:
            return { kind: 'error', source: 'ebus', code: data }
        case EnhancedResponse.ERROR_HOST:
            return { kind: 'error', source: 'host', code: data }
        default:
            return { kind: 'invalid', bytes: [b1, b2] }
    }
}

/**
 * Stream decoder; keeps a dangling first byte of a pair between chunks
 */
export class EnhancedProtocolDecoder {
    private pending: number | null = null

    decode(chunk: Uint8Array): EnhancedSymbol[] {
        const symbols: EnhancedSymbol[] = []

        for (const byte of chunk) {
            if (this.pending !== null) {
                const first = this.pending
                this.pending = null
                if ((byte & 0xc0) === 0x80) {
                    symbols.push(decodePair(first, byte))
                    continue
                }
                symbols.push({ kind: 'invalid', bytes: [first] })
            }

            if ((byte & 0xc0) === 0xc0) {
                this.pending = byte
            } else if ((byte & 0x80) === 0) {
                symbols.push({ kind: 'received', byte })
            } else {
                symbols.push({ kind: 'invalid', bytes: [byte] })
            }
        }

        return symbols
    }

    reset(): void {
        this.pending = null
    }
}
