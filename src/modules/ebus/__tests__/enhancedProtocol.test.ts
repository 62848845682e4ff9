/**
 * Unit tests for the enhanced adapter protocol
 */
import { describe, it, expect } from 'vitest'
import { EnhancedProtocolDecoder, EnhancedRequest, EnhancedResponse, encodeEnhanced } from '../enhancedProtocol'

describe('encodeEnhanced', () => {
    it('should encode a command and data byte as a pair', () => {
        expect(Array.from(encodeEnhanced(EnhancedRequest.START, 0x31))).toEqual([0xc8, 0xb1])
        expect(Array.from(encodeEnhanced(EnhancedRequest.SEND, 0xaa))).toEqual([0xc6, 0xaa])
    })
})

describe('EnhancedProtocolDecoder', () => {
    it('should pass plain bytes through', () => {
        const decoder = new EnhancedProtocolDecoder()

        expect(decoder.decode(Uint8Array.of(0x10, 0x31))).toEqual([
            { kind: 'received', byte: 0x10 },
            { kind: 'received', byte: 0x31 },
        ])
    })

    it('should decode received, started and failed pairs', () => {
        const decoder = new EnhancedProtocolDecoder()
        const chunk = Uint8Array.from([
            ...encodeEnhanced(EnhancedResponse.RECEIVED, 0xaa),
            ...encodeEnhanced(EnhancedResponse.STARTED, 0x31),
            ...encodeEnhanced(EnhancedResponse.FAILED, 0x10),
        ])

        expect(decoder.decode(chunk)).toEqual([
            { kind: 'received', byte: 0xaa },
            { kind: 'started', address: 0x31 },
            { kind: 'failed', address: 0x10 },
        ])
    })

    it('should decode reset and error notifications', () => {
        const decoder = new EnhancedProtocolDecoder()
        const chunk = Uint8Array.from([
            ...encodeEnhanced(EnhancedResponse.RESETTED, 0x01),
            ...encodeEnhanced(EnhancedResponse.ERROR_EBUS, 0x01),
            ...encodeEnhanced(EnhancedResponse.ERROR_HOST, 0x02),
        ])

        expect(decoder.decode(chunk)).toEqual([
            { kind: 'resetted' },
            { kind: 'error', source: 'ebus', code: 0x01 },
            { kind: 'error', source: 'host', code: 0x02 },
        ])
    })

    it('should keep the first byte of a pair split across chunks', () => {
        const decoder = new EnhancedProtocolDecoder()

        expect(decoder.decode(Uint8Array.of(0xc6))).toEqual([])
        expect(decoder.decode(Uint8Array.of(0xaa))).toEqual([{ kind: 'received', byte: 0xaa }])
    })

    it('should flag broken pairs and stray continuation bytes', () => {
        const decoder = new EnhancedProtocolDecoder()

        expect(decoder.decode(Uint8Array.of(0xc6, 0x10, 0x85))).toEqual([
            { kind: 'invalid', bytes: [0xc6] },
            { kind: 'received', byte: 0x10 },
            { kind: 'invalid', bytes: [0x85] },
        ])
    })

    it('should drop a pending byte on reset', () => {
        const decoder = new EnhancedProtocolDecoder()
        decoder.decode(Uint8Array.of(0xc6))
        decoder.reset()

        expect(decoder.decode(Uint8Array.of(0x10))).toEqual([{ kind: 'received', byte: 0x10 }])
    })
})
