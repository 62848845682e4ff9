/**
 * Unit tests for the pattern matcher
 */
import { describe, it, expect } from 'vitest'
import type { Circuit, MessageDefinition, PatternSpec } from '../../../core/types/profile'
import type { Telegram } from '../../../types/ebus'
import { parseAddressPattern, parseBytePattern } from '../bytePattern'
import { findMatch, matchesPattern, requestFrame, responseFrame } from '../matcher'

// ============================================================================
// Test Fixtures
// ============================================================================

const createSpec = (src: string, dst: string, pbsb: number | null, data?: string): PatternSpec => ({
    src: parseAddressPattern(src),
    dst: parseAddressPattern(dst),
    pbsb,
    data: data === undefined ? null : parseBytePattern(data),
})

const createMessage = (comment: string, overrides: Partial<MessageDefinition> = {}): MessageDefinition => ({
    comment,
    publishFormat: 'ebusd/<circuit>/<field_name>',
    requestMatch: createSpec('*', '*', null),
    responseMatch: null,
    requestMap: [],
    responseMap: null,
    ...overrides,
})

const createTelegram = (overrides: Partial<Telegram> = {}): Telegram => ({
    src: 0x10,
    dst: 0x08,
    pbsb: 0x2000,
    data: Uint8Array.of(0x75, 0x47, 0x19, 0x02, 0x03, 0x50),
    ...overrides,
})

// ============================================================================
// matchesPattern
// ============================================================================

describe('matchesPattern', () => {
    const frame = requestFrame(createTelegram())

    it('should match the boiler status pattern', () => {
        expect(matchesPattern(createSpec('10', '08', 0x2000, '^7547'), frame)).toBe(true)
    })

    it('should reject a different command', () => {
        expect(matchesPattern(createSpec('10', '08', 0x2001, '^7547'), frame)).toBe(false)
    })

    it('should reject a different source or destination', () => {
        expect(matchesPattern(createSpec('31', '08', 0x2000), frame)).toBe(false)
        expect(matchesPattern(createSpec('10', '15', 0x2000), frame)).toBe(false)
    })

    it('should accept wildcard addresses and a missing command', () => {
        expect(matchesPattern(createSpec('*', '*', null), frame)).toBe(true)
    })

    it('should require a full match without an anchor', () => {
        expect(matchesPattern(createSpec('10', '08', 0x2000, '7547'), frame)).toBe(false)
        expect(matchesPattern(createSpec('10', '08', 0x2000, '754719020350'), frame)).toBe(true)
    })
})

// ============================================================================
// Frames
// ============================================================================

describe('responseFrame', () => {
    it('should take the addressed slave as source, with the response as payload', () => {
        const frame = responseFrame(createTelegram({ response: Uint8Array.of(0x0c) }))

        expect(frame).toEqual({ src: 0x08, dst: 0x10, pbsb: 0x2000, payload: Uint8Array.of(0x0c) })
    })

    it('should return null without a response', () => {
        expect(responseFrame(createTelegram())).toBeNull()
    })
})

// ============================================================================
// findMatch
// ============================================================================

describe('findMatch', () => {
    const status = createMessage('status', { requestMatch: createSpec('10', '08', 0x2000, '^7547') })
    const modulationRequest = createMessage('modulation request', { requestMatch: createSpec('10', '08', 0x2001) })
    const modulation = createMessage('modulation', {
        requestMatch: createSpec('10', '08', 0x2001),
        responseMatch: createSpec('08', '10', 0x2001, '^01'),
        requestMap: null,
        responseMap: [],
    })
    const anyStatus = createMessage('any status', { requestMatch: createSpec('*', '*', 0x2000) })
    const statusReply = createMessage('status reply', {
        requestMatch: createSpec('*', '*', 0x2000),
        requestMap: null,
        responseMap: [],
    })

    const circuits: Circuit[] = [
        { name: 'boiler', messages: [status, modulationRequest, modulation] },
        { name: 'fallback', messages: [anyStatus, statusReply] },
    ]

    it('should return the first matching message', () => {
        const match = findMatch(createTelegram(), circuits)

        expect(match?.circuit.name).toBe('boiler')
        expect(match?.message.comment).toBe('status')
        expect(match?.direction).toBe('request')
    })

    it('should return the same match for the same telegram', () => {
        const telegram = createTelegram({ pbsb: 0x2001, data: new Uint8Array(0), response: Uint8Array.of(0x01) })

        const first = findMatch(telegram, circuits, 'response')
        const second = findMatch(telegram, circuits, 'response')

        expect(first).not.toBeNull()
        expect(second?.circuit).toBe(first?.circuit)
        expect(second?.message).toBe(first?.message)
    })

    it('should fall through to later circuits', () => {
        const match = findMatch(createTelegram({ data: Uint8Array.of(0x01) }), circuits)

        expect(match?.circuit.name).toBe('fallback')
        expect(match?.message.comment).toBe('any status')
    })

    it('should return null for an unrecognized telegram', () => {
        expect(findMatch(createTelegram({ pbsb: 0x0704 }), circuits)).toBeNull()
    })

    it('should reach a later response pattern past messages that only decode the request', () => {
        const telegram = createTelegram({ pbsb: 0x2001, data: new Uint8Array(0), response: Uint8Array.of(0x01, 0x20) })

        expect(findMatch(telegram, circuits, 'request')?.message.comment).toBe('modulation request')
        expect(findMatch(telegram, circuits, 'response')?.message.comment).toBe('modulation')
        expect(findMatch({ ...telegram, response: Uint8Array.of(0x02) }, circuits, 'response')).toBeNull()
    })

    it('should read the response source as the answering slave', () => {
        const masterFirst = createMessage('master first', {
            requestMatch: createSpec('10', '08', 0x2001),
            responseMatch: createSpec('10', '08', 0x2001),
            responseMap: [],
        })
        const telegram = createTelegram({ pbsb: 0x2001, data: new Uint8Array(0), response: Uint8Array.of(0x01) })

        expect(findMatch(telegram, [{ name: 'boiler', messages: [masterFirst] }], 'response')).toBeNull()
    })

    it('should match a response by its request when there is no response pattern', () => {
        const telegram = createTelegram({ response: Uint8Array.of(0x00) })

        expect(findMatch(telegram, circuits, 'response')?.message.comment).toBe('status reply')
    })

    it('should not match the response direction without a response', () => {
        expect(findMatch(createTelegram(), circuits, 'response')).toBeNull()
    })
})
