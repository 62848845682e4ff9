/**
 * Unit tests for the field extractor
 */
import { describe, it, expect } from 'vitest'
import { DecodeError } from '../../../lib/errors'
import { getDataTypeCodec, isDataType } from '../dataTypes'
import { extractFields, type FieldMappingInput } from '../fieldExtractor'

// ============================================================================
// Test Fixtures
// ============================================================================

const BOILER_PAYLOAD = Uint8Array.of(0x75, 0x47, 0x19, 0x02, 0x03, 0x50)

const createMapping = (overrides: Partial<FieldMappingInput> = {}): FieldMappingInput => ({
    fieldName: 'boiler_pressure',
    offset: 2,
    dataType: 'u8',
    factor: 0.1,
    unit: 'bar',
    ...overrides,
})

const valueOf = (mapping: FieldMappingInput, payload: Uint8Array): number => {
    const result = extractFields([mapping], payload)
    if (!result.ok) throw result.error
    return result.fields[0].value
}

// ============================================================================
// Data types
// ============================================================================

describe('dataTypes', () => {
    it('should know every supported tag', () => {
        expect(isDataType('u16le')).toBe(true)
        expect(isDataType('f32')).toBe(false)
    })

    it('should give the width of each tag', () => {
        expect(getDataTypeCodec('i8')?.width).toBe(1)
        expect(getDataTypeCodec('u16be')?.width).toBe(2)
        expect(getDataTypeCodec('i32le')?.width).toBe(4)
        expect(getDataTypeCodec('bcd')).toBeUndefined()
    })
})

// ============================================================================
// extractFields
// ============================================================================

describe('extractFields', () => {
    it('should decode the boiler pressure', () => {
        const result = extractFields([createMapping()], BOILER_PAYLOAD)

        expect(result.ok).toBe(true)
        if (!result.ok) return
        expect(result.fields).toHaveLength(1)
        expect(result.fields[0].fieldName).toBe('boiler_pressure')
        expect(result.fields[0].value).toBeCloseTo(2.5, 10)
        expect(result.fields[0].unit).toBe('bar')
    })

    it('should read little and big endian values', () => {
        const payload = Uint8Array.of(0x34, 0x12)

        expect(valueOf(createMapping({ offset: 0, dataType: 'u16le', factor: 1 }), payload)).toBe(0x1234)
        expect(valueOf(createMapping({ offset: 0, dataType: 'u16be', factor: 1 }), payload)).toBe(0x3412)
    })

    it('should read signed values', () => {
        expect(valueOf(createMapping({ offset: 0, dataType: 'i8', factor: 1 }), Uint8Array.of(0xff))).toBe(-1)
        expect(valueOf(createMapping({ offset: 0, dataType: 'i16le', factor: 1 }), Uint8Array.of(0xfe, 0xff))).toBe(-2)
        expect(valueOf(createMapping({ offset: 0, dataType: 'i16be', factor: 1 }), Uint8Array.of(0xff, 0xfe))).toBe(-2)
    })

    it('should read 32-bit values', () => {
        const payload = Uint8Array.of(0x01, 0x00, 0x00, 0x80)

        expect(valueOf(createMapping({ offset: 0, dataType: 'u32le', factor: 1 }), payload)).toBe(0x80000001)
        expect(valueOf(createMapping({ offset: 0, dataType: 'i32le', factor: 1 }), payload)).toBe(-2147483647)
        expect(valueOf(createMapping({ offset: 0, dataType: 'u32be', factor: 1 }), payload)).toBe(0x01000080)
        expect(valueOf(createMapping({ offset: 0, dataType: 'i32be', factor: 1 }), payload)).toBe(0x01000080)
    })

    it('should apply the factor after reading', () => {
        expect(valueOf(createMapping({ offset: 0, dataType: 'u8', factor: 2 }), Uint8Array.of(21))).toBe(42)
        expect(valueOf(createMapping({ offset: 0, dataType: 'i8', factor: 0.5 }), Uint8Array.of(0xfc))).toBe(-2)
    })

    it('should read from a view into a larger buffer', () => {
        const buffer = Uint8Array.of(0xaa, 0xbb, 0x10, 0x20)
        const payload = buffer.subarray(2)

        expect(valueOf(createMapping({ offset: 0, dataType: 'u16le', factor: 1 }), payload)).toBe(0x2010)
    })

    it('should decode every field in order', () => {
        const result = extractFields(
            [
                createMapping({ fieldName: 'first', offset: 0, factor: 1, unit: '' }),
                createMapping({ fieldName: 'second', offset: 1, factor: 1, unit: '' }),
            ],
            Uint8Array.of(7, 9)
        )

        expect(result).toEqual({
            ok: true,
            fields: [
                { fieldName: 'first', value: 7, unit: '' },
                { fieldName: 'second', value: 9, unit: '' },
            ],
        })
    })

    it('should return an empty list without mappings', () => {
        expect(extractFields([], BOILER_PAYLOAD)).toEqual({ ok: true, fields: [] })
    })

    it('should fail with OutOfRange when the field runs past the payload', () => {
        const result = extractFields([createMapping({ offset: 5, dataType: 'u16le' })], BOILER_PAYLOAD)

        expect(result.ok).toBe(false)
        if (result.ok) return
        expect(result.error).toBeInstanceOf(DecodeError)
        expect(result.error.kind).toBe('OutOfRange')
        expect(result.error.fieldName).toBe('boiler_pressure')
    })

    it('should fail with OutOfRange on an empty payload', () => {
        const result = extractFields([createMapping({ offset: 0 })], new Uint8Array(0))

        expect(result.ok).toBe(false)
        if (result.ok) return
        expect(result.error.kind).toBe('OutOfRange')
    })

    it('should fail with UnknownType before checking the range', () => {
        const result = extractFields([createMapping({ offset: 99, dataType: 'f64' })], BOILER_PAYLOAD)

        expect(result.ok).toBe(false)
        if (result.ok) return
        expect(result.error.kind).toBe('UnknownType')
        expect(result.error.message).toBe('UnknownType in field "boiler_pressure": unknown data type "f64"')
    })

    it('should abort the message at the first failing field', () => {
        const result = extractFields(
            [createMapping({ fieldName: 'ok', offset: 0 }), createMapping({ fieldName: 'broken', offset: 10 })],
            BOILER_PAYLOAD
        )

        expect(result.ok).toBe(false)
        if (result.ok) return
        expect(result.error.fieldName).toBe('broken')
    })
})
