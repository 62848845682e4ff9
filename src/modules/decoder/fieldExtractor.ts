/**
 * Field Extractor - reads typed, scaled values out of a telegram payload.
 */
import type { FieldMapping } from '../../core/types/profile'
import { DecodeError } from '../../lib/errors'
import { getDataTypeCodec } from './dataTypes'

export interface DecodedField {
    fieldName: string
    value: number
    unit: string
}

export type ExtractResult =
    | { ok: true; fields: DecodedField[] }
    | { ok: false; error: DecodeError }

/**
 * A mapping whose data type has not been checked yet
 */
export type FieldMappingInput = Omit<FieldMapping, 'dataType'> & { dataType: string }

/**
 * Decode every mapping, in order. The first failing field aborts the message.
 *
 * @param mappings - Field mappings of one message direction
 * @param payload - Application data, offsets are relative to its start
 *
 * @example
 * extractFields([{ fieldName: 'boiler_pressure', offset: 2, dataType: 'u8', factor: 0.1, unit: 'bar' }],
 *     Uint8Array.of(0x75, 0x47, 0x19))
 * // => { ok: true, fields: [{ fieldName: 'boiler_pressure', value: 2.5, unit: 'bar' }] }
 */
export function extractFields(
    mappings: readonly FieldMappingInput[],
    payload: Uint8Array
): ExtractResult {
    const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength)
    const fields: DecodedField[] = []

    for (const mapping of mappings) {
        const codec = getDataTypeCodec(mapping.dataType)
        if (!codec) {
            return {
                ok: false,
                error: new DecodeError('UnknownType', mapping.fieldName, `unknown data type "${mapping.dataType}"`),
            }
        }

        const { offset } = mapping
        if (!Number.isInteger(offset) || offset < 0 || offset + codec.width > payload.length) {
            return {
                ok: false,
                error: new DecodeError(
                    'OutOfRange',
                    mapping.fieldName,
                    `offset ${offset} + width ${codec.width} exceeds payload length ${payload.length}`
                ),
            }
        }

        const raw = codec.read(view, offset)
        fields.push({
            fieldName: mapping.fieldName,
            value: raw * mapping.factor,
            unit: mapping.unit,
        })
    }

    return { ok: true, fields }
}
