/**
 * Decode engine - telegram in, publish records out.
 *
 * Pure functions of (telegram, profile): no I/O, no shared state, safe to
 * call concurrently against the same profile.
 */
import type { ApplianceProfile } from '../../core/types/profile'
import type { DecodeError } from '../../lib/errors'
import type { Direction, Telegram } from '../../types/ebus'
import { extractFields } from '../decoder/fieldExtractor'
import { formatTopic } from '../formatter/template'
import { toHex } from '../pattern/bytePattern'
import { findMatch } from '../pattern/matcher'

// ============================================================================
// Types
// ============================================================================

export interface PublishRecord {
    topic: string
    value: number
    unit: string
    circuit: string
    fieldName: string
    direction: Direction
    comment: string
}

export type DecodeOutcome =
    | { kind: 'unrecognized'; direction: Direction }
    | { kind: 'decoded'; direction: Direction; circuit: string; comment: string; records: PublishRecord[] }
    | { kind: 'failed'; direction: Direction; circuit: string; comment: string; error: DecodeError }

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Decode one direction of a telegram
 */
export function decodeDirection(
    telegram: Telegram,
    profile: ApplianceProfile,
    direction: Direction
): DecodeOutcome {
    const match = findMatch(telegram, profile.circuits, direction)
    if (!match) {
        return { kind: 'unrecognized', direction }
    }

    const { circuit, message } = match
    const mappings = direction === 'request' ? message.requestMap : message.responseMap
    const payload = direction === 'request' ? telegram.data : telegram.response

    if (!mappings || !payload) {
        return { kind: 'decoded', direction, circuit: circuit.name, comment: message.comment, records: [] }
    }

    const result = extractFields(mappings, payload)
    if (!result.ok) {
        return { kind: 'failed', direction, circuit: circuit.name, comment: message.comment, error: result.error }
    }

    const records = result.fields.map(field => ({
        topic: formatTopic(message.publishFormat, {
            appliance: profile.appliance,
            circuit: circuit.name,
            fieldName: field.fieldName,
            value: field.value,
            unit: field.unit,
        }),
        value: field.value,
        unit: field.unit,
        circuit: circuit.name,
        fieldName: field.fieldName,
        direction,
        comment: message.comment,
    }))

    return { kind: 'decoded', direction, circuit: circuit.name, comment: message.comment, records }
}

/**
 * Decode a telegram: the request, and the response when there is one
 *
 * @example
 * decodeTelegram({ src: 0x10, dst: 0x08, pbsb: 0x2000, data: Uint8Array.of(0x75, 0x47, 0x19) }, profile)
 * // => [{ kind: 'decoded', direction: 'request', records: [{ topic: 'ebusd/boiler/boiler_pressure', value: 2.5, ... }] }]
 */
export function decodeTelegram(telegram: Telegram, profile: ApplianceProfile): DecodeOutcome[] {
    const outcomes = [decodeDirection(telegram, profile, 'request')]
    if (telegram.response) {
        outcomes.push(decodeDirection(telegram, profile, 'response'))
    }
    return outcomes
}

export interface ProfileOutcomes {
    appliance: string
    outcomes: DecodeOutcome[]
}

/**
 * Decode a telegram against several profiles (appliances sharing one bus)
 */
export function decodeForProfiles(
    telegram: Telegram,
    profiles: readonly ApplianceProfile[]
): ProfileOutcomes[] {
    return profiles.map(profile => ({ appliance: profile.appliance, outcomes: decodeTelegram(telegram, profile) }))
}

/**
 * All publish records of a set of outcomes
 */
export function collectRecords(outcomes: readonly DecodeOutcome[]): PublishRecord[] {
    return outcomes.flatMap(outcome => (outcome.kind === 'decoded' ? outcome.records : []))
}

/**
 * One-line description for logs
 *
 * @example
 * describeTelegram({ src: 0x10, dst: 0x08, pbsb: 0x2000, data: Uint8Array.of(0x75, 0x47) })
 * // => 'Req: [src: 10, dst: 08, pbsb: 2000, data: 7547]'
 */
export function describeTelegram(telegram: Telegram): string {
    const hexByte = (value: number) => value.toString(16).padStart(2, '0').toUpperCase()
    const request =
        `Req: [src: ${hexByte(telegram.src)}, dst: ${hexByte(telegram.dst)}, ` +
        `pbsb: ${telegram.pbsb.toString(16).padStart(4, '0').toUpperCase()}, data: ${toHex(telegram.data)}]`
    return telegram.response ? `${request} Resp: [data: ${toHex(telegram.response)}]` : request
}
