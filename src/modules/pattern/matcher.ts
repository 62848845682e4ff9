/**
 * Pattern Matcher - first-match-wins lookup of message definitions.
 *
 * Circuits and their messages are scanned in declaration order, so profiles
 * must list the most specific definition first when patterns overlap.
 */
import type { Circuit, MessageDefinition, PatternSpec } from '../../core/types/profile'
import type { Direction, Frame, Telegram } from '../../types/ebus'
import { matchesByte, matchesBytes } from './bytePattern'

export interface MatchResult {
    circuit: Circuit
    message: MessageDefinition
    direction: Direction
}

/**
 * Evaluate one pattern against a frame.
 * The command identifier is compared first, payload last.
 */
export function matchesPattern(spec: PatternSpec, frame: Frame): boolean {
    if (spec.pbsb !== null && spec.pbsb !== frame.pbsb) {
        return false
    }

    if (!matchesByte(spec.src, frame.src) || !matchesByte(spec.dst, frame.dst)) {
        return false
    }

    return spec.data === null || matchesBytes(spec.data, frame.payload)
}

/**
 * Request view of a telegram
 */
export function requestFrame(telegram: Telegram): Frame {
    return { src: telegram.src, dst: telegram.dst, pbsb: telegram.pbsb, payload: telegram.data }
}

/**
 * Response view of a telegram: the addressed slave is the source,
 * the requesting master the destination, response data as payload
 */
export function responseFrame(telegram: Telegram): Frame | null {
    if (!telegram.response) {
        return null
    }
    return { src: telegram.dst, dst: telegram.src, pbsb: telegram.pbsb, payload: telegram.response }
}

function messageMatches(message: MessageDefinition, telegram: Telegram, direction: Direction): boolean {
    if (direction === 'request') {
        return matchesPattern(message.requestMatch, requestFrame(telegram))
    }

    const frame = responseFrame(telegram)
    if (!frame) {
        return false
    }

    if (message.responseMatch) {
        return matchesPattern(message.responseMatch, frame)
    }

    // Without a response pattern the request identifies the exchange,
    // but only a message that decodes the response can claim it
    return message.responseMap !== null && matchesPattern(message.requestMatch, requestFrame(telegram))
}

/**
 * Find the first message definition matching a telegram
 *
 * @returns the match, or null for an unrecognized telegram
 *
 * @example
 * findMatch(telegram, profile.circuits)
 * // => { circuit: { name: 'boiler', ... }, message: { comment: 'Boiler status', ... }, direction: 'request' }
 */
export function findMatch(
    telegram: Telegram,
    circuits: readonly Circuit[],
    direction: Direction = 'request'
): MatchResult | null {
    for (const circuit of circuits) {
        for (const message of circuit.messages) {
            if (messageMatches(message, telegram, direction)) {
                return { circuit, message, direction }
            }
        }
    }
    return null
}
