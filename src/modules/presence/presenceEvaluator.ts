/**
 * Presence Evaluator - one request/response probe deciding whether an
 * appliance answers on the bus.
 */
import type { PatternSpec, PresenceRule } from '../../core/types/profile'
import type { Telegram } from '../../types/ebus'
import { literalBytes } from '../pattern/bytePattern'
import { matchesPattern, responseFrame } from '../pattern/matcher'

export type PresenceState = 'present' | 'absent' | 'indeterminate'

export interface ProbeRequest {
    src: number
    dst: number
    pbsb: number
    data: Uint8Array
}

/**
 * Sends a request on the bus and resolves with the completed exchange,
 * or null when nothing answered. Must stop waiting once `signal` aborts.
 */
export type ProbeFn = (request: ProbeRequest, signal: AbortSignal) => Promise<Telegram | null>

export interface PresenceOptions {
    timeoutMs: number
    source: number            // own bus address, used when the rule's source is "*"
    signal?: AbortSignal
    onProbeError?: (err: unknown) => void
}

/**
 * Concrete request frame for a pattern.
 * Destination, command and data must be literal, the source may be "*".
 */
export function buildProbeRequest(pattern: PatternSpec, source: number): ProbeRequest | null {
    const [src] = pattern.src.bytes
    const [dst] = pattern.dst.bytes
    const data = pattern.data ? literalBytes(pattern.data) : new Uint8Array(0)

    if (dst === null || dst === undefined || pattern.pbsb === null || !data) {
        return null
    }

    return {
        src: src ?? source,
        dst,
        pbsb: pattern.pbsb,
        data,
    }
}

/**
 * Check a completed exchange against the expected response.
 * The slave that answered is the source of the reply.
 */
export function matchesPresenceReply(response: PatternSpec, exchange: Telegram): boolean {
    const frame = responseFrame(exchange)
    return frame !== null && matchesPattern(response, frame)
}

/**
 * Probe the bus once.
 *
 * Resolves 'indeterminate' without probing when the rule is disabled,
 * 'absent' on timeout, no reply, probe failure or a non-matching reply.
 * Rejects only when the caller's signal aborts.
 */
export async function isPresent(
    rule: PresenceRule,
    probe: ProbeFn,
    options: PresenceOptions
): Promise<PresenceState> {
    if (!rule.valid) {
        return 'indeterminate'
    }

    const request = buildProbeRequest(rule.request, options.source)
    if (!request) {
        return 'indeterminate'
    }

    const { signal: callerSignal } = options
    callerSignal?.throwIfAborted()

    const controller = new AbortController()
    const onCallerAbort = () => controller.abort(callerSignal?.reason)
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true })

    let timedOut = false
    const timer = setTimeout(() => {
        timedOut = true
        controller.abort(new Error(`Presence probe timed out after ${options.timeoutMs}ms`))
    }, options.timeoutMs)

    const aborted = new Promise<null>(resolve => {
        controller.signal.addEventListener('abort', () => resolve(null), { once: true })
    })

    // A probe failing after the wait ended has nobody left to report to
    const probing = probe(request, controller.signal).catch(err => {
        if (controller.signal.aborted) return null
        throw err
    })

    try {
        const reply = await Promise.race([probing, aborted])

        if (callerSignal?.aborted) {
            throw callerSignal.reason
        }
        if (timedOut || !reply) {
            return 'absent'
        }
        return matchesPresenceReply(rule.response, reply) ? 'present' : 'absent'
    } catch (err) {
        if (callerSignal?.aborted) {
            throw callerSignal.reason
        }
        options.onProbeError?.(err)
        return 'absent'
    } finally {
        clearTimeout(timer)
        callerSignal?.removeEventListener('abort', onCallerAbort)
        controller.abort()
    }
}
