/**
 * Placeholder templates for publish topics and autodiscovery payloads.
 *
 * A template is split into text and placeholder tokens over a fixed
 * vocabulary. Anything between angle brackets that is not in the vocabulary
 * is plain text, and substituted values are never scanned again.
 */

export const PLACEHOLDERS = [
    'circuit',
    'circuit_name',
    'field_name',
    'field_value',
    'unit',
    'appliance',
    'state_topic',
    'availability_topic',
] as const

export type PlaceholderName = (typeof PLACEHOLDERS)[number]

export type TemplateToken =
    | { kind: 'text'; text: string }
    | { kind: 'placeholder'; name: PlaceholderName; raw: string }

export interface TemplateContext {
    appliance?: string
    circuit?: string
    fieldName?: string
    value?: number
    unit?: string
    stateTopic?: string
    availabilityTopic?: string
}

const VALUE_PRECISION = 12

function isPlaceholderName(name: string): name is PlaceholderName {
    return PLACEHOLDERS.some(placeholder => placeholder === name)
}

/**
 * Render a decoded value as stable text: 12 significant digits, shortest form.
 *
 * @example
 * formatValue(12)                  // => '12'
 * formatValue(0.1 + 0.2)           // => '0.3'
 */
export function formatValue(value: number): string {
    if (!Number.isFinite(value)) {
        return String(value)
    }
    const rounded = Number(value.toPrecision(VALUE_PRECISION))
    return Object.is(rounded, -0) ? '0' : String(rounded)
}

/**
 * Split a template into text and known placeholder tokens
 */
export function tokenizeTemplate(template: string): TemplateToken[] {
    const tokens: TemplateToken[] = []
    let text = ''
    let i = 0

    while (i < template.length) {
        if (template[i] === '<') {
            const close = template.indexOf('>', i + 1)
            const name = close === -1 ? '' : template.slice(i + 1, close)

            if (isPlaceholderName(name)) {
                if (text) {
                    tokens.push({ kind: 'text', text })
                    text = ''
                }
                tokens.push({ kind: 'placeholder', name, raw: template.slice(i, close + 1) })
                i = close + 1
                continue
            }
        }

        text += template[i]
        i++
    }

    if (text) {
        tokens.push({ kind: 'text', text })
    }

    return tokens
}

function resolvePlaceholder(name: PlaceholderName, context: TemplateContext): string | undefined {
    switch (name) {
        case 'circuit':
        case 'circuit_name':
            return context.circuit
        case 'field_name':
            return context.fieldName
        case 'field_value':
            return context.value === undefined ? undefined : formatValue(context.value)
        case 'unit':
            return context.unit
        case 'appliance':
            return context.appliance
        case 'state_topic':
            return context.stateTopic
        case 'availability_topic':
            return context.availabilityTopic
    }
}

/**
 * Expand placeholders in a single pass.
 * Placeholders without a value in the context are kept verbatim.
 *
 * @example
 * formatTemplate('ebusd/<circuit_name>/<field_name>/<field_value>',
 *     { circuit: 'boiler', fieldName: 'flame_power', value: 12 })
 * // => 'ebusd/boiler/flame_power/12'
 */
export function formatTemplate(template: string, context: TemplateContext): string {
    return tokenizeTemplate(template)
        .map(token => {
            if (token.kind === 'text') return token.text
            return resolvePlaceholder(token.name, context) ?? token.raw
        })
        .join('')
}

const TOPIC_WILDCARDS = /[+#]/g

function topicSegment(value: string | undefined): string | undefined {
    return value?.replace(TOPIC_WILDCARDS, '_')
}

/**
 * Publish topic for one decoded field.
 * Names substituted into a topic cannot carry the MQTT wildcards "+" and "#".
 *
 * @example
 * formatTopic('ebusd/<circuit>/<field_name>', { circuit: 'hc#1', fieldName: 'flow+return' })
 * // => 'ebusd/hc_1/flow_return'
 */
export function formatTopic(template: string, context: TemplateContext): string {
    return formatTemplate(template, {
        ...context,
        appliance: topicSegment(context.appliance),
        circuit: topicSegment(context.circuit),
        fieldName: topicSegment(context.fieldName),
        unit: topicSegment(context.unit),
    })
}
