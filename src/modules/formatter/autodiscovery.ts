/**
 * Autodiscovery documents, one per field a profile can decode.
 *
 * A document describes that a field exists, so it is built from the profile
 * alone and never waits for a reading.
 */
import type {
    ApplianceProfile,
    AutodiscoveryConfig,
    Circuit,
    FieldMapping,
    JsonValue,
    MessageDefinition,
} from '../../core/types/profile'
import type { Direction } from '../../types/ebus'
import { formatTemplate, formatTopic, type TemplateContext } from './template'

export interface KnownField {
    circuit: Circuit
    message: MessageDefinition
    mapping: FieldMapping
    direction: Direction
}

export interface DiscoveryDocument {
    topic: string
    payload: JsonValue
}

export interface DiscoveryOptions {
    availabilityTopic?: string
}

/**
 * Lower-case topic segment, anything outside [a-z0-9_-] replaced by "_"
 */
export function slugify(value: string): string {
    return value.toLowerCase().replace(/[^a-z0-9_-]/g, '_')
}

/**
 * Every field of every mapping list, in declaration order,
 * keeping the first occurrence of a (circuit, field name) pair
 */
export function listKnownFields(profile: ApplianceProfile): KnownField[] {
    const seen = new Set<string>()
    const fields: KnownField[] = []

    for (const circuit of profile.circuits) {
        for (const message of circuit.messages) {
            const lists: [Direction, FieldMapping[] | null][] = [
                ['request', message.requestMap],
                ['response', message.responseMap],
            ]
            for (const [direction, mappings] of lists) {
                for (const mapping of mappings ?? []) {
                    const key = `${circuit.name}\u0000${mapping.fieldName}`
                    if (seen.has(key)) continue
                    seen.add(key)
                    fields.push({ circuit, message, mapping, direction })
                }
            }
        }
    }

    return fields
}

/**
 * Expand placeholders in every string of a JSON value
 */
export function expandJson(value: JsonValue, context: TemplateContext): JsonValue {
    if (typeof value === 'string') {
        return formatTemplate(value, context)
    }
    if (Array.isArray(value)) {
        return value.map(item => expandJson(item, context))
    }
    if (value !== null && typeof value === 'object') {
        const out: { [key: string]: JsonValue } = {}
        for (const [key, item] of Object.entries(value)) {
            out[key] = expandJson(item, context)
        }
        return out
    }
    return value
}

/**
 * Template context describing one known field
 */
export function fieldContext(
    profile: ApplianceProfile,
    field: KnownField,
    options: DiscoveryOptions = {}
): TemplateContext {
    const base: TemplateContext = {
        appliance: profile.appliance,
        circuit: field.circuit.name,
        fieldName: field.mapping.fieldName,
        unit: field.mapping.unit,
        availabilityTopic: options.availabilityTopic,
    }
    return { ...base, stateTopic: formatTopic(field.message.publishFormat, base) }
}

/**
 * Discovery topic: <root>/sensor/<appliance>/<circuit>_<field>/config
 */
export function discoveryTopic(config: AutodiscoveryConfig, context: TemplateContext): string {
    const node = slugify(context.appliance ?? '')
    const object = `${slugify(context.circuit ?? '')}_${slugify(context.fieldName ?? '')}`
    return `${config.topic}/sensor/${node}/${object}/config`
}

/**
 * Build the document advertising one field
 */
export function formatAutodiscovery(
    profile: ApplianceProfile,
    field: KnownField,
    config: AutodiscoveryConfig,
    options: DiscoveryOptions = {}
): DiscoveryDocument {
    const context = fieldContext(profile, field, options)
    return {
        topic: discoveryTopic(config, context),
        payload: expandJson(config.payload, context),
    }
}

/**
 * Documents for every known field, or none when autodiscovery is off
 */
export function buildAutodiscovery(
    profile: ApplianceProfile,
    options: DiscoveryOptions = {}
): DiscoveryDocument[] {
    const config = profile.autodiscovery
    if (!config || !config.enabled) {
        return []
    }

    return listKnownFields(profile).map(field => formatAutodiscovery(profile, field, config, options))
}
