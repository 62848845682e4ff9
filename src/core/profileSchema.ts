/**
 * Profile document schema.
 *
 * The JSON shape is loose (optional keys, hex written as strings or numbers,
 * a free-form publish-format key). It is validated once here and compiled
 * into the closed types of ./types/profile.
 */
import { z } from 'zod'
import { SchemaInvalidError } from '../lib/errors'
import { DATA_TYPE_NAMES } from '../modules/decoder/dataTypes'
import { BytePatternError, parseAddressPattern, parseBytePattern } from '../modules/pattern/bytePattern'
import type {
  ApplianceProfile,
  Circuit,
  FieldMapping,
  JsonValue,
  MessageDefinition,
  PatternSpec,
} from './types/profile'

// ============================================================================
// Hex fields
// ============================================================================

/**
 * Hex written as a number keeps its digits: 8 -> "08", 2000 -> "2000"
 */
const hexText = (digits: number) =>
  z.union([z.string(), z.number().int().nonnegative()]).transform(value =>
    typeof value === 'number' ? String(value).padStart(digits, '0') : value.trim()
  )

const addressSchema = hexText(2)
  .default('*')
  .pipe(z.string().regex(/^(\*|[0-9a-fA-F]{2})$/, 'expected one hex byte or "*"'))

const pbsbSchema = hexText(4).pipe(z.string().regex(/^[0-9a-fA-F]{4}$/, 'expected four hex digits'))

const dataSchema = z
  .string()
  .regex(/^\^?(\*|[0-9a-fA-F]{2})*$/, 'expected hex bytes or "*", optionally prefixed with "^"')

export const PatternDocSchema = z.object({
  src: addressSchema,
  dst: addressSchema,
  pbsb: pbsbSchema.optional(),
  data: dataSchema.optional(),
})

// ============================================================================
// Messages
// ============================================================================

export const FieldMappingDocSchema = z.object({
  field_name: z.string().min(1),
  field_offset: z.number().int().nonnegative(),
  data_type: z.enum(DATA_TYPE_NAMES),
  factor: z.number().finite().default(1),
  unit: z.string().default(''),
})

const fieldMapListSchema = z.array(FieldMappingDocSchema).superRefine((mappings, ctx) => {
  const seen = new Set<string>()
  mappings.forEach((mapping, index) => {
    if (seen.has(mapping.field_name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'field_name'],
        message: `duplicate field name "${mapping.field_name}"`,
      })
    }
    seen.add(mapping.field_name)
  })
})

const PUBLISH_FORMAT_SUFFIX = '_publish_format'

export const MessageDocSchema = z
  .object({
    comment: z.string().default(''),
    request_match: PatternDocSchema,
    response_match: PatternDocSchema.optional(),
    request_map: fieldMapListSchema.optional(),
    response_map: fieldMapListSchema.optional(),
  })
  .catchall(z.unknown())
  .superRefine((message, ctx) => {
    if (!message.request_map && !message.response_map) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'a message needs a request_map or a response_map',
      })
    }

    const formatKeys = Object.keys(message).filter(key => key.endsWith(PUBLISH_FORMAT_SUFFIX))
    if (formatKeys.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected exactly one "*${PUBLISH_FORMAT_SUFFIX}" key, found ${formatKeys.length}`,
      })
    } else if (typeof message[formatKeys[0]] !== 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [formatKeys[0]],
        message: 'publish format must be a string',
      })
    }
  })

export const CircuitDocSchema = z.object({
  name: z.string().min(1),
  messages: z.array(MessageDocSchema),
})

// ============================================================================
// Presence & Autodiscovery
// ============================================================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
)

export const PresenceDocSchema = z
  .object({
    valid: z.boolean(),
    request: PatternDocSchema,
    response: PatternDocSchema,
  })
  .superRefine((rule, ctx) => {
    if (!rule.valid) return

    if (rule.request.dst === '*') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['request', 'dst'], message: 'probe destination must be literal' })
    }
    if (rule.request.pbsb === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['request', 'pbsb'], message: 'probe needs a command' })
    }
    if (rule.request.data !== undefined && /[*^]/.test(rule.request.data)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['request', 'data'], message: 'probe data must be literal bytes' })
    }
  })

export const AutodiscoveryDocSchema = z.object({
  enabled: z.boolean(),
  topic: z.string().min(1),
  payload: z.record(jsonValueSchema),
})

// ============================================================================
// Profile
// ============================================================================

export const ProfileDocSchema = z
  .object({
    appliance: z.string().min(1),
    bus: z.string().min(1),
    presence_detection: PresenceDocSchema,
    mqtt_autodiscovery: AutodiscoveryDocSchema.optional(),
    circuits: z.array(CircuitDocSchema),
  })
  .superRefine((profile, ctx) => {
    const seen = new Set<string>()
    profile.circuits.forEach((circuit, index) => {
      if (seen.has(circuit.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['circuits', index, 'name'],
          message: `duplicate circuit name "${circuit.name}"`,
        })
      }
      seen.add(circuit.name)
    })
  })

type PatternDoc = z.infer<typeof PatternDocSchema>
type FieldMappingDoc = z.infer<typeof FieldMappingDocSchema>
type MessageDoc = z.infer<typeof MessageDocSchema>

// ============================================================================
// Compilation
// ============================================================================

function toPattern(doc: PatternDoc): PatternSpec {
  return {
    src: parseAddressPattern(doc.src),
    dst: parseAddressPattern(doc.dst),
    pbsb: doc.pbsb === undefined ? null : parseInt(doc.pbsb, 16),
    data: doc.data === undefined ? null : parseBytePattern(doc.data),
  }
}

function toFieldMappings(docs: FieldMappingDoc[] | undefined): FieldMapping[] | null {
  if (!docs) return null
  return docs.map(doc => ({
    fieldName: doc.field_name,
    offset: doc.field_offset,
    dataType: doc.data_type,
    factor: doc.factor,
    unit: doc.unit,
  }))
}

function publishFormatOf(doc: MessageDoc): string {
  const key = Object.keys(doc).find(k => k.endsWith(PUBLISH_FORMAT_SUFFIX))
  const value = key === undefined ? undefined : doc[key]
  return typeof value === 'string' ? value : ''
}

function toMessage(doc: MessageDoc): MessageDefinition {
  return {
    comment: doc.comment,
    publishFormat: publishFormatOf(doc),
    requestMatch: toPattern(doc.request_match),
    responseMatch: doc.response_match ? toPattern(doc.response_match) : null,
    requestMap: toFieldMappings(doc.request_map),
    responseMap: toFieldMappings(doc.response_map),
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
}

/**
 * Validate a parsed JSON document and build a frozen profile
 *
 * @param json - Parsed JSON document
 * @param origin - Where the document came from, used in error messages
 * @throws SchemaInvalidError listing every violation
 */
export function parseProfile(json: unknown, origin: string): ApplianceProfile {
  const result = ProfileDocSchema.safeParse(json)
  if (!result.success) {
    throw new SchemaInvalidError(origin, formatIssues(result.error))
  }

  const doc = result.data

  try {
    const circuits: Circuit[] = doc.circuits.map(circuit => ({
      name: circuit.name,
      messages: circuit.messages.map(toMessage),
    }))

    const profile: ApplianceProfile = {
      appliance: doc.appliance,
      bus: doc.bus,
      origin,
      presence: {
        valid: doc.presence_detection.valid,
        request: toPattern(doc.presence_detection.request),
        response: toPattern(doc.presence_detection.response),
      },
      autodiscovery: doc.mqtt_autodiscovery ?? null,
      circuits,
    }

    return deepFreeze(profile)
  } catch (err) {
    if (err instanceof BytePatternError) {
      throw new SchemaInvalidError(origin, [err.message])
    }
    throw err
  }
}

/**
 * Parse profile text (JSON)
 */
export function parseProfileText(text: string, origin: string): ApplianceProfile {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'Unknown error'
    throw new SchemaInvalidError(origin, [`not valid JSON: ${reason}`])
  }
  return parseProfile(json, origin)
}

