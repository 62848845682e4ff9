import { z } from 'zod'

const hexBytes = z.string().regex(/^([0-9a-fA-F]{2})*$/, 'expected hex bytes')

export const ApplianceParamsSchema = z.object({
  appliance: z.string().min(1),
})

export const ProfileSummarySchema = z.object({
  appliance: z.string(),
  bus: z.string(),
  origin: z.string(),
  presenceDetection: z.boolean(),
  autodiscovery: z.boolean(),
  circuits: z.array(
    z.object({
      name: z.string(),
      messages: z.number(),
    })
  ),
})

export const ProfileListResponseSchema = z.object({
  profiles: z.array(ProfileSummarySchema),
  count: z.number(),
})

export const ReloadResponseSchema = z.object({
  success: z.boolean(),
  profiles: z.array(z.string()),
  count: z.number(),
})

export const DiscoveryResponseSchema = z.object({
  appliance: z.string(),
  documents: z.array(
    z.object({
      topic: z.string(),
      payload: z.unknown(),
    })
  ),
})

export const PresenceResponseSchema = z.object({
  appliance: z.string(),
  state: z.enum(['present', 'absent', 'indeterminate']),
})

export const DecodeTelegramBodySchema = z.object({
  src: z.string().regex(/^[0-9a-fA-F]{2}$/, 'expected one hex byte'),
  dst: z.string().regex(/^[0-9a-fA-F]{2}$/, 'expected one hex byte'),
  pbsb: z.string().regex(/^[0-9a-fA-F]{4}$/, 'expected four hex digits'),
  data: hexBytes,
  response: hexBytes.optional(),
  publish: z.boolean().default(false),
})

const PublishRecordSchema = z.object({
  topic: z.string(),
  value: z.number(),
  unit: z.string(),
  circuit: z.string(),
  fieldName: z.string(),
})

const OutcomeSchema = z.object({
  kind: z.enum(['unrecognized', 'decoded', 'failed']),
  direction: z.enum(['request', 'response']),
  circuit: z.string().optional(),
  comment: z.string().optional(),
  records: z.array(PublishRecordSchema).optional(),
  error: z
    .object({
      kind: z.enum(['OutOfRange', 'UnknownType']),
      fieldName: z.string(),
      message: z.string(),
    })
    .optional(),
})

export const DecodeTelegramResponseSchema = z.object({
  telegram: z.string(),
  published: z.number(),
  results: z.array(
    z.object({
      appliance: z.string(),
      outcomes: z.array(OutcomeSchema),
    })
  ),
})

export type DecodeTelegramBody = z.infer<typeof DecodeTelegramBodySchema>
export type ApplianceParams = z.infer<typeof ApplianceParamsSchema>
export type OutcomeResponse = z.infer<typeof OutcomeSchema>
