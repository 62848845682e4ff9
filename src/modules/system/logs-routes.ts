import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { z } from 'zod'
import { logBuffer } from '../../lib/logger'

const CATEGORIES = ['EBUS', 'MQTT', 'DECODE', 'PRESENCE', 'PROFILE', 'API'] as const
const LEVELS = ['trace', 'debug', 'success', 'info', 'warn', 'error', 'fatal'] as const

const LogsQuerySchema = z.object({
  category: z.union([z.enum(CATEGORIES), z.array(z.enum(CATEGORIES))]).optional(),
  level: z.union([z.enum(LEVELS), z.array(z.enum(LEVELS))]).optional(),
  limit: z.string().transform(Number).pipe(z.number().int().min(1).max(500)).default('100'),
})

const LogEntrySchema = z.object({
  category: z.string(),
  level: z.string(),
  msg: z.string(),
  time: z.date(),
  details: z.record(z.unknown()),
})

const LogsResponseSchema = z.object({
  logs: z.array(LogEntrySchema),
  total: z.number(),
  limit: z.number(),
})

const toList = <T>(value: T | T[] | undefined): T[] | undefined =>
  value === undefined ? undefined : Array.isArray(value) ? value : [value]

const logsRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()

  app.get(
    '/logs',
    {
      schema: {
        tags: ['System'],
        summary: 'Get recent logs with filtering',
        querystring: LogsQuerySchema,
        response: {
          200: LogsResponseSchema,
        },
      },
    },
    async request => {
      const { category, level, limit } = request.query

      const logs = logBuffer.query({ category: toList(category), level: toList(level), limit })

      return {
        logs,
        total: logBuffer.size(),
        limit,
      }
    }
  )
}

export default logsRoutes
