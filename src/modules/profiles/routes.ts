import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { ProfileController } from './controller'
import {
  ApplianceParamsSchema,
  DecodeTelegramBodySchema,
  DecodeTelegramResponseSchema,
  DiscoveryResponseSchema,
  PresenceResponseSchema,
  ProfileListResponseSchema,
  ReloadResponseSchema,
} from './schema'

const profileRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new ProfileController(fastify)

  // GET /profiles
  app.get(
    '/profiles',
    {
      schema: {
        tags: ['Profiles'],
        summary: 'List active appliance profiles',
        response: {
          200: ProfileListResponseSchema,
        },
      },
    },
    controller.listProfiles
  )

  // POST /profiles/reload
  app.post(
    '/profiles/reload',
    {
      schema: {
        tags: ['Profiles'],
        summary: 'Reload profiles from disk',
        response: {
          200: ReloadResponseSchema,
        },
      },
    },
    controller.reloadProfiles
  )

  // GET /profiles/:appliance/discovery
  app.get(
    '/profiles/:appliance/discovery',
    {
      schema: {
        tags: ['Profiles'],
        summary: 'Get autodiscovery documents of an appliance',
        params: ApplianceParamsSchema,
        response: {
          200: DiscoveryResponseSchema,
        },
      },
    },
    controller.getDiscovery
  )

  // GET /profiles/:appliance/presence
  app.get(
    '/profiles/:appliance/presence',
    {
      schema: {
        tags: ['Profiles'],
        summary: 'Probe whether an appliance is on the bus',
        params: ApplianceParamsSchema,
        response: {
          200: PresenceResponseSchema,
        },
      },
    },
    controller.getPresence
  )

  // POST /telegrams/decode
  app.post(
    '/telegrams/decode',
    {
      schema: {
        tags: ['Telegrams'],
        summary: 'Decode a telegram against every active profile',
        body: DecodeTelegramBodySchema,
        response: {
          200: DecodeTelegramResponseSchema,
        },
      },
    },
    controller.decodeTelegram
  )
}

export default profileRoutes
