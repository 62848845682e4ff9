import fastify from 'fastify'
import swagger from '@fastify/swagger'
import swaggerUi from '@fastify/swagger-ui'
import sensible from '@fastify/sensible'
import {
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'
import { config } from './config/env'

// Plugins
import profilesPlugin from './plugins/profiles'
import mqttPlugin from './plugins/mqtt'
import ebusPlugin from './plugins/ebus'

import { customLevels, logStream } from './lib/logger'

// Routes
import profileRoutes from './modules/profiles/routes'
import logsRoutes from './modules/system/logs-routes'

export async function buildApp() {
  const app = fastify({
    logger: {
      stream: logStream,
      level: config.log.level,
      customLevels,
    },
    disableRequestLogging: true,
  }).withTypeProvider<ZodTypeProvider>()

  // Validation
  app.setValidatorCompiler(validatorCompiler)
  app.setSerializerCompiler(serializerCompiler)

  // Sensible (HTTP Errors)
  await app.register(sensible)

  // Swagger
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'ebus MQTT Bridge API',
        description: 'Decode ebus telegrams with appliance profiles and publish them to MQTT',
        version: '1.0.0',
      },
      servers: [],
    },
    transform: jsonSchemaTransform,
  })

  await app.register(swaggerUi, {
    routePrefix: '/documentation',
  })

  // Profiles first: an invalid profile stops startup before anything connects
  await app.register(profilesPlugin)
  await app.register(mqttPlugin)
  await app.register(ebusPlugin)

  // Routes
  await app.register(profileRoutes, { prefix: '/api' })
  await app.register(logsRoutes, { prefix: '/api' })

  app.get('/health', async () => {
    return {
      status: 'ok',
      ebus: app.ebus.isConnected(),
      mqtt: app.mqtt.connected,
      profiles: app.profiles.getAll().length,
    }
  })

  return app
}
